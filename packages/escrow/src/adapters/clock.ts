/**
 * Clock Oracle
 *
 * Monotonically non-decreasing counter that deadlines are compared against.
 * On-chain deployments use block height; everything else uses unix seconds.
 */

import { ethers } from 'ethers';

export interface ClockOracle {
  now(): Promise<number>;
}

/**
 * Block height from an ethers provider.
 */
export class BlockHeightClock implements ClockOracle {
  constructor(private readonly provider: ethers.Provider) {}

  async now(): Promise<number> {
    return this.provider.getBlockNumber();
  }
}

/**
 * Unix seconds. Never goes backwards within one process, even if the
 * wall clock does.
 */
export class SystemClock implements ClockOracle {
  private last = 0;

  async now(): Promise<number> {
    const current = Math.floor(Date.now() / 1000);
    this.last = Math.max(this.last, current);
    return this.last;
  }
}

/**
 * Clock driven by hand. For tests and local simulations.
 */
export class ManualClock implements ClockOracle {
  constructor(private height: number = 0) {}

  async now(): Promise<number> {
    return this.height;
  }

  advance(blocks: number = 1): number {
    if (blocks < 0) {
      throw new Error('ManualClock cannot move backwards');
    }
    this.height += blocks;
    return this.height;
  }

  set(height: number): void {
    if (height < this.height) {
      throw new Error(`ManualClock cannot move backwards (${this.height} -> ${height})`);
    }
    this.height = height;
  }
}
