/**
 * ERC-20 Ledger Adapter - ethers.js implementation
 *
 * Escrow custody on a token contract. The custodian is the wallet this adapter
 * signs with.
 *
 * Implements:
 * - custodian -> anyone: token.transfer
 * - anyone -> custodian: token.transferFrom (needs an allowance to the custodian)
 * - balanceOf: spendable amount (balance capped by allowance for non-custodians)
 * - transferStatus: receipt lookup for a transfer that timed out unconfirmed
 *
 * Does NOT implement:
 * - transfers between two non-custodian identities
 * - gas management or nonce handling beyond what the wallet does
 */

import { ethers } from 'ethers';
import { LedgerAdapter, TransferOutcome, TransferStatus } from './ledger.js';

// =============================================================================
// ERC-20 ABI (minimal, only what we need)
// =============================================================================

const ERC20_ABI = [
  'function balanceOf(address owner) view returns (uint256)',
  'function allowance(address owner, address spender) view returns (uint256)',
  'function transfer(address to, uint256 amount) returns (bool)',
  'function transferFrom(address from, address to, uint256 amount) returns (bool)',
];

// =============================================================================
// TOKEN INTERFACE
// =============================================================================

export interface TokenReceipt {
  status: number | null;
}

export interface TokenTransaction {
  hash: string;
  wait(confirmations?: number, timeoutMs?: number): Promise<TokenReceipt | null>;
}

/**
 * The slice of an ERC-20 contract the adapter needs.
 * Injected to allow testing without a chain.
 */
export interface Erc20Token {
  balanceOf(owner: string): Promise<bigint>;
  allowance(owner: string, spender: string): Promise<bigint>;
  transfer(to: string, amount: bigint): Promise<TokenTransaction>;
  transferFrom(from: string, to: string, amount: bigint): Promise<TokenTransaction>;
  /** Mined receipt for a transaction hash, or null while it is not mined. */
  getReceipt(hash: string): Promise<TokenReceipt | null>;
}

/**
 * Erc20Token over an ethers Contract.
 */
export class EthersErc20Token implements Erc20Token {
  private contract: ethers.Contract;

  constructor(tokenAddress: string, runner: ethers.ContractRunner) {
    this.contract = new ethers.Contract(tokenAddress, ERC20_ABI, runner);
  }

  async balanceOf(owner: string): Promise<bigint> {
    return this.readUint('balanceOf', [owner]);
  }

  async allowance(owner: string, spender: string): Promise<bigint> {
    return this.readUint('allowance', [owner, spender]);
  }

  async transfer(to: string, amount: bigint): Promise<TokenTransaction> {
    const tx: ethers.ContractTransactionResponse = await this.contract.getFunction('transfer')(to, amount);
    return tx;
  }

  async transferFrom(from: string, to: string, amount: bigint): Promise<TokenTransaction> {
    const tx: ethers.ContractTransactionResponse = await this.contract.getFunction('transferFrom')(
      from,
      to,
      amount
    );
    return tx;
  }

  async getReceipt(hash: string): Promise<TokenReceipt | null> {
    const provider = this.contract.runner?.provider;
    if (!provider) {
      throw new Error('token contract is not connected to a provider');
    }
    return provider.getTransactionReceipt(hash);
  }

  private async readUint(method: string, args: string[]): Promise<bigint> {
    const value: unknown = await this.contract.getFunction(method)(...args);
    if (typeof value !== 'bigint') {
      throw new Error(`${method} returned a non-integer value`);
    }
    return value;
  }
}

// =============================================================================
// ADAPTER
// =============================================================================

export interface Erc20LedgerOptions {
  /** Blocks to wait for before a transfer counts as done. */
  confirmations?: number;
  /** How long to wait for those confirmations (ms). */
  transferTimeoutMs?: number;
}

export class Erc20LedgerAdapter implements LedgerAdapter {
  private confirmations: number;
  private transferTimeoutMs: number;

  constructor(
    private readonly token: Erc20Token,
    private readonly custodian: string,
    options: Erc20LedgerOptions = {}
  ) {
    this.confirmations = options.confirmations ?? 1;
    this.transferTimeoutMs = options.transferTimeoutMs ?? 120_000;
  }

  async balanceOf(identity: string): Promise<bigint> {
    const balance = await this.token.balanceOf(identity);
    if (this.isCustodian(identity)) {
      return balance;
    }
    const allowance = await this.token.allowance(identity, this.custodian);
    return balance < allowance ? balance : allowance;
  }

  async transfer(from: string, to: string, amount: bigint): Promise<TransferOutcome> {
    if (amount <= 0n) {
      return { ok: false, reason: 'transfer amount must be positive' };
    }

    let tx: TokenTransaction;
    try {
      if (this.isCustodian(from)) {
        tx = await this.token.transfer(to, amount);
      } else if (this.isCustodian(to)) {
        tx = await this.token.transferFrom(from, to, amount);
      } else {
        return { ok: false, reason: 'transfers must involve the escrow custodian' };
      }
    } catch (error) {
      return { ok: false, reason: `submission failed: ${errorMessage(error)}` };
    }

    try {
      const receipt = await tx.wait(this.confirmations, this.transferTimeoutMs);
      if (!receipt || receipt.status !== 1) {
        return { ok: false, reason: `transaction ${tx.hash} reverted` };
      }
      return { ok: true, reference: tx.hash };
    } catch (error) {
      if (ethers.isError(error, 'CALL_EXCEPTION')) {
        return { ok: false, reason: `transaction ${tx.hash} reverted` };
      }
      // The transaction was broadcast and may still be mined
      return {
        ok: false,
        unconfirmed: true,
        reference: tx.hash,
        reason: `transaction ${tx.hash} unconfirmed: ${errorMessage(error)}`,
      };
    }
  }

  async transferStatus(reference: string): Promise<TransferStatus> {
    const receipt = await this.token.getReceipt(reference);
    if (!receipt) {
      return 'pending';
    }
    return receipt.status === 1 ? 'confirmed' : 'failed';
  }

  private isCustodian(identity: string): boolean {
    return identity.toLowerCase() === this.custodian.toLowerCase();
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// FACTORY
// =============================================================================

export interface Erc20LedgerConfig extends Erc20LedgerOptions {
  rpcUrl: string;
  tokenAddress: string;
  custodianPrivateKey: string;
}

export function createErc20LedgerAdapter(config: Erc20LedgerConfig): {
  adapter: Erc20LedgerAdapter;
  provider: ethers.JsonRpcProvider;
  custodian: string;
} {
  const provider = new ethers.JsonRpcProvider(config.rpcUrl);
  const wallet = new ethers.Wallet(config.custodianPrivateKey, provider);
  const token = new EthersErc20Token(config.tokenAddress, wallet);
  const adapter = new Erc20LedgerAdapter(token, wallet.address, config);
  return { adapter, provider, custodian: wallet.address };
}
