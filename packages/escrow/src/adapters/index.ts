/**
 * Escrow Adapters
 *
 * Implementations of the external collaborators:
 * - Ledger (in-memory, ERC-20 via ethers.js)
 * - Clock (block height, system time, manual)
 */

// Type-only exports
export type { LedgerAdapter, TransferOutcome, TransferStatus, LedgerTransferRecord } from './ledger.js';
export type { ClockOracle } from './clock.js';
export type {
  Erc20Token,
  TokenTransaction,
  TokenReceipt,
  Erc20LedgerOptions,
  Erc20LedgerConfig,
} from './erc20-ledger-adapter.js';

// Value exports
export { InMemoryLedger } from './ledger.js';
export { BlockHeightClock, SystemClock, ManualClock } from './clock.js';
export {
  EthersErc20Token,
  Erc20LedgerAdapter,
  createErc20LedgerAdapter,
} from './erc20-ledger-adapter.js';
