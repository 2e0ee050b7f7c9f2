/**
 * Bounty escrow service: engine, persistence, ledger adapters and HTTP API.
 */

export * from './escrow/index.js';
export * from './adapters/index.js';
export * from './boundaries/index.js';
export * from './execution/index.js';
export * from './observability/index.js';
export * from './utils/index.js';
export * from './persistence/postgres/index.js';
export * from './http/index.js';
export {
  EscrowServer,
  ConfigError,
  loadConfigFromEnv,
  parseBalances,
  main,
} from './app.js';
export type { EscrowServiceConfig, LedgerBackend } from './app.js';
