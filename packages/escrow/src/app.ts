/**
 * Escrow Service Application
 *
 * Bootstrap + lifecycle management.
 *
 * Lifecycle:
 * - On startup: ensure schema, wire ledger and clock, start HTTP
 * - On shutdown: stop accepting requests, close the database pool
 */

// Load environment variables from .env file
import 'dotenv/config';

import { Server } from 'node:http';
import cors from 'cors';
import express, { Express } from 'express';
import { Pool } from 'pg';

import { ClockOracle, SystemClock, BlockHeightClock } from './adapters/clock.js';
import { InMemoryLedger, LedgerAdapter } from './adapters/ledger.js';
import { createErc20LedgerAdapter } from './adapters/erc20-ledger-adapter.js';
import { EscrowEngine, EscrowEvent } from './escrow/engine.js';
import { EscrowPersistence, InMemoryEscrowPersistence } from './escrow/persistence.js';
import { PostgresEscrowPersistence } from './persistence/postgres/index.js';
import { DEFAULT_COLLABORATOR_TIMEOUT_MS } from './execution/timeout.js';
import { createRoutes, errorHandler } from './http/index.js';
import { ConsoleMetrics, EscrowMetrics, NoOpMetrics } from './observability/index.js';
import { createLogger, isLogLevel, Logger, LogLevel } from './utils/index.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export type LedgerBackend = 'memory' | 'erc20';

export interface EscrowServiceConfig {
  // Server
  port: number;
  host: string;

  // Database (unset: in-memory, data lost on restart)
  databaseUrl?: string;

  // Escrow
  contractOwner: string;
  collaboratorTimeoutMs: number;

  // Ledger
  ledgerBackend: LedgerBackend;
  /** Custodian identity for the memory ledger; erc20 uses the key's address. */
  custodian: string;
  /** Starting balances for the memory ledger. */
  memoryBalances: Record<string, bigint>;
  rpcUrl: string;
  tokenAddress?: string;
  custodianPrivateKey?: string;
  confirmations: number;
  transferTimeoutMs: number;

  // Observability
  logLevel: LogLevel;
  consoleMetrics: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function parseInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/**
 * "alice=1000,bob=250" -> { alice: 1000n, bob: 250n }
 */
export function parseBalances(raw: string | undefined): Record<string, bigint> {
  const balances: Record<string, bigint> = {};
  if (!raw) return balances;

  for (const entry of raw.split(',')) {
    const trimmed = entry.trim();
    if (trimmed === '') continue;
    const [identity, amount] = trimmed.split('=');
    if (!identity || !amount || !/^\d+$/.test(amount.trim())) {
      throw new ConfigError(`Invalid MEMORY_LEDGER_BALANCES entry "${trimmed}"`);
    }
    balances[identity.trim()] = BigInt(amount.trim());
  }
  return balances;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EscrowServiceConfig {
  const contractOwner = env.CONTRACT_OWNER;
  if (!contractOwner) {
    throw new ConfigError('CONTRACT_OWNER is required');
  }

  const ledgerBackend = env.LEDGER_BACKEND ?? 'memory';
  if (ledgerBackend !== 'memory' && ledgerBackend !== 'erc20') {
    throw new ConfigError(`LEDGER_BACKEND must be "memory" or "erc20", got "${ledgerBackend}"`);
  }
  if (ledgerBackend === 'erc20' && (!env.TOKEN_ADDRESS || !env.CUSTODIAN_PRIVATE_KEY)) {
    throw new ConfigError('LEDGER_BACKEND=erc20 requires TOKEN_ADDRESS and CUSTODIAN_PRIVATE_KEY');
  }

  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be debug, info, warn or error, got "${logLevel}"`);
  }

  return {
    port: parseInteger(env, 'PORT', 3000),
    host: env.HOST ?? '0.0.0.0',
    databaseUrl: env.DATABASE_URL || undefined,
    contractOwner,
    collaboratorTimeoutMs: parseInteger(env, 'COLLABORATOR_TIMEOUT_MS', DEFAULT_COLLABORATOR_TIMEOUT_MS),
    ledgerBackend,
    custodian: env.CUSTODIAN_ADDRESS ?? 'escrow-custodian',
    memoryBalances: parseBalances(env.MEMORY_LEDGER_BALANCES),
    rpcUrl: env.RPC_URL ?? 'http://localhost:8545',
    tokenAddress: env.TOKEN_ADDRESS,
    custodianPrivateKey: env.CUSTODIAN_PRIVATE_KEY,
    confirmations: parseInteger(env, 'CONFIRMATIONS', 1),
    transferTimeoutMs: parseInteger(env, 'TRANSFER_TIMEOUT_MS', 120_000),
    logLevel,
    consoleMetrics: env.CONSOLE_METRICS === 'true',
  };
}

// =============================================================================
// ESCROW SERVICE
// =============================================================================

interface Collaborators {
  ledger: LedgerAdapter;
  clock: ClockOracle;
  custodian: string;
}

export class EscrowServer {
  private config: EscrowServiceConfig;
  private logger: Logger;
  private app: Express;
  private pool?: Pool;
  private engine?: EscrowEngine;
  private server?: Server;
  private shutdownPromise?: Promise<void>;

  constructor(config: EscrowServiceConfig) {
    this.config = config;
    this.logger = createLogger({ level: config.logLevel, service: 'bounty-escrow' });
    this.app = express();
  }

  /**
   * Start the service.
   *
   * 1. Initialize persistence
   * 2. Initialize ledger + clock
   * 3. Build engine, subscribe to events
   * 4. Start HTTP server
   */
  async start(): Promise<void> {
    this.logger.info({}, 'Starting escrow service...');

    const persistence = await this.createPersistence();
    const { ledger, clock, custodian } = this.createCollaborators();
    const metrics: EscrowMetrics = this.config.consoleMetrics ? new ConsoleMetrics() : new NoOpMetrics();

    const engine = new EscrowEngine(
      {
        contractOwner: this.config.contractOwner,
        custodian,
        collaboratorTimeoutMs: this.config.collaboratorTimeoutMs,
      },
      { persistence, ledger, clock, logger: this.logger, metrics }
    );
    engine.onEvent((event) => this.logEvent(event));
    this.engine = engine;

    // Setup HTTP server
    this.app.use(cors());
    this.app.use(express.json({ limit: '100kb' }));
    this.app.use(createRoutes(engine, this.logger));
    this.app.use(errorHandler(this.logger));

    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info(
          { port: this.config.port, host: this.config.host },
          'Escrow HTTP server started'
        );
        resolve();
      });
      server.once('error', reject);
      this.server = server;
    });

    this.setupShutdownHandlers();
    this.logger.info({ contractOwner: this.config.contractOwner, custodian }, 'Escrow service started');
  }

  /**
   * Stop the service gracefully.
   */
  async stop(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = this.doStop();
    return this.shutdownPromise;
  }

  getEngine(): EscrowEngine | undefined {
    return this.engine;
  }

  private async doStop(): Promise<void> {
    this.logger.info({}, 'Stopping escrow service...');

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      this.logger.info({}, 'HTTP server stopped');
    }

    if (this.pool) {
      await this.pool.end();
      this.logger.info({}, 'Database connections closed');
    }

    this.logger.info({}, 'Escrow service stopped');
  }

  private async createPersistence(): Promise<EscrowPersistence> {
    if (!this.config.databaseUrl) {
      this.logger.warn({}, 'DATABASE_URL not set - using in-memory persistence, data is lost on restart');
      return new InMemoryEscrowPersistence();
    }

    this.pool = new Pool({ connectionString: this.config.databaseUrl });
    const persistence = new PostgresEscrowPersistence(this.pool);
    await persistence.ensureSchema();
    this.logger.info({}, 'Database connection established');
    return persistence;
  }

  private createCollaborators(): Collaborators {
    const { tokenAddress, custodianPrivateKey } = this.config;

    if (this.config.ledgerBackend === 'erc20' && tokenAddress && custodianPrivateKey) {
      const { adapter, provider, custodian } = createErc20LedgerAdapter({
        rpcUrl: this.config.rpcUrl,
        tokenAddress,
        custodianPrivateKey,
        confirmations: this.config.confirmations,
        transferTimeoutMs: this.config.transferTimeoutMs,
      });
      this.logger.info(
        { rpcUrl: this.config.rpcUrl, token: tokenAddress, custodian },
        'ERC-20 ledger initialized'
      );
      return { ledger: adapter, clock: new BlockHeightClock(provider), custodian };
    }

    this.logger.warn(
      { custodian: this.config.custodian, accounts: Object.keys(this.config.memoryBalances).length },
      'Using in-memory ledger (development only)'
    );
    return {
      ledger: new InMemoryLedger(this.config.memoryBalances),
      clock: new SystemClock(),
      custodian: this.config.custodian,
    };
  }

  private logEvent(event: EscrowEvent): void {
    switch (event.type) {
      case 'BOUNTY_CREATED':
        this.logger.info({ bountyId: event.bountyId, creator: event.creator, amount: event.amount }, 'Event: bounty created');
        break;
      case 'WORK_SUBMITTED':
        this.logger.info({ bountyId: event.bountyId, submitter: event.submitter }, 'Event: work submitted');
        break;
      case 'SUBMISSION_VERIFIED':
        this.logger.info(
          { bountyId: event.bountyId, submitter: event.submitter, verifiedBy: event.verifiedBy, amount: event.amount },
          'Event: submission verified'
        );
        break;
      case 'BOUNTY_CANCELLED':
        this.logger.info({ bountyId: event.bountyId, amount: event.amount }, 'Event: bounty cancelled');
        break;
      case 'VERIFIER_UPDATED':
        this.logger.info({ identity: event.identity, approved: event.approved }, 'Event: verifier updated');
        break;
      case 'OPERATION_REJECTED':
        this.logger.warn({ operation: event.operation, code: event.code }, event.message);
        break;
    }
  }

  private setupShutdownHandlers(): void {
    const shutdown = (signal: string): void => {
      this.logger.info({ signal }, 'Received shutdown signal');
      this.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          this.logger.error({ error }, 'Shutdown failed');
          process.exit(1);
        }
      );
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  }
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const server = new EscrowServer(config);
  await server.start();
}

// Run if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
