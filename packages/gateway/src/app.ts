/**
 * Relay Service Application
 *
 * Bootstrap + lifecycle management.
 *
 * Lifecycle:
 * - On startup: prepare storage, build adapters, register routes, serve the
 *   operator API
 * - On shutdown: stop listening, detach adapters, close the database pool
 *   (undelivered vote records stay in PostgreSQL and resume on restart)
 */

// Load environment variables from .env file
import 'dotenv/config';

import { readFileSync } from 'fs';
import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import { Pool } from 'pg';

import type { Caller, NetworkId } from './boundaries/invariants.js';
import { adapterId, caller, networkId, tenantId } from './boundaries/invariants.js';
import { ConfigurationError } from './boundaries/errors.js';
import { EvmRelayAdapter, createEvmRelayAdapter } from './adapters/evm-adapter.js';
import { DEFAULT_TIMEOUT_CONFIG } from './execution/timeout.js';
import type { TimeoutConfig } from './execution/timeout.js';
import { FlatGasService, TableGasService, DEFAULT_MAX_BATCH_GAS_LIMIT, DEFAULT_MESSAGE_GAS } from './hub/gas.js';
import type { GasService } from './hub/gas.js';
import { PostgresSubsidyStore, PostgresVoteStore, ensureSchema } from './persistence/postgres/index.js';
import { createRoutes, errorHandler } from './http/index.js';
import { ConsoleMetrics } from './observability/metrics.js';
import { createLogger, isLogLevel } from './utils/logger.js';
import type { LogLevel, Logger } from './utils/logger.js';
import { createRelayNode } from './node.js';
import type { RelayNode } from './node.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface RelayServiceConfig {
  // Server
  port: number;
  host: string;

  // Database (in-memory stores when absent)
  databaseUrl: string | null;

  // Relay
  localNetwork: NetworkId;
  operator: Caller;
  adminToken: string;
  adaptersFile: string | null;
  relayerPrivateKey: string | null;
  adapterTimeoutMs: number;
  maxBatchGasLimit: bigint;
  messageGas: bigint;

  // Logging
  logLevel: LogLevel;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RelayServiceConfig {
  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError('INVALID_LOG_LEVEL', `Unknown LOG_LEVEL: ${logLevel}`);
  }
  const adminToken = env.ADMIN_TOKEN;
  if (!adminToken) {
    throw new ConfigurationError('MISSING_ADMIN_TOKEN', 'ADMIN_TOKEN must be set');
  }

  return {
    port: parseInt(env.PORT ?? '3000', 10),
    host: env.HOST ?? '0.0.0.0',
    databaseUrl: env.DATABASE_URL ?? null,
    localNetwork: networkId(parseInt(env.LOCAL_NETWORK_ID ?? '1', 10)),
    operator: caller(env.OPERATOR ?? 'operator'),
    adminToken,
    adaptersFile: env.ADAPTERS_FILE ?? null,
    relayerPrivateKey: env.RELAYER_PRIVATE_KEY ?? null,
    adapterTimeoutMs: parseInt(env.ADAPTER_TIMEOUT ?? String(DEFAULT_TIMEOUT_CONFIG.sendTimeoutMs), 10),
    maxBatchGasLimit: BigInt(env.MAX_BATCH_GAS_LIMIT ?? DEFAULT_MAX_BATCH_GAS_LIMIT.toString()),
    messageGas: BigInt(env.MESSAGE_GAS ?? DEFAULT_MESSAGE_GAS.toString()),
    logLevel,
  };
}

// =============================================================================
// ADAPTER DEFINITIONS
// =============================================================================

export interface AdapterDefinition {
  id: string;
  rpcUrl: string;
  endpoint: string;
}

export interface RouteDefinition {
  remote: number;
  tenant: string;
  adapters: string[];
  threshold: number;
  recoveryIndex?: number;
  primaryIndex?: number;
}

/**
 * Per-kind gas: each sub-message costs `baseCost` plus the amount listed for
 * its kind byte, or `defaultCost` (MESSAGE_GAS when omitted) for other kinds.
 */
export interface GasDefinition {
  baseCost: bigint;
  defaultCost?: bigint;
  kinds: Map<number, bigint>;
}

export interface AdaptersFile {
  adapters: AdapterDefinition[];
  routes: RouteDefinition[];
  gas?: GasDefinition;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(source: Record<string, unknown>, field: string, where: string): string {
  const value = source[field];
  if (typeof value !== 'string' || value === '') {
    throw new ConfigurationError('INVALID_ADAPTERS_FILE', `${where}.${field} must be a non-empty string`);
  }
  return value;
}

function requireInteger(source: Record<string, unknown>, field: string, where: string): number {
  const value = source[field];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ConfigurationError('INVALID_ADAPTERS_FILE', `${where}.${field} must be an integer`);
  }
  return value;
}

function optionalInteger(source: Record<string, unknown>, field: string, where: string): number | undefined {
  return source[field] === undefined ? undefined : requireInteger(source, field, where);
}

function parseGasAmount(value: unknown, where: string): bigint {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return BigInt(value);
  }
  throw new ConfigurationError('INVALID_ADAPTERS_FILE', `${where} must be a non-negative integer or decimal string`);
}

function parseGas(raw: unknown): GasDefinition {
  if (!isRecord(raw)) {
    throw new ConfigurationError('INVALID_ADAPTERS_FILE', 'gas must be an object');
  }
  const kinds = new Map<number, bigint>();
  if (raw.kinds !== undefined) {
    if (!isRecord(raw.kinds)) {
      throw new ConfigurationError('INVALID_ADAPTERS_FILE', 'gas.kinds must map kind bytes to amounts');
    }
    for (const [key, value] of Object.entries(raw.kinds)) {
      const kind = Number(key);
      if (!/^\d+$/.test(key) || kind > 255) {
        throw new ConfigurationError('INVALID_ADAPTERS_FILE', `gas.kinds key ${key} is not a kind byte (0-255)`);
      }
      kinds.set(kind, parseGasAmount(value, `gas.kinds.${key}`));
    }
  }
  return {
    baseCost: parseGasAmount(raw.baseCost, 'gas.baseCost'),
    defaultCost: raw.defaultCost === undefined ? undefined : parseGasAmount(raw.defaultCost, 'gas.defaultCost'),
    kinds,
  };
}

export function parseAdaptersFile(raw: unknown): AdaptersFile {
  if (!isRecord(raw) || !Array.isArray(raw.adapters) || !Array.isArray(raw.routes)) {
    throw new ConfigurationError('INVALID_ADAPTERS_FILE', 'Expected { adapters: [...], routes: [...] }');
  }

  const adapters = raw.adapters.map((entry: unknown, index): AdapterDefinition => {
    const where = `adapters[${index}]`;
    if (!isRecord(entry)) {
      throw new ConfigurationError('INVALID_ADAPTERS_FILE', `${where} must be an object`);
    }
    return {
      id: requireString(entry, 'id', where),
      rpcUrl: requireString(entry, 'rpcUrl', where),
      endpoint: requireString(entry, 'endpoint', where),
    };
  });

  const routes = raw.routes.map((entry: unknown, index): RouteDefinition => {
    const where = `routes[${index}]`;
    if (!isRecord(entry) || !Array.isArray(entry.adapters)) {
      throw new ConfigurationError('INVALID_ADAPTERS_FILE', `${where} must be an object with an adapters list`);
    }
    const ids = entry.adapters.map((id: unknown) => {
      if (typeof id !== 'string') {
        throw new ConfigurationError('INVALID_ADAPTERS_FILE', `${where}.adapters must list adapter ids`);
      }
      return id;
    });
    const tenant = entry.tenant === undefined ? '0' : requireString(entry, 'tenant', where);
    return {
      remote: requireInteger(entry, 'remote', where),
      tenant,
      adapters: ids,
      threshold: requireInteger(entry, 'threshold', where),
      recoveryIndex: optionalInteger(entry, 'recoveryIndex', where),
      primaryIndex: optionalInteger(entry, 'primaryIndex', where),
    };
  });

  if (raw.gas === undefined) {
    return { adapters, routes };
  }
  return { adapters, routes, gas: parseGas(raw.gas) };
}

// =============================================================================
// RELAY SERVICE APPLICATION
// =============================================================================

export class RelayService {
  private config: RelayServiceConfig;
  private logger: Logger;
  private app: Express;
  private pool: Pool | null;
  private node: RelayNode | null = null;
  private adapters: EvmRelayAdapter[] = [];
  private server?: ReturnType<Express['listen']>;
  private shutdownPromise?: Promise<void>;

  constructor(config: RelayServiceConfig) {
    this.config = config;
    this.logger = createLogger({ level: config.logLevel, service: 'crosslink' });
    this.app = express();
    this.pool = config.databaseUrl ? new Pool({ connectionString: config.databaseUrl }) : null;
  }

  /**
   * Start the relay service.
   *
   * 1. Prepare storage
   * 2. Build the relay node
   * 3. Register adapters and routes
   * 4. Start HTTP server
   */
  async start(): Promise<void> {
    this.logger.info({ network: this.config.localNetwork }, 'Starting relay service...');

    // Initialize persistence
    let voteStore: PostgresVoteStore | undefined;
    let subsidy: PostgresSubsidyStore | undefined;
    if (this.pool) {
      await ensureSchema(this.pool);
      voteStore = new PostgresVoteStore(this.pool);
      subsidy = new PostgresSubsidyStore(this.pool);
      this.logger.info({}, 'Database connection established');
    } else {
      this.logger.warn({}, 'No DATABASE_URL configured - votes and balances are kept in memory');
    }

    const timeouts: TimeoutConfig = {
      estimateTimeoutMs: Math.min(DEFAULT_TIMEOUT_CONFIG.estimateTimeoutMs, this.config.adapterTimeoutMs),
      sendTimeoutMs: this.config.adapterTimeoutMs,
    };

    const definitions = this.readDefinitions();

    this.node = createRelayNode({
      localNetwork: this.config.localNetwork,
      wards: [this.config.operator],
      voteStore,
      subsidy,
      gas: this.gasService(definitions),
      maxBatchGasLimit: this.config.maxBatchGasLimit,
      timeouts,
      logger: this.logger,
      metrics: new ConsoleMetrics(),
      // Domain handlers are deployment-specific; without one, messages are logged
      messageHandler: async (source, message) => {
        this.logger.info({ network: source, kind: message[0], bytes: message.length }, 'Message received');
      },
    });

    if (definitions) {
      this.registerAdapters(this.node, definitions);
    } else {
      this.logger.warn({}, 'No ADAPTERS_FILE configured - no routes are registered');
    }

    // Setup HTTP server
    this.app.use(cors());
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(
      createRoutes({
        router: this.node.router,
        gateway: this.node.gateway,
        operator: this.config.operator,
        adminToken: this.config.adminToken,
        logger: this.logger,
      })
    );
    this.app.use(errorHandler(this.logger));

    // Start listening
    await new Promise<void>((resolve) => {
      this.server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info(
          { port: this.config.port, host: this.config.host },
          'Relay HTTP server started'
        );
        resolve();
      });
    });

    // Setup shutdown handlers
    this.setupShutdownHandlers();

    this.logger.info({}, 'Relay service started successfully');
  }

  /**
   * Stop the relay service gracefully.
   */
  async stop(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = this.doStop();
    return this.shutdownPromise;
  }

  private async doStop(): Promise<void> {
    this.logger.info({}, 'Stopping relay service...');

    // Stop HTTP server
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

    await Promise.all(this.adapters.map((adapter) => adapter.detach()));

    // Close database pool
    if (this.pool) {
      await this.pool.end();
      this.logger.info({}, 'Database connections closed');
    }

    this.logger.info({}, 'Relay service stopped');
  }

  private readDefinitions(): AdaptersFile | null {
    if (!this.config.adaptersFile) {
      return null;
    }
    const raw: unknown = JSON.parse(readFileSync(this.config.adaptersFile, 'utf8'));
    return parseAdaptersFile(raw);
  }

  private gasService(definitions: AdaptersFile | null): GasService {
    const gas = definitions?.gas;
    if (!gas) {
      return new FlatGasService(this.config.messageGas);
    }
    this.logger.info({ baseCost: gas.baseCost, kinds: gas.kinds.size }, 'Gas priced per message kind');
    return new TableGasService({
      baseCost: gas.baseCost,
      defaultCost: gas.defaultCost ?? this.config.messageGas,
      kinds: gas.kinds,
    });
  }

  private registerAdapters(node: RelayNode, definitions: AdaptersFile): void {
    const relayerPrivateKey = this.config.relayerPrivateKey;
    if (!relayerPrivateKey) {
      throw new ConfigurationError('MISSING_RELAYER_KEY', 'RELAYER_PRIVATE_KEY is required when ADAPTERS_FILE is set');
    }

    const byId = new Map<string, EvmRelayAdapter>();
    for (const definition of definitions.adapters) {
      const adapter = createEvmRelayAdapter(
        adapterId(definition.id),
        definition.rpcUrl,
        definition.endpoint,
        relayerPrivateKey,
        this.logger
      );
      byId.set(definition.id, adapter);
      this.adapters.push(adapter);
    }

    for (const route of definitions.routes) {
      const adapters = route.adapters.map((id) => {
        const adapter = byId.get(id);
        if (!adapter) {
          throw new ConfigurationError('UNKNOWN_ADAPTER_ID', `Route to ${route.remote} names unknown adapter ${id}`);
        }
        return adapter;
      });

      node.router.setAdapters(
        this.config.operator,
        networkId(route.remote),
        tenantId(route.tenant),
        adapters,
        {
          threshold: route.threshold,
          recoveryIndex: route.recoveryIndex,
          primaryIndex: route.primaryIndex,
        }
      );
    }

    this.logger.info(
      { adapters: definitions.adapters.length, routes: definitions.routes.length },
      'Adapters registered from file'
    );
  }

  private setupShutdownHandlers(): void {
    const shutdown = async (signal: string) => {
      this.logger.info({ signal }, 'Received shutdown signal');
      await this.stop();
      process.exit(0);
    };

    const onSignal = (signal: string) => {
      shutdown(signal).catch((err: unknown) => {
        this.logger.error({ error: err }, 'Shutdown failed');
        process.exit(1);
      });
    };

    process.on('SIGINT', () => onSignal('SIGINT'));
    process.on('SIGTERM', () => onSignal('SIGTERM'));
  }
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const service = new RelayService(config);
  await service.start();
}

// Run if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
