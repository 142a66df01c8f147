/**
 * One object that owns every long-lived handle: the bridge
 * process, its output queue and QR slot, the HTTP client and the storage
 * adapter. Nothing else in the library keeps process-wide state.
 *
 * The adapter is opened on first use. `shutdown()` stops the bridge and
 * closes the adapter; `installShutdownHooks()` ties that to host exit.
 */

import { logger } from '../middleware/logger.js';
import { config as defaultConfig, resolveDatabaseConfig, type DatabaseConfig, type EnvConfig } from '../utils/config.js';
import { createDatabaseAdapter } from '../utils/db.js';
import type { DatabaseAdapter } from '../utils/db-backend.js';
import { BridgeClient } from './client.js';
import { OutputMonitor } from './output-monitor.js';
import { ReadinessOrchestrator, type BridgeStatus, type ReadinessResult } from './readiness.js';
import { BridgeSupervisor, type ProcessListFn, type SpawnFn } from './supervisor.js';

export interface BridgeRuntimeOptions {
  config?: EnvConfig;
  /** Storage to use instead of the one `DATABASE_URL` selects. */
  database?: DatabaseConfig;
  /** Factory for the adapter; tests pass an in-memory one. */
  createAdapter?: (dbConfig: DatabaseConfig) => DatabaseAdapter;
  spawn?: SpawnFn;
  listProcesses?: ProcessListFn;
  fetch?: typeof fetch;
}

const log = logger.child({ module: 'bridge-runtime' });

export class BridgeRuntime {
  readonly config: EnvConfig;
  readonly monitor: OutputMonitor;
  readonly supervisor: BridgeSupervisor;
  readonly client: BridgeClient;
  readonly readiness: ReadinessOrchestrator;

  private adapter: DatabaseAdapter | null = null;
  private readonly databaseConfig: () => DatabaseConfig;
  private readonly createAdapter: (dbConfig: DatabaseConfig) => DatabaseAdapter;
  private shuttingDown: Promise<void> | null = null;

  constructor(options: BridgeRuntimeOptions = {}) {
    const env = options.config ?? defaultConfig;
    this.config = env;

    const explicitDb = options.database;
    this.databaseConfig = () => explicitDb ?? resolveDatabaseConfig(env);
    this.createAdapter = options.createAdapter ?? createDatabaseAdapter;

    this.monitor = new OutputMonitor();
    this.supervisor = new BridgeSupervisor({
      bridgeDir: env.BRIDGE_DIR,
      executable: env.BRIDGE_EXECUTABLE,
      monitor: this.monitor,
      spawn: options.spawn,
      listProcesses: options.listProcesses,
    });
    this.client = new BridgeClient({
      baseUrl: env.BRIDGE_API_URL,
      connectTimeoutMs: env.BRIDGE_CONNECT_TIMEOUT_MS,
      readTimeoutMs: env.BRIDGE_READ_TIMEOUT_MS,
      retries: env.BRIDGE_HTTP_RETRIES,
      fetch: options.fetch,
    });
    this.readiness = new ReadinessOrchestrator({
      supervisor: this.supervisor,
      client: this.client,
      monitor: this.monitor,
      authentication: async () => this.database().authentication,
    });
  }

  /** Storage adapter, opened on first call. */
  database(): DatabaseAdapter {
    if (!this.adapter) {
      const dbConfig = this.databaseConfig();
      this.adapter = this.createAdapter(dbConfig);
      log.info({ kind: dbConfig.kind }, 'Database adapter opened');
    }
    return this.adapter;
  }

  getBridgeStatus(): Promise<BridgeStatus> {
    return this.readiness.getBridgeStatus();
  }

  ensureReady(): Promise<ReadinessResult> {
    return this.readiness.ensureReady();
  }

  /** Stop the bridge and close storage. Safe to call more than once. */
  shutdown(): Promise<void> {
    if (!this.shuttingDown) this.shuttingDown = this.teardown();
    return this.shuttingDown;
  }

  private async teardown(): Promise<void> {
    log.info('Shutting down bridge runtime');
    await this.supervisor.stop();

    const adapter = this.adapter;
    this.adapter = null;
    if (adapter) {
      try {
        await adapter.close();
      } catch (err) {
        log.error({ err }, 'Failed to close database cleanly during shutdown');
      }
    }
    this.monitor.queue.clear();
    this.monitor.qrSlot.clear();
  }

  /**
   * Stop the bridge on SIGINT/SIGTERM (then exit) and signal it on plain
   * process exit. Returns a function that removes the hooks.
   */
  installShutdownHooks(): () => void {
    const onSignal = (signal: NodeJS.Signals) => {
      log.info({ signal }, 'Received shutdown signal, stopping bridge');
      void this.shutdown().then(() => process.exit(0));
    };
    const onExit = () => {
      this.supervisor.terminateNow();
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
    process.on('exit', onExit);

    return () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      process.off('exit', onExit);
    };
  }
}

let defaultRuntime: BridgeRuntime | null = null;

/**
 * Process-wide runtime built from the environment, created on first use.
 * Its shutdown hooks are installed at creation, so a bridge it spawns is
 * stopped when the host exits.
 */
export function getBridgeRuntime(): BridgeRuntime {
  if (!defaultRuntime) {
    defaultRuntime = new BridgeRuntime();
    defaultRuntime.installShutdownHooks();
  }
  return defaultRuntime;
}
