// Bridge lifecycle
export { BridgeRuntime, getBridgeRuntime, type BridgeRuntimeOptions } from './bridge/runtime.js';
export { BridgeSupervisor, type BridgeSupervisorOptions, type ProcessListFn, type SpawnFn } from './bridge/supervisor.js';
export { OutputMonitor, QrCodeSlot, isQrRow } from './bridge/output-monitor.js';
export { BoundedQueue } from './bridge/bounded-queue.js';
export { BridgeClient, type BridgeAuthStatus, type BridgeClientOptions } from './bridge/client.js';
export { convertToOpusOggTemp } from './bridge/audio.js';
export {
  ReadinessOrchestrator,
  type BridgeStatus,
  type ReadinessDeps,
  type ReadinessResult,
} from './bridge/readiness.js';

// Storage
export { createDatabaseAdapter } from './utils/db.js';
export { withUnitOfWork } from './utils/unit-of-work.js';
export { expandWithContext } from './utils/message-context.js';
export { SqliteDatabaseAdapter } from './utils/db-sqlite.js';
export {
  PostgresDatabaseAdapter,
  createPostgresAdapter,
  toPositional,
  type ClientSource,
  type Queryable,
  type TransactionClient,
} from './utils/db-postgres.js';
export { SupabaseDatabaseAdapter, createSupabaseAdapter } from './utils/db-supabase.js';
export type {
  AuthenticationRepository,
  ChatRepository,
  ContactRepository,
  DatabaseAdapter,
  DatabaseKind,
  MessageRepository,
  UnitOfWork,
} from './utils/db-backend.js';
export {
  isGroupChat,
  type AuthenticationStatus,
  type Chat,
  type ChatSortOrder,
  type Contact,
  type ListChatsOptions,
  type ListMessagesOptions,
  type Message,
  type MessageContext,
} from './utils/db-types.js';

// Config, errors, helpers
export { config, parseEnv, resolveDatabaseConfig, type DatabaseConfig, type EnvConfig } from './utils/config.js';
export {
  BackendDegradedError,
  BridgeCoreError,
  FormatError,
  NotFoundError,
  ProcessLifecycleError,
  TransientNetworkError,
  type BridgeCoreErrorCode,
} from './utils/errors.js';
export { formatMessage, formatMessagesList, formatTimestamp, type Result } from './utils/formatting.js';
export { isGroupJid, phoneFromJid } from './utils/jid.js';
export { logger } from './middleware/logger.js';
