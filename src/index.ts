export { runSync, type SyncOptions, type SyncResult } from "./session-controller.js";
export {
  TransferPipeline,
  HASH_FAILED_REASON,
  type Outcome,
  type OutcomeKind,
  type TransferPipelineOptions,
} from "./transfer-pipeline.js";
export { DuplicateRegistry } from "./duplicate-registry.js";
export { destinationFor, duplicateCandidate, pickDuplicateName } from "./dest-path.js";
export {
  CURATED_HASH_ALGOS,
  defaultHashAlg,
  hashLocal,
  hashRemote,
  normalizeHashAlg,
  type HashAlg,
} from "./hash.js";
export {
  shellEscape,
  mkdirCommand,
  dirExistsCommand,
  fileExistsCommand,
  findMediaCommand,
  hashCommand,
  expandRemoteHome,
  type RemoteTransport,
  type RunResult,
} from "./remote.js";
export { LocalTransport } from "./local-transport.js";
export { SshTransport, type SshTransportOptions } from "./ssh-transport.js";
export {
  SqliteSessionStore,
  SESSION_STATUSES,
  type SessionStore,
  type SessionStatus,
  type SessionCounters,
  type SyncSessionRow,
  type TransferInput,
  type TransferRow,
  type SessionDetail,
} from "./session-store.js";
export { getDb, type Database } from "./db.js";
export {
  SyncReport,
  renderReport,
  formatSize,
  formatDuration,
} from "./report.js";
export {
  RemoteHousekeeping,
  housekeepingSteps,
  type PostProcessHook,
  type PostProcessResult,
  type HousekeepingOptions,
} from "./post-process.js";
export { preflight, type PreflightCheck, type PreflightResult } from "./preflight.js";
export { scanDestination } from "./scan-remote.js";
export { listLocalMediaFiles, normalizeExtensions } from "./scan-local.js";
export {
  parseEndpoint,
  formatEndpoint,
  resolveSyncConfig,
  getMediaSyncHome,
  defaultDbPath,
  ConfigError,
  type Endpoint,
  type SyncConfig,
} from "./config.js";
export {
  MediaSyncError,
  TransportConnectError,
  HashError,
  CopyError,
  RemoteCommandError,
  InterruptSignal,
} from "./errors.js";
export {
  StructuredLogger,
  NullLogger,
  type Logger,
  type LogEntry,
  type LogLevel,
} from "./logger.js";
export { DeferredSessionSink, SessionLogStore, fetchSessionLogs } from "./session-logs.js";
