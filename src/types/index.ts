/**
 * Barrel export for all shared types.
 */
export type {
    Reference,
    ReferenceRecord,
    ReadPaperResult,
    RefreshStatus,
    RefreshBackupResult,
    SnapshotFile,
} from './reference.js';
export { DEFAULT_CONFIG, SNAPSHOT_SUFFIX } from './config.js';
export type { EndnoteMcpConfig, StoreConfig, LogLevel } from './config.js';
export { ok, err, ConfigError, formatError } from './result.js';
export type { Result, StoreError, ExtractionError, SnapshotError } from './result.js';
