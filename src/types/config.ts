/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Suffix appended to the library path to name its read-only snapshot.
 */
export const SNAPSHOT_SUFFIX = '.backup';

/**
 * Service configuration merged from CLI flags, env vars, and config file.
 */
export interface EndnoteMcpConfig {
    /** Path to the EndNote .enl library (an SQLite file) */
    enlFile?: string;

    /** Path to the library's .Data folder; derived from enlFile when absent */
    dataFolder?: string;

    /** Read from `<enlFile>.backup` instead of the live library */
    useBackup: boolean;

    /** Verbose diagnostics (connections, SQL, tool calls) */
    enableLog: boolean;

    // Logging
    logLevel?: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: EndnoteMcpConfig = {
    useBackup: false,
    enableLog: false,
    jsonLogs: false,
};

/**
 * Immutable configuration handed to every component at construction.
 */
export interface StoreConfig {
    /** The original library file owned by the desktop application */
    readonly storePath: string;

    /** Base folder; documents live under `<documentRoot>/PDF/` */
    readonly documentRoot: string;

    readonly snapshotMode: boolean;
    readonly verbose: boolean;

    /** Where the snapshot copy lives, beside the original */
    readonly snapshotPath: string;

    /** The file every query opens: the snapshot in snapshot mode, else the original */
    readonly activeStorePath: string;
}
