import path from 'node:path';
import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    ConfigError,
    DEFAULT_CONFIG,
    SNAPSHOT_SUFFIX,
    type EndnoteMcpConfig,
    type LogLevel,
    type StoreConfig,
} from '../types/index.js';
import { getLogger, type Logger } from './logger.js';

const MODULE_NAME = 'endnote-mcp';

const fileConfigSchema = z
    .object({
        enlFile: z.string().min(1),
        dataFolder: z.string().min(1),
        useBackup: z.boolean(),
        enableLog: z.boolean(),
        logLevel: z.enum(['error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

/**
 * Load configuration from endnote-mcp.config.json (or an rc file) using cosmiconfig.
 * Returns null if no config file is found, or if it does not validate.
 */
async function loadConfigFile(logger: Logger, searchFrom?: string): Promise<Partial<EndnoteMcpConfig> | null> {
    const explorer = cosmiconfig(MODULE_NAME, {
        searchPlaces: [
            'package.json',
            `${MODULE_NAME}.config.json`,
            `.${MODULE_NAME}rc`,
            `.${MODULE_NAME}rc.json`,
        ],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = fileConfigSchema.safeParse(result.config);
            if (!parsed.success) {
                logger.warn({ path: result.filepath, issues: parsed.error.issues }, 'Invalid config file, ignoring it');
                return null;
            }
            logger.debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        logger.warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

function envFlag(value: string | undefined): boolean | undefined {
    if (value === undefined || value === '') return undefined;
    return TRUTHY.has(value.trim().toLowerCase());
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<EndnoteMcpConfig> {
    const config: Partial<EndnoteMcpConfig> = {};

    const enlFile = env['ENDNOTE_ENL_FILE'];
    if (enlFile) config.enlFile = enlFile;

    const dataFolder = env['ENDNOTE_DATA_FOLDER'];
    if (dataFolder) config.dataFolder = dataFolder;

    const useBackup = envFlag(env['ENDNOTE_USE_BACKUP']);
    if (useBackup !== undefined) config.useBackup = useBackup;

    const enableLog = envFlag(env['ENDNOTE_ENABLE_LOG']);
    if (enableLog !== undefined) config.enableLog = enableLog;

    return config;
}

/**
 * Drop keys whose value is undefined so they do not shadow lower-precedence sources.
 */
function defined(config: Partial<EndnoteMcpConfig>): Partial<EndnoteMcpConfig> {
    const result: Partial<EndnoteMcpConfig> = {};
    if (config.enlFile !== undefined) result.enlFile = config.enlFile;
    if (config.dataFolder !== undefined) result.dataFolder = config.dataFolder;
    if (config.useBackup !== undefined) result.useBackup = config.useBackup;
    if (config.enableLog !== undefined) result.enableLog = config.enableLog;
    if (config.logLevel !== undefined) result.logLevel = config.logLevel;
    if (config.jsonLogs !== undefined) result.jsonLogs = config.jsonLogs;
    return result;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<EndnoteMcpConfig>,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string; logger?: Logger } = {}
): Promise<EndnoteMcpConfig> {
    const fileConfig = await loadConfigFile(options.logger ?? getLogger(), options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return {
        ...DEFAULT_CONFIG,
        ...(fileConfig ? defined(fileConfig) : {}),
        ...defined(envConfig),
        ...defined(cliFlags),
    };
}

/**
 * EndNote keeps attachments in `<name>.Data` beside `<name>.enl`.
 */
export function deriveDataFolder(enlFile: string): string {
    const parsed = path.parse(enlFile);
    return path.join(parsed.dir, `${parsed.name}.Data`);
}

/**
 * Build the immutable StoreConfig every component receives.
 */
export function createStoreConfig(config: EndnoteMcpConfig): StoreConfig {
    if (!config.enlFile) {
        throw new ConfigError('No EndNote library given: pass --enl-file or set ENDNOTE_ENL_FILE');
    }

    const storePath = config.enlFile;
    const snapshotPath = storePath + SNAPSHOT_SUFFIX;

    return Object.freeze({
        storePath,
        documentRoot: config.dataFolder ?? deriveDataFolder(storePath),
        snapshotMode: config.useBackup,
        verbose: config.enableLog,
        snapshotPath,
        activeStorePath: config.useBackup ? snapshotPath : storePath,
    });
}

/**
 * Verbose mode turns on debug lines; an explicit level wins over it.
 */
export function logLevelFor(config: StoreConfig, override?: LogLevel): LogLevel {
    return override ?? (config.verbose ? 'debug' : 'info');
}
