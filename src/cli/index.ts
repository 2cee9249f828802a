#!/usr/bin/env node
import { Command } from 'commander';
import { resolveConfig, createStoreConfig, logLevelFor } from '../utils/config.js';
import { initLogger, getLogger, createBootstrapLogger } from '../utils/logger.js';
import { createQueryFacade, type QueryFacade } from '../facade/query-facade.js';
import { SnapshotManager } from '../storage/snapshot.js';
import { createMcpServer, startStdioServer, REGISTERED_TOOLS } from '../mcp/server.js';
import type { EndnoteMcpConfig, LogLevel, StoreConfig } from '../types/index.js';

const NAME = 'endnote-mcp';
const VERSION = '0.1.0';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

interface StoreFlags {
    enlFile?: string;
    dataFolder?: string;
    useBackup?: boolean;
    enableLog?: boolean;
    logLevel?: string;
    jsonLogs?: boolean;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (value === undefined) return undefined;
    const level = LOG_LEVELS.find((l) => l === value.toLowerCase());
    if (!level) {
        console.error(`Invalid log level: ${value}. Valid: ${LOG_LEVELS.join(', ')}`);
        process.exit(1);
    }
    return level;
}

function withStoreOptions(command: Command): Command {
    return command
        .option('-e, --enl-file <path>', 'Path to the EndNote .enl file')
        .option('-d, --data-folder <path>', 'Path to the EndNote .Data folder (default: beside the .enl file)')
        .option('-b, --use-backup', 'Use the .enl.backup snapshot for all database reads')
        .option('-l, --enable-log', 'Enable detailed log output')
        .option('--log-level <level>', 'Log level: debug | info | warn | error')
        .option('--json-logs', 'Output JSON logs');
}

/**
 * Resolve configuration, set up logging and refresh the snapshot when enabled.
 */
async function bootstrap(
    flags: StoreFlags,
    options: { refreshSnapshot?: boolean } = {}
): Promise<{ config: StoreConfig; facade: QueryFacade }> {
    const cliConfig: Partial<EndnoteMcpConfig> = {
        enlFile: flags.enlFile,
        dataFolder: flags.dataFolder,
        useBackup: flags.useBackup,
        enableLog: flags.enableLog,
        logLevel: parseLogLevel(flags.logLevel),
        jsonLogs: flags.jsonLogs,
    };

    const bootstrapLogger = createBootstrapLogger();
    const resolved = await resolveConfig(cliConfig, { logger: bootstrapLogger });

    let config: StoreConfig;
    try {
        config = createStoreConfig(resolved);
    } catch (error) {
        bootstrapLogger.error({ error }, 'Invalid configuration');
        process.exit(1);
    }

    initLogger({ level: logLevelFor(config, resolved.logLevel), jsonLogs: resolved.jsonLogs });
    const logger = getLogger();

    logger.debug(
        {
            storePath: config.storePath,
            activeStorePath: config.activeStorePath,
            documentRoot: config.documentRoot,
            snapshotMode: config.snapshotMode,
            verbose: config.verbose,
        },
        'Configuration resolved'
    );

    if (options.refreshSnapshot ?? true) {
        await new SnapshotManager(config, { logger }).ensureFresh();
    }

    return { config, facade: createQueryFacade(config, { logger }) };
}

function printJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}

const program = new Command();

program
    .name(NAME)
    .description('Read-only MCP access to an EndNote reference library: list, search and read papers.')
    .version(VERSION);

// ─── SERVE command ────────────────────────────────────────

withStoreOptions(
    program
        .command('serve', { isDefault: true })
        .description('Start the MCP server on stdio')
).action(async (opts: StoreFlags) => {
    const { config, facade } = await bootstrap(opts);
    const logger = getLogger();

    logger.info({ enlFile: config.activeStorePath, dataFolder: config.documentRoot }, 'EndNote MCP Server is starting...');
    logger.info({ tools: REGISTERED_TOOLS }, 'Registered tools');

    try {
        await startStdioServer(createMcpServer(facade, { name: NAME, version: VERSION }));
    } catch (error) {
        logger.error({ error }, 'Server failed to start');
        process.exit(1);
    }
});

// ─── LIST command ─────────────────────────────────────────

withStoreOptions(
    program
        .command('list')
        .description('List a page of references, newest first')
        .option('--offset <n>', 'Index of the first reference', '0')
        .option('--limit <n>', 'References per page', '10')
).action(async (opts: StoreFlags & { offset: string; limit: string }) => {
    const { facade } = await bootstrap(opts);
    printJson(facade.listPapers(Number(opts.offset), Number(opts.limit)));
});

// ─── SEARCH command ───────────────────────────────────────

withStoreOptions(
    program
        .command('search')
        .description('Search references by title substring')
        .argument('<query>', 'Title keyword(s)')
).action(async (query: string, opts: StoreFlags) => {
    const { facade } = await bootstrap(opts);
    printJson(facade.searchPapers(query));
});

// ─── READ command ─────────────────────────────────────────

withStoreOptions(
    program
        .command('read')
        .description('Print metadata and full PDF text of the first matching reference')
        .argument('<title>', 'Title keyword(s)')
).action(async (title: string, opts: StoreFlags) => {
    const { facade } = await bootstrap(opts);
    printJson(await facade.readPaper(title));
});

// ─── REFRESH-BACKUP command ───────────────────────────────

withStoreOptions(
    program
        .command('refresh-backup')
        .description('Copy the .enl file over its .enl.backup snapshot (close EndNote first)')
).action(async (opts: StoreFlags) => {
    const { facade } = await bootstrap(opts, { refreshSnapshot: false });
    const result = await facade.refreshBackup();
    printJson(result);
    if (result.status === 'error') process.exitCode = 1;
});

await program.parseAsync();
