import { copyFile, stat, utimes } from 'node:fs/promises';
import {
    err,
    formatError,
    ok,
    type RefreshBackupResult,
    type Result,
    type SnapshotError,
    type SnapshotFile,
    type StoreConfig,
} from '../types/index.js';
import { getLogger, type Logger } from '../utils/logger.js';

/**
 * Local wall-clock time as `YYYY-MM-DD HH:mm:ss`.
 */
export function formatTimestamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return (
        `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    );
}

/**
 * Maintains `<library>.backup`, the copy queries read in snapshot mode so the
 * desktop application can keep its lock on the live file.
 *
 * A refresh is a plain whole-file overwrite. It is not isolated from the
 * application writing the source at the same moment, so a copy taken mid-write
 * can be torn; close EndNote before refreshing. There is no retry.
 */
export class SnapshotManager {
    private readonly logger: Logger;
    private readonly now: () => Date;

    constructor(
        private readonly config: StoreConfig,
        options: { logger?: Logger; now?: () => Date } = {}
    ) {
        this.logger = options.logger ?? getLogger();
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Startup refresh. A failure is returned and logged at debug, so it shows only
     * with verbose logging; queries keep pointing at the snapshot path, stale or missing.
     */
    async ensureFresh(): Promise<Result<SnapshotFile | null, SnapshotError>> {
        if (!this.config.snapshotMode) return ok(null);

        const result = await this.copy();
        if (result.ok) {
            this.logger.debug(
                { snapshotPath: result.value.snapshotPath, refreshedAt: formatTimestamp(result.value.lastRefreshedAt) },
                '.enl.backup refreshed'
            );
        } else {
            this.logger.debug({ error: result.error.message }, 'Failed to refresh .enl.backup');
        }
        return result;
    }

    /**
     * On-demand refresh, reported as a plain record.
     */
    async refresh(): Promise<RefreshBackupResult> {
        if (!this.config.snapshotMode) {
            return {
                status: 'skipped',
                message: 'Backup mode is not enabled. Cannot refresh .enl.backup. Please use the --use-backup option.',
                timestamp: formatTimestamp(this.now()),
                filesize: null,
            };
        }

        const result = await this.copy();
        if (!result.ok) {
            const message = `Failed to refresh .enl.backup: ${result.error.message}`;
            this.logger.debug({ source: result.error.source }, `refresh_backup: ${message}`);
            return { status: 'error', message, timestamp: formatTimestamp(this.now()), filesize: null };
        }

        const { sizeBytes, lastRefreshedAt } = result.value;
        const message = `.enl.backup refreshed successfully, size ${sizeBytes} bytes.`;
        this.logger.debug(`refresh_backup: ${message}`);
        return { status: 'success', message, timestamp: formatTimestamp(lastRefreshedAt), filesize: sizeBytes };
    }

    /**
     * Copy the library over the snapshot, keeping the source's timestamps.
     */
    private async copy(): Promise<Result<SnapshotFile, SnapshotError>> {
        const source = this.config.storePath;
        const target = this.config.snapshotPath;

        try {
            await copyFile(source, target);
            const sourceStat = await stat(source);
            await utimes(target, sourceStat.atime, sourceStat.mtime);
            const targetStat = await stat(target);

            return ok({
                sourcePath: source,
                snapshotPath: target,
                lastRefreshedAt: this.now(),
                sizeBytes: targetStat.size,
            });
        } catch (error) {
            return err({ kind: 'copy', source, target, message: formatError(error) });
        }
    }
}
