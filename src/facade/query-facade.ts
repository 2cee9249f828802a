import { resolveDocumentPath } from '../documents/resolver.js';
import { TextExtractor, type PdfPageReader } from '../documents/text-extractor.js';
import { DEFAULT_LIMIT, DEFAULT_OFFSET, ReferenceRepository } from '../storage/reference-repository.js';
import { SnapshotManager } from '../storage/snapshot.js';
import type {
    ReadPaperResult,
    Reference,
    ReferenceRecord,
    RefreshBackupResult,
    Result,
    StoreConfig,
    StoreError,
} from '../types/index.js';
import { getLogger, type Logger } from '../utils/logger.js';

function toRecord(reference: Reference): ReferenceRecord {
    return {
        id: reference.id,
        title: reference.title,
        author: reference.author,
        year: reference.year,
        journal: reference.journal,
        abstract: reference.abstract,
        keywords: reference.keywords,
        filepath: reference.filepath,
    };
}

export interface QueryFacadeDeps {
    repository: ReferenceRepository;
    extractor: TextExtractor;
    snapshots: SnapshotManager;
    logger?: Logger;
}

/**
 * The operations offered to callers. Every call resolves to a well-formed
 * record; store, document and snapshot failures are folded into the result.
 */
export class QueryFacade {
    private readonly repository: ReferenceRepository;
    private readonly extractor: TextExtractor;
    private readonly snapshots: SnapshotManager;
    private readonly logger: Logger;

    constructor(
        private readonly config: StoreConfig,
        deps: QueryFacadeDeps
    ) {
        this.repository = deps.repository;
        this.extractor = deps.extractor;
        this.snapshots = deps.snapshots;
        this.logger = deps.logger ?? getLogger();
    }

    listPapers(offset: number = DEFAULT_OFFSET, limit: number = DEFAULT_LIMIT): ReferenceRecord[] {
        this.logger.debug(`[tool] list_papers(offset=${offset}, limit=${limit}) called`);
        return this.records(this.repository.listPage(offset, limit), 'list_papers');
    }

    searchPapers(query: string): ReferenceRecord[] {
        this.logger.debug(`[tool] search_papers(query=${query}) called`);
        return this.records(this.repository.searchByTitle(query), 'search_papers');
    }

    async readPaper(title: string): Promise<ReadPaperResult> {
        this.logger.debug(`[tool] read_paper(title=${title}) called`);

        const found = this.repository.findFirstByTitle(title);
        if (!found.ok) {
            this.logger.warn({ error: found.error }, 'read_paper failed');
            return {
                error: found.error.kind === 'connection' ? 'Database connection failed.' : `Exception: ${found.error.message}`,
            };
        }

        const reference = found.value;
        if (!reference || !reference.filepath) {
            return { error: `No paper found with title containing '${title}' or no PDF attached.` };
        }

        const fullPath = resolveDocumentPath(this.config.documentRoot, reference.filepath);
        this.logger.debug({ path: fullPath }, 'PDF path resolved');

        const extracted = await this.extractor.extract(fullPath);
        const text = extracted.ok ? extracted.value : extracted.error.message;

        return { ...toRecord(reference), text };
    }

    refreshBackup(): Promise<RefreshBackupResult> {
        this.logger.debug('[tool] refresh_backup() called');
        return this.snapshots.refresh();
    }

    private records(result: Result<Reference[], StoreError>, operation: string): ReferenceRecord[] {
        if (!result.ok) {
            this.logger.warn({ error: result.error }, `${operation} failed`);
            return [];
        }
        return result.value.map(toRecord);
    }
}

/**
 * Wire the repository, extractor and snapshot manager for one StoreConfig.
 */
export function createQueryFacade(
    config: StoreConfig,
    options: { logger?: Logger; readPages?: PdfPageReader; now?: () => Date } = {}
): QueryFacade {
    const logger = options.logger ?? getLogger();
    return new QueryFacade(config, {
        repository: new ReferenceRepository(config, { logger }),
        extractor: new TextExtractor({ logger, readPages: options.readPages }),
        snapshots: new SnapshotManager(config, { logger, now: options.now }),
        logger,
    });
}
