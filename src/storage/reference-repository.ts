import Database from 'better-sqlite3';
import { z } from 'zod';
import {
    err,
    formatError,
    ok,
    type Reference,
    type Result,
    type StoreConfig,
    type StoreError,
} from '../types/index.js';
import { getLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_OFFSET = 0;
export const DEFAULT_LIMIT = 10;

/**
 * One row per reference: the join picks the first attachment (lowest rowid) so a
 * reference with several files still appears once.
 */
function selectReferences(keywordsColumn: string): string {
    return `
      SELECT r.id, r.title, r.author, r.year, r.secondary_title, r.abstract,
             ${keywordsColumn} AS keywords, f.file_path AS filepath
      FROM refs r
      LEFT JOIN file_res f
        ON f.rowid = (SELECT MIN(fr.rowid) FROM file_res fr WHERE fr.refs_id = r.id)`;
}

const textColumn = z.string().nullable();

/**
 * Row shape produced by `selectReferences`. `year` may come back numeric from
 * libraries that declared the column as INTEGER.
 */
const referenceRowSchema = z.object({
    id: z.number().int(),
    title: textColumn,
    author: textColumn,
    year: z.union([z.string(), z.number()]).nullable(),
    secondary_title: textColumn,
    abstract: textColumn,
    keywords: textColumn.optional(),
    filepath: textColumn,
});

type ReferenceRow = z.infer<typeof referenceRowSchema>;

function toReference(row: ReferenceRow): Reference {
    return {
        id: row.id,
        title: row.title,
        author: row.author,
        year: row.year === null ? null : String(row.year),
        journal: row.secondary_title,
        abstract: row.abstract,
        keywords: row.keywords ?? null,
        filepath: row.filepath,
    };
}

function readRows(rows: unknown[]): Reference[] {
    return rows.map((row) => toReference(referenceRowSchema.parse(row)));
}

/**
 * Coerce pagination input: a negative or non-integer offset becomes 0,
 * a non-positive or non-integer limit becomes 10.
 */
export function sanitizePage(offset: number, limit: number): { offset: number; limit: number } {
    return {
        offset: Number.isInteger(offset) && offset >= 0 ? offset : DEFAULT_OFFSET,
        limit: Number.isInteger(limit) && limit > 0 ? limit : DEFAULT_LIMIT,
    };
}

/**
 * Escape LIKE wildcards so the pattern is a literal substring test.
 */
export function escapeLike(value: string): string {
    return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Read-only access to the `refs` / `file_res` tables of an EndNote library.
 *
 * Every operation opens its own connection to `config.activeStorePath` and closes
 * it before returning, whatever the outcome. Failures come back as a `StoreError`.
 */
export class ReferenceRepository {
    private readonly logger: Logger;

    constructor(
        private readonly config: StoreConfig,
        options: { logger?: Logger } = {}
    ) {
        this.logger = options.logger ?? getLogger();
    }

    /**
     * A page of references, most recently added first.
     */
    listPage(offset: number, limit: number): Result<Reference[], StoreError> {
        const page = sanitizePage(offset, limit);

        return this.withConnection('listPage', (db) => {
            const sql = `${selectReferences(this.keywordsColumn(db))}
      ORDER BY r.id DESC LIMIT ? OFFSET ?`;
            this.logger.debug({ sql: sql.trim(), limit: page.limit, offset: page.offset }, 'Executing SQL');
            return readRows(db.prepare(sql).all(page.limit, page.offset));
        });
    }

    /**
     * References whose title contains `query`, newest year first.
     * ASCII letters match case-insensitively; other scripts match exactly.
     */
    searchByTitle(query: string): Result<Reference[], StoreError> {
        return this.withConnection('searchByTitle', (db) => {
            const sql = `${selectReferences(this.keywordsColumn(db))}
      WHERE r.title LIKE ? ESCAPE '\\'
      ORDER BY r.year DESC`;
            const pattern = `%${escapeLike(query)}%`;
            this.logger.debug({ sql: sql.trim(), pattern }, 'Executing SQL');
            return readRows(db.prepare(sql).all(pattern));
        });
    }

    /**
     * The first reference whose title contains `title`, or null when nothing
     * matches or that reference has no attached document.
     */
    findFirstByTitle(title: string): Result<Reference | null, StoreError> {
        return this.withConnection('findFirstByTitle', (db) => {
            const sql = `${selectReferences(this.keywordsColumn(db))}
      WHERE r.title LIKE ? ESCAPE '\\'
      LIMIT 1`;
            const pattern = `%${escapeLike(title)}%`;
            this.logger.debug({ sql: sql.trim(), pattern }, 'Executing SQL');

            const row: unknown = db.prepare(sql).get(pattern);
            if (row === undefined) {
                this.logger.debug({ title }, 'No matching paper found');
                return null;
            }

            const reference = toReference(referenceRowSchema.parse(row));
            if (!reference.filepath) {
                this.logger.debug({ title, id: reference.id }, 'Matching paper has no PDF attached');
                return null;
            }
            return reference;
        });
    }

    /**
     * Older library schemas have no `refs.keywords` column.
     */
    private keywordsColumn(db: Database.Database): string {
        const columns: unknown = db.pragma('table_info(refs)');
        const hasKeywords = Array.isArray(columns) && columns.some(
            (column: unknown) => typeof column === 'object' && column !== null && 'name' in column && column.name === 'keywords'
        );
        return hasKeywords ? 'r.keywords' : 'NULL';
    }

    private withConnection<T>(
        operation: string,
        run: (db: Database.Database) => T
    ): Result<T, StoreError> {
        const path = this.config.activeStorePath;
        this.logger.debug({ path }, 'Attempting to connect to database');

        let db: Database.Database;
        try {
            db = new Database(path, { readonly: true, fileMustExist: true });
        } catch (error) {
            this.logger.debug({ path, error }, 'Database connection error');
            return err({ kind: 'connection', path, message: formatError(error) });
        }
        this.logger.debug({ path }, 'Database connection successful');

        try {
            return ok(run(db));
        } catch (error) {
            this.logger.debug({ operation, error }, 'Query failed');
            return err({ kind: 'query', path, message: formatError(error) });
        } finally {
            db.close();
        }
    }
}
