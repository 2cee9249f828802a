/**
 * Reference: one bibliographic entry of the library, as read from the `refs` table
 * joined with its first `file_res` attachment.
 */
export interface Reference {
    /** Primary key of `refs` */
    id: number;

    title: string | null;
    author: string | null;

    /** Kept as text: libraries hold values like "2021a" or "in press" */
    year: string | null;

    /** From the `secondary_title` column */
    journal: string | null;

    abstract: string | null;

    /** Null when the library schema has no keywords column */
    keywords: string | null;

    /** Stored attachment path, e.g. "internal-pdf://1234/paper.pdf" */
    filepath: string | null;
}

/**
 * Plain record returned to callers of the list and search operations.
 */
export type ReferenceRecord = Reference;

/**
 * Record returned by readPaper: metadata plus the document text, or an error.
 */
export type ReadPaperResult = (ReferenceRecord & { text: string }) | { error: string };

export type RefreshStatus = 'success' | 'skipped' | 'error';

export interface RefreshBackupResult {
    status: RefreshStatus;
    message: string;
    /** Local time, `YYYY-MM-DD HH:mm:ss` */
    timestamp: string;
    filesize: number | null;
}

/**
 * The derived snapshot of the library after a successful copy.
 */
export interface SnapshotFile {
    sourcePath: string;
    snapshotPath: string;
    lastRefreshedAt: Date;
    sizeBytes: number;
}
