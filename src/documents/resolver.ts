import path from 'node:path';

/** Matches link markers such as `internal-pdf://` */
const SCHEME_PREFIX = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Turn a stored attachment path into an absolute path under `<documentRoot>/PDF/`.
 * Pure path arithmetic: the file may not exist.
 */
export function resolveDocumentPath(documentRoot: string, storedPath: string): string {
    const relative = storedPath.trim().replace(SCHEME_PREFIX, '').trim();
    return path.join(documentRoot, 'PDF', relative);
}
