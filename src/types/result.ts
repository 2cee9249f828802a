/**
 * Outcome of an internal operation that can fail without throwing.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

/**
 * Failure opening or querying the library database.
 */
export interface StoreError {
    kind: 'connection' | 'query';
    path: string;
    message: string;
}

/**
 * Failure turning a document into text. `message` is the user-facing text.
 */
export interface ExtractionError {
    kind: 'not_found' | 'parse';
    path: string;
    message: string;
}

export interface SnapshotError {
    kind: 'copy';
    source: string;
    target: string;
    message: string;
}

/**
 * Configuration that cannot be resolved into a usable StoreConfig.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function formatError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
