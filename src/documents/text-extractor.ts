import { readFile } from 'node:fs/promises';
import { extractText } from 'unpdf';
import { err, formatError, ok, type ExtractionError, type Result } from '../types/index.js';
import { getLogger, type Logger } from '../utils/logger.js';

/**
 * Parses a PDF and returns the text of each page, in page order.
 */
export type PdfPageReader = (data: Uint8Array) => Promise<string[]>;

export const readPdfPages: PdfPageReader = async (data) => {
    const { text } = await extractText(data, { mergePages: false });
    return text;
};

function isFileNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Extracts the full text of an attached document.
 *
 * Pages are concatenated with no separator. The result is either the whole text
 * or a single error whose `message` is suitable to show in place of the text.
 */
export class TextExtractor {
    private readonly logger: Logger;
    private readonly readPages: PdfPageReader;

    constructor(options: { logger?: Logger; readPages?: PdfPageReader } = {}) {
        this.logger = options.logger ?? getLogger();
        this.readPages = options.readPages ?? readPdfPages;
    }

    async extract(filePath: string): Promise<Result<string, ExtractionError>> {
        let data: Buffer;
        try {
            data = await readFile(filePath);
        } catch (error) {
            if (isFileNotFound(error)) {
                this.logger.debug({ path: filePath }, 'PDF file not found');
                return err({ kind: 'not_found', path: filePath, message: `Error: File not found at ${filePath}.` });
            }
            return this.parseFailure(filePath, error);
        }

        try {
            const pages = await this.readPages(new Uint8Array(data));
            return ok(pages.map((page) => page || '').join(''));
        } catch (error) {
            return this.parseFailure(filePath, error);
        }
    }

    private parseFailure(filePath: string, error: unknown): Result<string, ExtractionError> {
        this.logger.debug({ path: filePath, error }, 'PDF parsing exception');
        return err({ kind: 'parse', path: filePath, message: `Error parsing PDF: ${formatError(error)}` });
    }
}
