/**
 * Library entry point: build a QueryFacade for an EndNote library and,
 * optionally, expose it as an MCP server.
 */
export { createQueryFacade, QueryFacade } from './facade/query-facade.js';
export type { QueryFacadeDeps } from './facade/query-facade.js';
export { ReferenceRepository, sanitizePage } from './storage/reference-repository.js';
export { SnapshotManager } from './storage/snapshot.js';
export { TextExtractor, readPdfPages } from './documents/text-extractor.js';
export type { PdfPageReader } from './documents/text-extractor.js';
export { resolveDocumentPath } from './documents/resolver.js';
export { createMcpServer, startStdioServer } from './mcp/server.js';
export { resolveConfig, createStoreConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export * from './types/index.js';
