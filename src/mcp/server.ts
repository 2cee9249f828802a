import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import type { QueryFacade } from '../facade/query-facade.js';
import { getLogger } from '../utils/logger.js';

export interface McpServerInfo {
    name: string;
    version: string;
}

/** Signatures shown at startup */
export const REGISTERED_TOOLS = [
    'list_papers(offset: int = 0, limit: int = 10)',
    'search_papers(query: str)',
    'read_paper(title: str)',
    'refresh_backup()',
] as const;

const asText = (value: unknown) => ({
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
});

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createMcpServer(facade: QueryFacade, info: McpServerInfo): McpServer {
    const server = new McpServer({ name: info.name, version: info.version });

    server.registerTool(
        'list_papers',
        {
            title: 'List Papers',
            description:
                'Return references in the EndNote library with pagination. Use offset (int, default 0) and limit (int, default 10) to fetch a page of results. Returns a list of dicts with fields: id, title, author, year, journal, abstract, keywords, filepath. Typical: list_papers(offset=0, limit=10).',
            inputSchema: {
                offset: z.number().optional().describe('Index of the first reference (default 0, must be >= 0)'),
                limit: z.number().optional().describe('Number of references per page (default 10, must be > 0)'),
            },
        },
        async ({ offset, limit }) => asText(facade.listPapers(offset, limit))
    );

    server.registerTool(
        'search_papers',
        {
            title: 'Search Papers',
            description:
                "Fuzzy search references by title in the EndNote library. Use when the user only knows part of the title or keywords, or wants to find related topics. Parameter: query (string, case-insensitive, supports Chinese/English). Returns a list of dicts with fields: id, title, author, year, journal, abstract, keywords, filepath. Typical: search_papers('distillation').",
            inputSchema: {
                query: z.string().describe('Title keyword(s) to search for'),
            },
        },
        async ({ query }) => asText(facade.searchPapers(query))
    );

    server.registerTool(
        'read_paper',
        {
            title: 'Read Paper',
            description:
                "Find a paper by (fuzzy) title and return its metadata and PDF full text. Use when the user needs the full content and bibliographic info of a paper. Parameter: title (string, case-insensitive, fuzzy match). Returns a dict with fields: id, title, author, year, journal, abstract, keywords, filepath, text. Typical: read_paper('Knowledge Distillation Review').",
            inputSchema: {
                title: z.string().describe('Title keyword(s) of the paper to read'),
            },
        },
        async ({ title }) => asText(await facade.readPaper(title))
    );

    server.registerTool(
        'refresh_backup',
        {
            title: 'Refresh Backup',
            description:
                'Manually refresh the .enl.backup file (only available when backup mode is enabled). No effect if backup mode is off. You must close EndNote before refreshing, otherwise the operation will fail due to file locking.',
            inputSchema: {},
        },
        async () => asText(await facade.refreshBackup())
    );

    return server;
}

/**
 * Serve over stdin/stdout until the client disconnects.
 */
export async function startStdioServer(server: McpServer): Promise<void> {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    getLogger().info('Server is ready and waiting for client connections...');
}
