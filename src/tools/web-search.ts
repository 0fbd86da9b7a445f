import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { SearchService } from '../services/search-engine.js';
import { toResponseBody } from '../types/search.js';
import { isSearchError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('tool:web_search');

export function registerWebSearchTool(server: McpServer, searchService: SearchService, maxPage: number): void {
  server.tool(
    'web_search',
    'Search the web through a headless browser. Returns titles, links and snippets as JSON. Use list_engines for valid engine names.',
    {
      engine: z.string().describe(`Engine name, one of: ${searchService.listEngines().join(', ')}`),
      query: z.string().min(1).describe('Search query'),
      page: z.number().int().min(1).max(maxPage).optional().default(1).describe('Results page, starting at 1'),
    },
    async ({ engine, query, page }, extra) => {
      try {
        const response = await searchService.search(engine, query, page, { signal: extra.signal });
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(toResponseBody(response), null, 2) }],
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        const kind = isSearchError(error) ? error.kind : 'InternalError';
        log.error('web_search failed', { engine, query, page, kind, error: message });
        return {
          content: [{ type: 'text' as const, text: `${kind}: ${message}` }],
          isError: true,
        };
      }
    },
  );
}
