import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SearchService } from '../services/search-engine.js';

export function registerListEnginesTool(server: McpServer, searchService: SearchService): void {
  server.tool(
    'list_engines',
    'List the search engines web_search accepts.',
    {},
    async () => ({
      content: [{ type: 'text' as const, text: JSON.stringify({ engines: searchService.listEngines() }, null, 2) }],
    }),
  );
}
