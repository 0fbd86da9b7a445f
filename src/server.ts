import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { BrowserService, type SessionFactory } from './services/browser.js';
import { SessionPool } from './services/session-pool.js';
import { createDefaultRegistry, type EngineRegistry } from './services/engine-registry.js';
import { SearchService } from './services/search-engine.js';
import { registerWebSearchTool } from './tools/web-search.js';
import { registerListEnginesTool } from './tools/list-engines.js';
import type { ApiDeps } from './http/api.js';
import type { AppConfig } from './config.js';
import { createLogger } from './logger.js';

const log = createLogger('server');

export interface Services {
  pool: SessionPool;
  registry: EngineRegistry;
  searchService: SearchService;
}

/** Wires the search core. The pool still has to be started by the caller. */
export function createServices(config: Readonly<AppConfig>, factory?: SessionFactory): Services {
  const sessionFactory =
    factory ??
    new BrowserService({
      headless: config.browser.headless,
      channel: config.browser.channel,
      userAgent: config.browser.userAgent,
    });
  const pool = new SessionPool(sessionFactory, { size: config.pool.size });
  const registry = createDefaultRegistry({ navigationTimeoutMs: config.navigationTimeoutMs });
  const searchService = new SearchService(registry, pool, { acquireTimeoutMs: config.pool.acquireTimeoutMs });

  log.info('Search services created', {
    engines: registry.list(),
    poolSize: config.pool.size,
    acquireTimeoutMs: config.pool.acquireTimeoutMs,
    navigationTimeoutMs: config.navigationTimeoutMs,
  });
  return { pool, registry, searchService };
}

export function createApiDeps(config: Readonly<AppConfig>, services: Services): ApiDeps {
  return {
    searchService: services.searchService,
    poolStats: () => services.pool.stats(),
    apiPrefix: config.apiPrefix,
    maxPage: config.maxPage,
    apiKey: config.apiKey,
    enableDocs: config.enableDocs,
  };
}

export function createMcpServer(config: Readonly<AppConfig>, services: Services): McpServer {
  const server = new McpServer({
    name: 'browser-search-api',
    version: '1.0.0',
  });

  registerListEnginesTool(server, services.searchService);
  registerWebSearchTool(server, services.searchService, config.maxPage);

  return server;
}
