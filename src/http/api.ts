import { createHash, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import type { SearchService } from '../services/search-engine.js';
import type { PoolStats } from '../services/session-pool.js';
import { toResponseBody } from '../types/search.js';
import { buildOpenApiDocument, renderDocsPage } from './openapi.js';
import { UnknownEngineError, isSearchError, type SearchErrorKind } from '../errors.js';
import { createLogger, errorMessage } from '../logger.js';

const log = createLogger('http');

export interface ApiRequest {
  method: string;
  /** Request target as received, query string included. */
  url: string;
  authorization?: string;
  body?: string;
  signal?: AbortSignal;
}

export interface ApiResponse {
  status: number;
  headers?: Record<string, string>;
  body?: unknown;
  /** Set for bodies written as-is; everything else is sent as JSON. */
  contentType?: string;
}

export interface ApiDeps {
  searchService: SearchService;
  poolStats: () => PoolStats;
  apiPrefix: string;
  maxPage: number;
  apiKey?: string;
  /** Serves `/openapi.json` and `/docs`. */
  enableDocs?: boolean;
  now?: () => number;
}

const STATUS_BY_KIND: Record<SearchErrorKind, number> = {
  InvalidInput: 400,
  UnknownEngine: 404,
  PoolExhausted: 503,
  PoolClosed: 503,
  NavigationTimeout: 504,
  ExtractionFailed: 502,
  Cancelled: 499,
};

const HEALTH_PATH = '/health';
const OPENAPI_PATH = '/openapi.json';
const DOCS_PATH = '/docs';

function searchRequestSchema(maxPage: number) {
  return z.object({
    engine: z.string().min(1),
    query: z.string().min(1),
    page: z.number().int().min(1).max(maxPage).default(1),
  });
}

function json(status: number, body: unknown, headers?: Record<string, string>): ApiResponse {
  return { status, body, headers };
}

function notFound(): ApiResponse {
  return json(404, { error: 'NotFound', message: 'Route not found' });
}

function invalidInput(message: string): ApiResponse {
  return json(400, { error: 'InvalidInput', message });
}

/** Maps a failure to a status code and a body that never carries internals. */
export function errorResponse(error: unknown): ApiResponse {
  if (isSearchError(error)) {
    const body: Record<string, unknown> = { error: error.kind, message: error.message };
    if (error instanceof UnknownEngineError) {
      body.engine = error.engine;
    }
    const headers = error.kind === 'PoolExhausted' ? { 'Retry-After': '1' } : undefined;
    return json(STATUS_BY_KIND[error.kind], body, headers);
  }
  log.error('Unhandled error', { error: errorMessage(error), stack: error instanceof Error ? error.stack : undefined });
  return json(500, { error: 'InternalError', message: 'Internal server error' });
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/** Returns the rejection reason, or null when the bearer token matches. */
export function checkBearer(header: string | undefined, apiKey: string): string | null {
  if (!header) return 'Missing Authorization header';
  // Only the first run of whitespace separates scheme and token; the token may contain spaces.
  const match = /^(\S+)\s+(.+)$/.exec(header.trim());
  if (!match || match[1].toLowerCase() !== 'bearer') {
    return 'Invalid Authorization header';
  }
  if (!timingSafeEqual(digest(match[2]), digest(apiKey))) {
    return 'Invalid API key';
  }
  return null;
}

export async function handleApiRequest(request: ApiRequest, deps: ApiDeps): Promise<ApiResponse> {
  const path = new URL(request.url, 'http://localhost').pathname;
  const method = request.method.toUpperCase();
  const enginesPath = `${deps.apiPrefix}/v1/engines`;
  const searchPath = `${deps.apiPrefix}/v1/search`;

  if (path === HEALTH_PATH) {
    if (method !== 'GET') return json(405, { error: 'MethodNotAllowed', message: 'Use GET' }, { Allow: 'GET' });
    const now = deps.now ?? Date.now;
    return json(200, { status: 'healthy', timestamp: Math.floor(now() / 1000), pool: deps.poolStats() });
  }

  if (path === OPENAPI_PATH || path === DOCS_PATH) {
    if (!deps.enableDocs) return notFound();
    if (method !== 'GET') return json(405, { error: 'MethodNotAllowed', message: 'Use GET' }, { Allow: 'GET' });
    if (path === DOCS_PATH) {
      return { status: 200, contentType: 'text/html; charset=utf-8', body: renderDocsPage(OPENAPI_PATH) };
    }
    return json(
      200,
      buildOpenApiDocument({
        apiPrefix: deps.apiPrefix,
        maxPage: deps.maxPage,
        engines: deps.searchService.listEngines(),
        authEnabled: Boolean(deps.apiKey),
      }),
    );
  }

  if (method === 'OPTIONS') {
    const allow = path === enginesPath ? 'GET, OPTIONS' : path === searchPath ? 'POST, OPTIONS' : undefined;
    return allow ? { status: 204, headers: { Allow: allow } } : notFound();
  }

  if (deps.apiKey) {
    const reason = checkBearer(request.authorization, deps.apiKey);
    if (reason) {
      log.warn('Rejected request', { method, path, reason });
      return json(401, { detail: reason });
    }
  }

  if (path === enginesPath) {
    if (method !== 'GET') return json(405, { error: 'MethodNotAllowed', message: 'Use GET' }, { Allow: 'GET' });
    return json(200, { engines: deps.searchService.listEngines() });
  }

  if (path === searchPath) {
    if (method !== 'POST') return json(405, { error: 'MethodNotAllowed', message: 'Use POST' }, { Allow: 'POST' });
    return handleSearch(request, deps);
  }

  return notFound();
}

async function handleSearch(request: ApiRequest, deps: ApiDeps): Promise<ApiResponse> {
  if (!request.body) {
    return invalidInput('Request body is required');
  }

  let payload: unknown;
  try {
    payload = JSON.parse(request.body);
  } catch {
    return invalidInput('Request body is not valid JSON');
  }

  const parsed = searchRequestSchema(deps.maxPage).safeParse(payload);
  if (!parsed.success) {
    return invalidInput(parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '));
  }

  const { engine, query, page } = parsed.data;
  try {
    const response = await deps.searchService.search(engine, query, page, { signal: request.signal });
    return json(200, toResponseBody(response));
  } catch (error) {
    return errorResponse(error);
  }
}
