import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'node:http';
import { closeServer, createHttpServer, listen, MAX_BODY_BYTES } from './server.js';
import { SessionPool } from '../services/session-pool.js';
import { SearchService } from '../services/search-engine.js';
import { createDefaultRegistry } from '../services/engine-registry.js';
import { FakeSessionFactory } from '../testing/fakes.js';

describe('HTTP server', () => {
  const pool = new SessionPool(new FakeSessionFactory(), { size: 1 });
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    await pool.start();
    server = createHttpServer({
      searchService: new SearchService(createDefaultRegistry(), pool, { acquireTimeoutMs: 50 }),
      poolStats: () => pool.stats(),
      apiPrefix: '/api',
      maxPage: 10,
      enableDocs: true,
    });
    await listen(server, '127.0.0.1', 0);
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await closeServer(server);
    await pool.shutdown(0);
  });

  it('serves JSON bodies', async () => {
    const response = await fetch(`${baseUrl}/api/v1/engines`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('application/json; charset=utf-8');
    expect(await response.json()).toEqual({ engines: ['duckduckgo', 'brave', 'yahoo', 'ask', 'bing'] });
  });

  it('writes headers without a body for OPTIONS', async () => {
    const response = await fetch(`${baseUrl}/api/v1/search`, { method: 'OPTIONS' });

    expect(response.status).toBe(204);
    expect(response.headers.get('allow')).toBe('POST, OPTIONS');
  });

  it('writes the docs page as HTML', async () => {
    const response = await fetch(`${baseUrl}/docs`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(await response.text()).toContain('data-url="/openapi.json"');
  });

  it('rejects bodies over the size limit', async () => {
    const response = await fetch(`${baseUrl}/api/v1/search`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ engine: 'duckduckgo', query: 'x'.repeat(MAX_BODY_BYTES) }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'InvalidInput',
      message: `Request body exceeds ${MAX_BODY_BYTES} bytes`,
    });
  });

  it('sets Retry-After when the pool is saturated', async () => {
    const held = await pool.acquire(100);
    try {
      const response = await fetch(`${baseUrl}/api/v1/search`, {
        method: 'POST',
        body: JSON.stringify({ engine: 'duckduckgo', query: 'busy' }),
      });

      expect(response.status).toBe(503);
      expect(response.headers.get('retry-after')).toBe('1');
    } finally {
      pool.release(held, true);
    }
  });
});
