import { describe, it, expect } from 'vitest';
import { buildOpenApiDocument } from './openapi.js';

describe('buildOpenApiDocument', () => {
  it('places the routes under the configured prefix', () => {
    const doc = buildOpenApiDocument({ apiPrefix: '', maxPage: 3, engines: ['bing'], authEnabled: false });

    const paths = doc.paths;
    if (typeof paths !== 'object' || paths === null) throw new Error('expected a paths object');
    expect(Object.keys(paths)).toEqual(['/v1/engines', '/v1/search', '/health']);
    expect(doc).toHaveProperty(['components', 'schemas', 'SearchRequest', 'properties', 'page', 'maximum'], 3);
  });

  it('declares bearer auth only when a key is configured', () => {
    const open = buildOpenApiDocument({ apiPrefix: '/api', maxPage: 10, engines: [], authEnabled: false });
    const locked = buildOpenApiDocument({ apiPrefix: '/api', maxPage: 10, engines: [], authEnabled: true });

    expect(open).not.toHaveProperty('security');
    expect(open).not.toHaveProperty(['paths', '/api/v1/search', 'post', 'responses', '401']);
    expect(locked).toHaveProperty('security', [{ bearerAuth: [] }]);
    expect(locked).toHaveProperty(['components', 'securitySchemes', 'bearerAuth'], { type: 'http', scheme: 'bearer' });
    expect(locked).toHaveProperty(['paths', '/api/v1/search', 'post', 'responses', '401', 'description'], 'Missing or wrong bearer token');
  });
});
