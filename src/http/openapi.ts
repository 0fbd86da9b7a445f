export interface OpenApiOptions {
  apiPrefix: string;
  maxPage: number;
  engines: string[];
  authEnabled: boolean;
}

type Schema = Record<string, unknown>;

const ERROR_KINDS = [
  'InvalidInput',
  'UnknownEngine',
  'PoolExhausted',
  'PoolClosed',
  'NavigationTimeout',
  'ExtractionFailed',
  'Cancelled',
  'InternalError',
];

function jsonContent(schema: Schema): Schema {
  return { 'application/json': { schema } };
}

function errorReply(description: string): Schema {
  return { description, content: jsonContent({ $ref: '#/components/schemas/Error' }) };
}

/** OpenAPI 3.1 description of the HTTP routes, built for the running configuration. */
export function buildOpenApiDocument(options: OpenApiOptions): Schema {
  const { apiPrefix, maxPage, engines, authEnabled } = options;
  const unauthorized: Schema = authEnabled
    ? {
        '401': {
          description: 'Missing or wrong bearer token',
          content: jsonContent({ type: 'object', required: ['detail'], properties: { detail: { type: 'string' } } }),
        },
      }
    : {};

  return {
    openapi: '3.1.0',
    info: {
      title: 'Browser Search API',
      version: '1.0.0',
      description: 'Search engine results scraped through a pool of headless browsers.',
    },
    paths: {
      [`${apiPrefix}/v1/engines`]: {
        get: {
          operationId: 'listEngines',
          summary: 'List the engines accepted by the search route',
          responses: {
            '200': {
              description: 'Engine names in registry order',
              content: jsonContent({
                type: 'object',
                required: ['engines'],
                properties: { engines: { type: 'array', items: { type: 'string', enum: engines } } },
              }),
            },
            ...unauthorized,
          },
        },
      },
      [`${apiPrefix}/v1/search`]: {
        post: {
          operationId: 'search',
          summary: 'Run one search and return the extracted results page',
          requestBody: {
            required: true,
            content: jsonContent({ $ref: '#/components/schemas/SearchRequest' }),
          },
          responses: {
            '200': { description: 'Results in page order', content: jsonContent({ $ref: '#/components/schemas/SearchResponse' }) },
            '400': errorReply('Malformed body, empty query or page out of range'),
            ...unauthorized,
            '404': errorReply('Unknown engine'),
            '499': errorReply('Client went away before the search finished'),
            '502': errorReply('Results container not found, the engine markup may have changed'),
            '503': {
              ...errorReply('Every browser session is busy, or the service is shutting down'),
              headers: { 'Retry-After': { schema: { type: 'integer' } } },
            },
            '504': errorReply('Results page did not become ready in time'),
          },
        },
      },
      '/health': {
        get: {
          operationId: 'health',
          summary: 'Liveness and pool occupancy',
          security: [],
          responses: {
            '200': {
              description: 'Service is up',
              content: jsonContent({
                type: 'object',
                required: ['status', 'timestamp', 'pool'],
                properties: {
                  status: { type: 'string', const: 'healthy' },
                  timestamp: { type: 'integer', description: 'Unix time in seconds' },
                  pool: { $ref: '#/components/schemas/PoolStats' },
                },
              }),
            },
          },
        },
      },
    },
    components: {
      schemas: {
        SearchRequest: {
          type: 'object',
          required: ['engine', 'query'],
          properties: {
            engine: { type: 'string', enum: engines },
            query: { type: 'string', minLength: 1 },
            page: { type: 'integer', minimum: 1, maximum: maxPage, default: 1 },
          },
        },
        SearchHit: {
          type: 'object',
          required: ['title', 'link', 'snippet'],
          properties: {
            title: { type: 'string' },
            link: { type: 'string', format: 'uri' },
            snippet: { type: 'string' },
          },
        },
        SearchResponse: {
          type: 'object',
          required: ['engine', 'result', 'page'],
          properties: {
            engine: { type: 'string' },
            result: { type: 'array', items: { $ref: '#/components/schemas/SearchHit' } },
            page: { type: 'integer', minimum: 1 },
          },
        },
        PoolStats: {
          type: 'object',
          required: ['size', 'idle', 'leased', 'broken', 'waiting'],
          properties: Object.fromEntries(
            ['size', 'idle', 'leased', 'broken', 'waiting'].map((key) => [key, { type: 'integer', minimum: 0 }]),
          ),
        },
        Error: {
          type: 'object',
          required: ['error', 'message'],
          properties: {
            error: { type: 'string', enum: ERROR_KINDS },
            message: { type: 'string' },
            engine: { type: 'string', description: 'Present for UnknownEngine' },
          },
        },
      },
      ...(authEnabled ? { securitySchemes: { bearerAuth: { type: 'http', scheme: 'bearer' } } } : {}),
    },
    ...(authEnabled ? { security: [{ bearerAuth: [] }] } : {}),
  };
}

/** API reference page that renders the OpenAPI document with Scalar. */
export function renderDocsPage(openApiUrl: string): string {
  return `<!doctype html>
<html>
  <head>
    <title>Browser Search API</title>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
  </head>
  <body>
    <script id="api-reference" data-url="${openApiUrl}"></script>
    <script src="https://cdn.jsdelivr.net/npm/@scalar/api-reference"></script>
  </body>
</html>
`;
}
