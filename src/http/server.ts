import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { handleApiRequest, errorResponse, type ApiDeps, type ApiResponse } from './api.js';
import { InvalidInputError } from '../errors.js';
import { createLogger, errorMessage } from '../logger.js';

const log = createLogger('http');

export const MAX_BODY_BYTES = 64 * 1024;

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      // Keep draining past the limit so the 400 can still be written.
      if (size <= limit) chunks.push(chunk);
    });
    req.on('end', () => {
      if (size > limit) {
        reject(new InvalidInputError(`Request body exceeds ${limit} bytes`));
      } else {
        resolve(Buffer.concat(chunks).toString('utf-8'));
      }
    });
    req.on('error', reject);
  });
}

function send(res: ServerResponse, response: ApiResponse): void {
  const headers: Record<string, string> = { ...response.headers };
  if (response.body === undefined) {
    res.writeHead(response.status, headers);
    res.end();
    return;
  }
  if (response.contentType && typeof response.body === 'string') {
    headers['Content-Type'] = response.contentType;
    res.writeHead(response.status, headers);
    res.end(response.body);
    return;
  }
  headers['Content-Type'] = 'application/json; charset=utf-8';
  res.writeHead(response.status, headers);
  res.end(JSON.stringify(response.body));
}

async function handle(req: IncomingMessage, res: ServerResponse, deps: ApiDeps): Promise<void> {
  const start = Date.now();
  const method = req.method ?? 'GET';
  const url = req.url ?? '/';

  // Fires when the client goes away before we answer.
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort(new Error('Client disconnected'));
  });

  let response: ApiResponse;
  try {
    const body = await readBody(req, MAX_BODY_BYTES);
    response = await handleApiRequest(
      { method, url, authorization: req.headers.authorization, body, signal: controller.signal },
      deps,
    );
  } catch (error) {
    response = errorResponse(error);
  }

  if (controller.signal.aborted) {
    log.info('Client disconnected before response', { method, url, durationMs: Date.now() - start });
    return;
  }
  send(res, response);
  log.info('Request handled', { method, url, status: response.status, durationMs: Date.now() - start });
}

export function createHttpServer(deps: ApiDeps): Server {
  return createServer((req, res) => {
    handle(req, res, deps).catch((error: unknown) => {
      log.error('Failed to write response', { error: errorMessage(error) });
      if (!res.headersSent) res.writeHead(500);
      res.end();
    });
  });
}

export function listen(server: Server, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeIdleConnections();
  });
}
