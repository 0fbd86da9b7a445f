#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Server } from 'node:http';
import { loadConfig } from './config.js';
import { createApiDeps, createMcpServer, createServices } from './server.js';
import { closeServer, createHttpServer, listen } from './http/server.js';
import { setLogLevel, createLogger } from './logger.js';

const log = createLogger('main');

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  log.info('Starting browser search API', {
    nodeVersion: process.version,
    pid: process.pid,
    logLevel: config.logLevel,
    transport: config.transport,
  });

  const services = createServices(config);
  await services.pool.start();

  let httpServer: Server | null = null;
  let shuttingDown = false;

  const cleanup = async (exitCode: number) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info('Shutting down...');
    try {
      if (httpServer) await closeServer(httpServer);
      await services.pool.shutdown(config.pool.drainTimeoutMs);
      log.info('Browsers closed, exiting');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error('Error during cleanup', { error: message });
    }
    process.exit(exitCode);
  };

  process.on('SIGINT', () => void cleanup(0));
  process.on('SIGTERM', () => void cleanup(0));

  process.on('uncaughtException', (error) => {
    log.error('Uncaught exception', { error: error.message, stack: error.stack });
    void cleanup(1);
  });

  process.on('unhandledRejection', (reason) => {
    const message = reason instanceof Error ? reason.message : String(reason);
    log.error('Unhandled promise rejection', { error: message });
  });

  if (config.transport === 'stdio') {
    const server = createMcpServer(config, services);
    await server.connect(new StdioServerTransport());
    log.info('MCP server connected and ready');
    return;
  }

  if (!config.apiKey) {
    log.warn('API_KEY is not set, authentication is disabled');
  }
  httpServer = createHttpServer(createApiDeps(config, services));
  await listen(httpServer, config.host, config.port);
  log.info('HTTP server listening', { host: config.host, port: config.port, prefix: config.apiPrefix });
  if (config.enableDocs) {
    log.info(`Docs available: http://${config.host}:${config.port}/docs`);
  }
}

main().catch((error: unknown) => {
  log.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
