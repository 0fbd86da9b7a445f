/**
 * Leveled logger that writes one line per event to stderr.
 * stdout stays free for the MCP stdio transport.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

type LogSink = (line: string) => void;

let minLevel: LogLevel = 'info';
let sink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

/** Replaces the output sink and returns the previous one. */
export function setLogSink(next: LogSink): LogSink {
  const previous = sink;
  sink = next;
  return previous;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export function formatMessage(level: LogLevel, component: string, message: string, meta?: Record<string, unknown>): string {
  const timestamp = new Date().toISOString();
  const prefix = `[${timestamp}] [${level.toUpperCase()}] [${component}]`;
  const metaStr = meta ? ' ' + JSON.stringify(meta) : '';
  return `${prefix} ${message}${metaStr}`;
}

function log(level: LogLevel, component: string, message: string, meta?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  sink(formatMessage(level, component, message, meta));
}

export function createLogger(component: string) {
  return {
    debug: (message: string, meta?: Record<string, unknown>) => log('debug', component, message, meta),
    info: (message: string, meta?: Record<string, unknown>) => log('info', component, message, meta),
    warn: (message: string, meta?: Record<string, unknown>) => log('warn', component, message, meta),
    error: (message: string, meta?: Record<string, unknown>) => log('error', component, message, meta),
  };
}

export type Logger = ReturnType<typeof createLogger>;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
