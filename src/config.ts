import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logger.js';
import { DEFAULT_USER_AGENT } from './services/browser.js';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

// Upper bound is the largest delay setTimeout honours.
const positiveInt = z.coerce.number().int().positive().max(2_147_483_647);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error'])),
  API_KEY: optionalString,
  API_PREFIX: z
    .string()
    .default('/api')
    .refine((value) => value === '' || (value.startsWith('/') && !value.endsWith('/')), {
      message: 'must be empty or start with "/" and not end with "/"',
    }),
  TRANSPORT: z.enum(['http', 'stdio']).default('http'),
  POOL_SIZE: positiveInt.default(2),
  ACQUIRE_TIMEOUT_MS: positiveInt.default(15000),
  NAVIGATION_TIMEOUT_MS: positiveInt.default(30000),
  DRAIN_TIMEOUT_MS: positiveInt.default(10000),
  MAX_PAGE: positiveInt.default(10),
  BROWSER_HEADLESS: booleanString.default('true'),
  BROWSER_CHANNEL: optionalString,
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  ENABLE_DOCS: booleanString.default('true'),
});

export interface AppConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  apiKey: string | undefined;
  apiPrefix: string;
  transport: 'http' | 'stdio';
  enableDocs: boolean;
  pool: {
    size: number;
    acquireTimeoutMs: number;
    drainTimeoutMs: number;
  };
  navigationTimeoutMs: number;
  maxPage: number;
  browser: {
    headless: boolean;
    channel: string | undefined;
    userAgent: string;
  };
}

/** Reads configuration from environment variables once at startup. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;
  return Object.freeze({
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    apiKey: e.API_KEY,
    apiPrefix: e.API_PREFIX,
    transport: e.TRANSPORT,
    enableDocs: e.ENABLE_DOCS,
    pool: {
      size: e.POOL_SIZE,
      acquireTimeoutMs: e.ACQUIRE_TIMEOUT_MS,
      drainTimeoutMs: e.DRAIN_TIMEOUT_MS,
    },
    navigationTimeoutMs: e.NAVIGATION_TIMEOUT_MS,
    maxPage: e.MAX_PAGE,
    browser: {
      headless: e.BROWSER_HEADLESS,
      channel: e.BROWSER_CHANNEL,
      userAgent: e.USER_AGENT,
    },
  });
}
