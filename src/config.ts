import { z } from 'zod';
import { type NDJSONOptions } from './streaming/ndjsonWriter.js';
import { type SSEOptions } from './streaming/sseWriter.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  // Required
  ROUTER_API_KEY: z.string().min(1, 'ROUTER_API_KEY is required'),

  // Upstream
  UPSTREAM_BASE_URL: z.string().url().default('https://api.openai.com'),
  UPSTREAM_API_KEY: z.string().optional(),
  UPSTREAM_PROVIDER: z.string().min(1).default('openai'),

  // Server
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // SSE
  SSE_HEARTBEAT_INTERVAL_MS: z.coerce.number().int().nonnegative().default(15000),
  SSE_FLUSH_AFTER_WRITE: booleanFlag.default('true'),
  SSE_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  SSE_BUFFER_SIZE: z.coerce.number().int().positive().default(4096),
  SSE_INCLUDE_ID: booleanFlag.default('false'),

  // NDJSON
  NDJSON_BUFFER_SIZE: z.coerce.number().int().positive().default(8192),
  NDJSON_FLUSH_INTERVAL_MS: z.coerce.number().int().nonnegative().default(100),
  NDJSON_COMPACT_JSON: booleanFlag.default('true'),
  NDJSON_INCLUDE_TIMESTAMP: booleanFlag.default('false'),

  // Normalized pipeline
  PIPELINE_QUEUE_CAPACITY: z.coerce.number().int().positive().default(100),
});

export type Config = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Configuration error:\n${issues.map((i) => `  ${i}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function parseConfig(env: Record<string, string | undefined>): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }
  return result.data;
}

/**
 * Read the process environment; print the problems and exit when invalid.
 */
export function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    // eslint-disable-next-line no-console
    console.error(`\n[llm-stream-relay] ${err.message}\n`);
    process.exit(1);
  }
}

export function sseOptionsFrom(config: Config): SSEOptions {
  return {
    heartbeatIntervalMs: config.SSE_HEARTBEAT_INTERVAL_MS,
    flushAfterWrite: config.SSE_FLUSH_AFTER_WRITE,
    maxRetries: config.SSE_MAX_RETRIES,
    bufferSize: config.SSE_BUFFER_SIZE,
    includeId: config.SSE_INCLUDE_ID,
  };
}

export function ndjsonOptionsFrom(config: Config): NDJSONOptions {
  return {
    bufferSize: config.NDJSON_BUFFER_SIZE,
    flushIntervalMs: config.NDJSON_FLUSH_INTERVAL_MS,
    compactJSON: config.NDJSON_COMPACT_JSON,
    includeTimestamp: config.NDJSON_INCLUDE_TIMESTAMP,
  };
}
