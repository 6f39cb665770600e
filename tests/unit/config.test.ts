import { describe, it, expect } from 'vitest';
import { ConfigError, ndjsonOptionsFrom, parseConfig, sseOptionsFrom } from '../../src/config.js';
import { DEFAULT_NDJSON_OPTIONS } from '../../src/streaming/ndjsonWriter.js';
import { DEFAULT_SSE_OPTIONS } from '../../src/streaming/sseWriter.js';

describe('parseConfig', () => {
  it('applies defaults that match the writer defaults', () => {
    const config = parseConfig({ ROUTER_API_KEY: 'test-router-key' });

    expect(config.PORT).toBe(3000);
    expect(config.UPSTREAM_BASE_URL).toBe('https://api.openai.com');
    expect(config.PIPELINE_QUEUE_CAPACITY).toBe(100);
    expect(sseOptionsFrom(config)).toEqual({ ...DEFAULT_SSE_OPTIONS });
    expect(ndjsonOptionsFrom(config)).toEqual({ ...DEFAULT_NDJSON_OPTIONS });
  });

  it('coerces numbers and boolean flags', () => {
    const config = parseConfig({
      ROUTER_API_KEY: 'test-router-key',
      SSE_HEARTBEAT_INTERVAL_MS: '500',
      SSE_FLUSH_AFTER_WRITE: 'false',
      SSE_INCLUDE_ID: '1',
      NDJSON_COMPACT_JSON: '0',
    });

    expect(sseOptionsFrom(config)).toMatchObject({
      heartbeatIntervalMs: 500,
      flushAfterWrite: false,
      includeId: true,
    });
    expect(ndjsonOptionsFrom(config).compactJSON).toBe(false);
  });

  it('reports every invalid variable', () => {
    expect(() => parseConfig({ SSE_BUFFER_SIZE: '-1' })).toThrow(ConfigError);
    try {
      parseConfig({ SSE_BUFFER_SIZE: '-1' });
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err).toMatchObject({
        issues: ['ROUTER_API_KEY: Required', 'SSE_BUFFER_SIZE: Number must be greater than 0'],
      });
    }
  });
});
