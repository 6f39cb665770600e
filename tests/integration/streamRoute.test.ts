import { describe, it, expect, beforeEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { parseConfig } from '../../src/config.js';
import { buildApp } from '../../src/server.js';
import { ProviderError } from '../../src/types/request.js';
import { finish, start, text, TS } from '../fixtures/events.js';
import { FakeProvider } from '../fixtures/providers.js';

const AUTH = { authorization: 'Bearer test-router-key' };
const BODY = { model: 'gpt-4o', messages: [{ role: 'user', content: 'Hello' }] };

const config = parseConfig({
  ROUTER_API_KEY: 'test-router-key',
  LOG_LEVEL: 'silent',
  SSE_HEARTBEAT_INTERVAL_MS: '0',
  NDJSON_FLUSH_INTERVAL_MS: '0',
});

describe('stream routes', () => {
  let provider: FakeProvider;
  let app: FastifyInstance;

  beforeEach(async () => {
    provider = new FakeProvider([start(), text('Hi'), finish(5, 'stop')]);
    app = await buildApp({ config, provider });
  });

  describe('GET /health', () => {
    it('reports the service and provider', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok', service: 'llm-stream-relay', provider: 'fake' });
    });
  });

  describe('before the stream opens', () => {
    it('returns 401 without credentials', async () => {
      const response = await app.inject({ method: 'POST', url: '/v1/stream', payload: BODY });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({
        error: {
          message: 'Missing authentication. Provide Authorization: Bearer <key> or x-api-key: <key>',
          type: 'invalid_request_error',
          code: 'missing_api_key',
        },
      });
    });

    it('returns 401 with a wrong key', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/stream',
        headers: { 'x-api-key': 'wrong-key' },
        payload: BODY,
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({ error: { code: 'invalid_api_key' } });
    });

    it('returns 400 when model is missing', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/stream',
        headers: AUTH,
        payload: { messages: BODY.messages },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: {
          message: 'Missing required field: model',
          type: 'invalid_request_error',
          code: 'missing_model',
        },
      });
      expect(provider.requests).toHaveLength(0);
    });

    it('returns 400 when messages are empty', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/stream',
        headers: AUTH,
        payload: { model: 'gpt-4o', messages: [] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: { code: 'missing_messages' } });
    });

    it('returns 400 for an unknown mode', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/stream?mode=verbose',
        headers: AUTH,
        payload: BODY,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: {
          message: 'Unsupported stream mode: verbose (expected one of normalized, passthrough, direct)',
          type: 'invalid_request_error',
          code: 'invalid_stream_mode',
        },
      });
    });

    it('relays the upstream status when the provider rejects the request', async () => {
      provider = new FakeProvider(
        [],
        new ProviderError('fake', 429, { 'retry-after': '2' }, 'fake API error: 429')
      );
      app = await buildApp({ config, provider });

      const response = await app.inject({ method: 'POST', url: '/v1/stream', headers: AUTH, payload: BODY });

      expect(response.statusCode).toBe(429);
      expect(response.json()).toEqual({
        error: {
          message: 'fake API error: 429',
          type: 'invalid_request_error',
          code: 'provider_error',
          retry_after_ms: 2000,
        },
      });
    });

    it('returns 502 when the upstream cannot be reached', async () => {
      provider = new FakeProvider([], new Error('connect ECONNREFUSED'));
      app = await buildApp({ config, provider });

      const response = await app.inject({ method: 'POST', url: '/v1/stream', headers: AUTH, payload: BODY });

      expect(response.statusCode).toBe(502);
      expect(response.json()).toEqual({
        error: {
          message: 'connect ECONNREFUSED',
          type: 'api_error',
          code: 'upstream_unavailable',
        },
      });
    });

    it('answers CORS preflight', async () => {
      const response = await app.inject({ method: 'OPTIONS', url: '/v1/stream' });

      expect(response.statusCode).toBe(204);
      expect(response.headers['access-control-allow-origin']).toBe('*');
      expect(response.headers['access-control-allow-methods']).toBe('GET, POST, OPTIONS');
    });
  });

  describe('POST /v1/stream', () => {
    it('streams normalized SSE with correlation ids', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/stream',
        headers: { ...AUTH, accept: 'text/event-stream', 'x-trace-id': 'trace-9' },
        payload: { ...BODY, request_id: 'req-body' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/event-stream');
      expect(response.headers['cache-control']).toBe('no-cache, no-store, must-revalidate');
      expect(response.headers['x-trace-id']).toBe('trace-9');
      expect(response.body).toBe(
        `event: start\ndata: {"schema":"gai.events.v1","type":"start","ts":${TS},"seq":1,"trace_id":"trace-9","request_id":"req-body","provider":"fake","model":"gpt-4o"}\n\n` +
          'event: text.delta\ndata: {"type":"text.delta","seq":2,"text":"Hi"}\n\n' +
          'event: finish\ndata: {"type":"finish","usage":{"input_tokens":0,"output_tokens":0,"total_tokens":5},"finish_reason":"stop"}\n\n' +
          'event: done\ndata: {"type":"done","finished":true}\n\n'
      );
    });

    it('forces streaming on the upstream request and closes the source', async () => {
      await app.inject({
        method: 'POST',
        url: '/v1/stream',
        headers: AUTH,
        payload: { ...BODY, stream: false },
      });

      expect(provider.requests[0]?.stream).toBe(true);
      expect(provider.sources[0]?.closeCalls).toBe(1);
    });

    it('uses the x-request-id header, or generates one', async () => {
      const given = await app.inject({
        method: 'POST',
        url: '/v1/stream',
        headers: { ...AUTH, 'x-request-id': 'req-header' },
        payload: BODY,
      });
      const generated = await app.inject({ method: 'POST', url: '/v1/stream', headers: AUTH, payload: BODY });

      expect(given.headers['x-request-id']).toBe('req-header');
      expect(given.body).toContain('"request_id":"req-header"');
      expect(generated.headers['x-request-id']).toMatch(/^req_\d+_\d+$/);
    });

    it('streams NDJSON when the client accepts it', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/stream',
        headers: { ...AUTH, accept: 'application/x-ndjson' },
        payload: BODY,
      });

      expect(response.headers['content-type']).toBe('application/x-ndjson');
      expect(response.body.trimEnd().split('\n').slice(1)).toEqual([
        '{"type":"text.delta","seq":2,"text":"Hi"}',
        '{"type":"finish","usage":{"input_tokens":0,"output_tokens":0,"total_tokens":5},"finish_reason":"stop"}',
        '{"type":"done","finished":true}',
      ]);
    });

    it('streams direct NDJSON on the ndjson path with a mode header', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/stream/ndjson',
        headers: { ...AUTH, 'x-stream-mode': 'direct' },
        payload: BODY,
      });

      expect(response.headers['content-type']).toBe('application/x-ndjson');
      expect(response.body).toBe(
        '{"type":"start","started":true}\n' +
          '{"type":"text_delta","text":"Hi"}\n' +
          '{"type":"finish","usage":{"input_tokens":0,"output_tokens":0,"total_tokens":5},"finish_reason":"stop","finished":true}\n' +
          '{"type":"done","finished":true}\n'
      );
    });
  });

  describe('POST /v1/chat/completions', () => {
    it('streams passthrough chunks ending with [DONE]', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat/completions',
        headers: AUTH,
        payload: BODY,
      });

      expect(response.headers['content-type']).toBe('text/event-stream');
      const frames = response.body.split('\n\n').filter((f) => f !== '');
      expect(frames).toHaveLength(3);
      expect(frames[2]).toBe('data: [DONE]');

      const first: unknown = JSON.parse((frames[0] ?? '').slice('data: '.length));
      expect(first).toMatchObject({
        object: 'chat.completion.chunk',
        model: 'gpt-4o',
        choices: [{ index: 0, delta: { content: 'Hi' }, finish_reason: null }],
      });
      const last: unknown = JSON.parse((frames[1] ?? '').slice('data: '.length));
      expect(last).toMatchObject({
        choices: [{ index: 0, delta: {}, finish_reason: 'stop' }],
        usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 5 },
      });
    });

    it('switches to normalized events on request', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat/completions?mode=normalized',
        headers: AUTH,
        payload: BODY,
      });

      expect(response.body.startsWith('event: start\n')).toBe(true);
    });
  });
});
