import { describe, it, expect } from 'vitest';
import Fastify from 'fastify';
import { createAuthMiddleware } from '../../src/middleware/auth.js';
import { generateRequestId, requestIdMiddleware } from '../../src/middleware/requestId.js';

async function buildTestApp() {
  const app = Fastify({ logger: false });
  app.get(
    '/protected',
    { preHandler: [requestIdMiddleware, createAuthMiddleware('test-router-key')] },
    async (request) => ({ requestId: request.requestId })
  );
  return app;
}

describe('generateRequestId', () => {
  it('combines the time with an increasing counter', () => {
    const first = generateRequestId(1700000000000);
    const second = generateRequestId(1700000000000);

    expect(first).toMatch(/^req_1700000000000_\d+$/);
    expect(Number(second.split('_')[2])).toBe(Number(first.split('_')[2]) + 1);
  });
});

describe('auth middleware', () => {
  it('accepts a bearer token', async () => {
    const app = await buildTestApp();
    const response = await app.inject({
      method: 'GET',
      url: '/protected',
      headers: { authorization: 'Bearer test-router-key', 'x-request-id': 'req-given' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ requestId: 'req-given' });
    expect(response.headers['x-request-id']).toBe('req-given');
  });

  it('accepts an x-api-key header', async () => {
    const app = await buildTestApp();
    const response = await app.inject({ method: 'GET', url: '/protected', headers: { 'x-api-key': 'test-router-key' } });

    expect(response.statusCode).toBe(200);
  });

  it('rejects an empty bearer token as missing', async () => {
    const app = await buildTestApp();
    const response = await app.inject({ method: 'GET', url: '/protected', headers: { authorization: 'Bearer ' } });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toMatchObject({ error: { code: 'missing_api_key' } });
  });
});
