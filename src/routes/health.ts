import type { FastifyInstance } from 'fastify';

export const SERVICE_NAME = 'llm-stream-relay';
export const SERVICE_VERSION = '0.1.0';

export function createHealthRoutes(providerName: string) {
  return async function healthRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.get('/health', async (_request, reply) => {
      return reply.status(200).send({
        status: 'ok',
        timestamp: new Date().toISOString(),
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        provider: providerName,
      });
    });
  };
}
