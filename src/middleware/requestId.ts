import type { FastifyRequest, FastifyReply } from 'fastify';

let requestCounter = 0;

/**
 * Process-unique request id: `req_<epoch ms>_<counter>`.
 */
export function generateRequestId(now: number = Date.now()): string {
  requestCounter += 1;
  return `req_${now}_${requestCounter}`;
}

/**
 * Attaches a request id to every request and response.
 * Reuses the client's x-request-id header when present.
 */
export async function requestIdMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const existing = request.headers['x-request-id'];
  const requestId =
    typeof existing === 'string' && existing.length > 0 ? existing : generateRequestId();

  request.requestId = requestId;
  void reply.header('x-request-id', requestId);
}

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
  }
}
