import { timingSafeEqual, createHash } from 'crypto';
import type { FastifyRequest, FastifyReply } from 'fastify';

/**
 * Rejects stream requests that do not present the relay's API key, as
 * either `Authorization: Bearer <key>` or `x-api-key: <key>`.
 * Runs before the stream opens, so failures are plain JSON 401s.
 */
export function createAuthMiddleware(apiKey: string) {
  // Hash both sides so the comparison is fixed-length
  const expected = createHash('sha256').update(apiKey).digest();

  return async function authMiddleware(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<void> {
    const token = extractToken(request);

    if (!token) {
      await reply.status(401).send({
        error: {
          message: 'Missing authentication. Provide Authorization: Bearer <key> or x-api-key: <key>',
          type: 'invalid_request_error',
          code: 'missing_api_key',
        },
      });
      return;
    }

    const provided = createHash('sha256').update(token).digest();
    if (!timingSafeEqual(expected, provided)) {
      await reply.status(401).send({
        error: {
          message: 'Invalid API key',
          type: 'invalid_request_error',
          code: 'invalid_api_key',
        },
      });
    }
  };
}

/** x-api-key wins over a bearer token */
export function extractToken(request: FastifyRequest): string | null {
  const xApiKey = request.headers['x-api-key'];
  if (typeof xApiKey === 'string' && xApiKey.trim() !== '') {
    return xApiKey.trim();
  }

  const authHeader = request.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    const token = authHeader.slice(7).trim();
    return token === '' ? null : token;
  }

  return null;
}
