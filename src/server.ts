import Fastify, { type FastifyInstance } from 'fastify';
import { loadConfig, ndjsonOptionsFrom, sseOptionsFrom, type Config } from './config.js';
import { type StreamProvider } from './providers/base.js';
import { OpenAICompatibleProvider } from './providers/openaiCompatible.js';
import { createHealthRoutes } from './routes/health.js';
import { createStreamRoutes } from './routes/stream.js';

export interface AppDependencies {
  config: Config;
  /** Defaults to the OpenAI-compatible upstream from config */
  provider?: StreamProvider;
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const { config } = deps;

  const fastify = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      redact: [
        'req.headers.authorization',
        'req.headers["x-api-key"]',
      ],
    },
    disableRequestLogging: false,
    trustProxy: true,
  });

  const provider =
    deps.provider ??
    new OpenAICompatibleProvider({
      baseUrl: config.UPSTREAM_BASE_URL,
      apiKey: config.UPSTREAM_API_KEY,
      name: config.UPSTREAM_PROVIDER,
      logger: fastify.log,
    });

  // ── Routes ──────────────────────────────────────────────────────────────

  await fastify.register(createHealthRoutes(provider.name));
  await fastify.register(
    createStreamRoutes({
      provider,
      apiKey: config.ROUTER_API_KEY,
      sse: sseOptionsFrom(config),
      ndjson: ndjsonOptionsFrom(config),
      pipelineCapacity: config.PIPELINE_QUEUE_CAPACITY,
    })
  );

  // ── Error handler ───────────────────────────────────────────────────────

  fastify.setErrorHandler(async (error, _request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      fastify.log.error({ err: error }, 'Unhandled error');
    }
    return reply.status(statusCode).send({
      error: {
        message: error.message,
        type: statusCode >= 500 ? 'api_error' : 'invalid_request_error',
        code: statusCode >= 500 ? 'internal_server_error' : 'invalid_request',
      },
    });
  });

  return fastify;
}

// ── Entrypoint ──────────────────────────────────────────────────────────────

if (process.argv[1]?.endsWith('server.ts') || process.argv[1]?.endsWith('server.js')) {
  const config = loadConfig();
  const app = await buildApp({ config });

  try {
    await app.listen({ port: config.PORT, host: config.HOST });
    app.log.info(`Stream relay listening on ${config.HOST}:${config.PORT}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}
