/**
 * Minimal logger surface used by the streaming core.
 * Fastify's pino instance (`fastify.log`, `request.log`) satisfies it.
 */
export interface StreamLogger {
  debug(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
}
