/**
 * Logger shape services depend on. Fastify's pino logger (app.log, req.log)
 * satisfies it; tests pass a { info, warn, error } of vi.fn().
 */

export interface ServiceLogger {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
}
