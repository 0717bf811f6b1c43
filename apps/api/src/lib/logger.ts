import type { FastifyBaseLogger } from 'fastify';

/**
 * Logger contract injected into services. Kept to the calls services make so
 * tests can pass a plain object of vi.fn() stubs.
 */
export interface ServiceLogger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

/** Adapts the Fastify (pino) logger, which takes the data object first. */
export function createServiceLogger(base: FastifyBaseLogger): ServiceLogger {
  return {
    info: (msg, data) => base.info(data ?? {}, msg),
    warn: (msg, data) => base.warn(data ?? {}, msg),
    error: (msg, data) => base.error(data ?? {}, msg),
  };
}
