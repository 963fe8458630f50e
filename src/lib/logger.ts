import type { FastifyLogFn, FastifyServerOptions } from 'fastify'

declare module 'fastify' {
  interface FastifyBaseLogger {
    success: FastifyLogFn
  }
}

export const customLevels = {
  success: 25,
}

/**
 * Logger options for the Fastify instance (pino).
 * Messages are expected to carry a "[CATEGORY]" prefix: [SAUL], [MQTT], [REGISTRY], [API].
 */
export function buildLoggerOptions(level: string): FastifyServerOptions['logger'] {
  return {
    level,
    customLevels,
  }
}
