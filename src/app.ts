import fastify from 'fastify'
import cors from '@fastify/cors'
import swagger from '@fastify/swagger'
import swaggerUi from '@fastify/swagger-ui'
import sensible from '@fastify/sensible'
import {
  serializerCompiler,
  validatorCompiler,
  ZodTypeProvider,
  jsonSchemaTransform,
} from 'fastify-type-provider-zod'

import { config } from './config/env'
import { buildLoggerOptions } from './lib/logger'
import type { DeviceRegistry } from './core/registry'

// Plugins
import registryPlugin from './plugins/registry'
import mqttPlugin from './plugins/mqtt'
import staleDevicesPlugin from './plugins/stale-devices'

// Routes
import saulRoutes, { type SaulRoutesOptions } from './modules/saul/routes'
import devicesRoutes from './modules/devices/routes'

export interface BuildAppOptions {
  registry?: DeviceRegistry     // defaults to the shared registry
  mqtt?: boolean                // defaults to MQTT_ENABLED
  saul?: SaulRoutesOptions      // reply buffer sizing, defaults to REPLY_* settings
}

export async function buildApp(options: BuildAppOptions = {}) {
  const app = fastify({
    logger: buildLoggerOptions(config.log.level),
    disableRequestLogging: true,
  }).withTypeProvider<ZodTypeProvider>()

  // Validation
  app.setValidatorCompiler(validatorCompiler)
  app.setSerializerCompiler(serializerCompiler)

  // Sensible (HTTP Errors)
  await app.register(sensible)

  // CORS
  await app.register(cors, {
    origin: '*',
    methods: ['GET', 'POST'],
  })

  // Swagger
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'SAUL Gateway',
        description: 'Request/response access to the SAUL device registry',
        version: '1.0.0',
      },
      servers: [],
    },
    transform: jsonSchemaTransform,
  })

  await app.register(swaggerUi, {
    routePrefix: '/documentation',
  })

  // Core Plugins
  await app.register(registryPlugin, { registry: options.registry })

  if (options.mqtt ?? config.mqtt.enabled) {
    await app.register(mqttPlugin)
    await app.register(staleDevicesPlugin)
  }

  // Routes
  await app.register(saulRoutes, options.saul ?? {})
  await app.register(devicesRoutes, { prefix: '/api' })

  app.get('/health', async () => {
    return { status: 'ok' }
  })

  return app
}
