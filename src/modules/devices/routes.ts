import { FastifyPluginAsync } from 'fastify'
import { ZodTypeProvider } from 'fastify-type-provider-zod'
import { DeviceController } from './controller'
import { CategoryListResponseSchema, DeviceListResponseSchema } from './schema'

const devicesRoutes: FastifyPluginAsync = async fastify => {
  const app = fastify.withTypeProvider<ZodTypeProvider>()
  const controller = new DeviceController(fastify)

  // GET /devices - List registered devices
  app.get(
    '/devices',
    {
      schema: {
        tags: ['Devices'],
        summary: 'List registered devices in traversal order',
        response: {
          200: DeviceListResponseSchema,
        },
      },
    },
    controller.listDevices
  )

  // GET /categories - List capability categories
  app.get(
    '/categories',
    {
      schema: {
        tags: ['Devices'],
        summary: 'List capability categories',
        response: {
          200: CategoryListResponseSchema,
        },
      },
    },
    controller.listCategories
  )
}

export default devicesRoutes
