import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify'
import { listCategories } from '../../core/categories'
import { buildCategoryList, buildDeviceList } from './service'

export class DeviceController {
  constructor(private fastify: FastifyInstance) {}

  listDevices = async (req: FastifyRequest, reply: FastifyReply) => {
    try {
      const devices = this.fastify.devices
      return buildDeviceList(devices.devices(), category => devices.categoryName(category))
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : 'Unknown error'
      this.fastify.log.error({ msg: '[API] Failed to list devices', error: errorMessage })
      throw this.fastify.httpErrors.internalServerError(errorMessage)
    }
  }

  listCategories = async (req: FastifyRequest, reply: FastifyReply) => {
    return buildCategoryList(listCategories())
  }
}
