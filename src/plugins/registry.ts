import fp from 'fastify-plugin'
import { DeviceRegistry, registry as sharedRegistry } from '../core/registry'

declare module 'fastify' {
  interface FastifyInstance {
    devices: DeviceRegistry
  }
}

export interface RegistryPluginOptions {
  registry?: DeviceRegistry
}

export default fp<RegistryPluginOptions>(async (fastify, opts) => {
  const devices = opts.registry ?? sharedRegistry

  fastify.decorate('devices', devices)

  fastify.log.info({
    msg: `[REGISTRY] Device registry ready (${devices.count()} devices)`,
    count: devices.count(),
  })
}, { name: 'registry' })
