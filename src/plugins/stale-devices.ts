import { FastifyPluginAsync } from 'fastify'
import fastifyPlugin from 'fastify-plugin'
import { config } from '../config/env'
import { StaleDeviceService } from '../modules/devices/staleDeviceService'

declare module 'fastify' {
    interface FastifyInstance {
        staleDevices: StaleDeviceService
    }
}

const staleDevicesPlugin: FastifyPluginAsync = async (fastify) => {
    const staleDevices = new StaleDeviceService(fastify.mqttBridge, fastify.log)

    staleDevices.start(config.devices.staleSeconds)

    fastify.decorate('staleDevices', staleDevices)

    fastify.addHook('onClose', async () => {
        staleDevices.stop()
    })
}

export default fastifyPlugin(staleDevicesPlugin, { name: 'stale-devices', dependencies: ['mqtt'] })
