import { buildApp } from './app'
import { config } from './config/env'

async function start() {
  const app = await buildApp()

  try {
    const address = await app.listen({ port: config.api.port, host: config.api.host })

    app.log.success({
      msg: `✓ SAUL gateway listening on ${address}`,
      url: address,
      devices: app.devices.count(),
      replyBufferSize: config.reply.bufferSize,
      replyHeaderSize: config.reply.headerSize,
      mqtt: config.mqtt.enabled ? config.mqtt.broker : 'disabled',
    })
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ msg: `Received ${signal}, shutting down`, signal })
      app
        .close()
        .then(() => process.exit(0))
        .catch(err => {
          app.log.error(err)
          process.exit(1)
        })
    })
  }
}

void start()
