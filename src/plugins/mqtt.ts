import fp from 'fastify-plugin'
import { connect, type MqttClient } from 'mqtt'
import { FastifyInstance } from 'fastify'
import { config } from '../config/env'
import { MqttDeviceBridge } from '../modules/mqtt/deviceBridge'

declare module 'fastify' {
  interface FastifyInstance {
    mqtt: MqttClient
    mqttBridge: MqttDeviceBridge
  }
}

// <moduleId>/<hardwareId>/<measurement>
const MEASUREMENT_TOPIC = '+/+/+'

export default fp(async (fastify: FastifyInstance) => {
  const client = connect(config.mqtt.broker)
  const bridge = new MqttDeviceBridge(fastify.devices, fastify.log)

  client.on('connect', () => {
    client.subscribe(MEASUREMENT_TOPIC, err => {
      if (err) {
        fastify.log.error({ msg: '[MQTT] Subscription failed', error: err.message })
      } else {
        fastify.log.success({
          msg: '✓ [MQTT] Connected to broker and subscribed',
          broker: config.mqtt.broker,
          topics: [MEASUREMENT_TOPIC],
        })
      }
    })
  })

  client.on('error', err => {
    fastify.log.error({
      msg: '[MQTT] Connection error',
      error: err.message,
      broker: config.mqtt.broker,
    })
  })

  client.on('message', (topic, message) => {
    try {
      bridge.handleMessage(topic, message)
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : 'Unknown error'
      fastify.log.error({ msg: `[MQTT] Failed to handle message on ${topic}`, topic, error: errorMessage })
    }
  })

  fastify.decorate('mqtt', client)
  fastify.decorate('mqttBridge', bridge)

  fastify.addHook('onClose', async () => {
    bridge.detachAll()
    await client.endAsync()
  })
}, { name: 'mqtt', dependencies: ['registry'] })
