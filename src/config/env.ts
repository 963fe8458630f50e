import 'dotenv/config'
import { z } from 'zod'

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform(value => value === 'true' || value === '1')

const envSchema = z.object({
  API_PORT: z.string().default('3001').transform(Number),
  API_HOST: z.string().default('0.0.0.0'),
  MQTT_BROKER: z.string().default('mqtt://localhost'),
  MQTT_ENABLED: booleanString,
  // Reply buffer sizing, mirrors the PDU buffer of a constrained transport
  REPLY_BUFFER_SIZE: z.string().default('128').transform(Number).pipe(z.number().int().min(1).max(65535)),
  REPLY_HEADER_SIZE: z.string().default('0').transform(Number).pipe(z.number().int().min(0)),
  DEVICE_STALE_SECONDS: z.string().default('300').transform(Number).pipe(z.number().int().min(1)),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'success', 'debug', 'trace', 'silent']).default('info'),
})

const env = envSchema
  .refine(values => values.REPLY_HEADER_SIZE < values.REPLY_BUFFER_SIZE, {
    message: 'REPLY_HEADER_SIZE must be smaller than REPLY_BUFFER_SIZE',
    path: ['REPLY_HEADER_SIZE'],
  })
  .parse(process.env)

export const config = {
  api: {
    port: env.API_PORT,
    host: env.API_HOST,
  },
  mqtt: {
    enabled: env.MQTT_ENABLED,
    broker: env.MQTT_BROKER,
  },
  reply: {
    bufferSize: env.REPLY_BUFFER_SIZE,
    headerSize: env.REPLY_HEADER_SIZE,
  },
  devices: {
    staleSeconds: env.DEVICE_STALE_SECONDS,
  },
  log: {
    level: env.LOG_LEVEL,
  },
}
