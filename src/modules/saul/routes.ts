import { FastifyPluginAsync } from 'fastify'
import { config } from '../../config/env'
import { createReplyBuffer, readPayload } from './encoder'
import { buildSaulResources } from './resources'
import { SaulService } from './service'
import { ResponseCode, formatResponseCode } from './types'

export interface SaulRoutesOptions {
  bufferSize?: number
  headerSize?: number
}

const HTTP_STATUS: Record<ResponseCode, number> = {
  [ResponseCode.Content]: 200,
  [ResponseCode.Changed]: 200,
  [ResponseCode.BadRequest]: 400,
  [ResponseCode.NotFound]: 404,
  [ResponseCode.InternalServerError]: 500,
}

/**
 * Query text exactly as sent by the client (without '?')
 */
export function rawQuery(url: string): string {
  const start = url.indexOf('?')
  return start === -1 ? '' : url.slice(start + 1)
}

const saulRoutes: FastifyPluginAsync<SaulRoutesOptions> = async (fastify, opts) => {
  const bufferSize = opts.bufferSize ?? config.reply.bufferSize
  const headerSize = opts.headerSize ?? config.reply.headerSize
  const service = new SaulService(fastify.devices, fastify.log)

  // Selectors are plain text whatever the announced content type
  fastify.removeAllContentTypeParsers()
  fastify.addContentTypeParser('*', { parseAs: 'string' }, (req, body, done) => {
    done(null, body)
  })

  for (const resource of buildSaulResources(service)) {
    fastify.route({
      method: resource.method,
      url: resource.path,
      schema: {
        tags: ['SAUL'],
        summary: resource.summary,
      },
      handler: async (request, reply) => {
        const buffer = createReplyBuffer(bufferSize, headerSize)
        const payload = typeof request.body === 'string' ? request.body : ''
        const encoded = resource.handler({ payload, query: rawQuery(request.url) }, buffer)
        const body = readPayload(buffer, encoded)

        reply.code(HTTP_STATUS[encoded.code]).header('x-saul-code', formatResponseCode(encoded.code))

        if (body.length === 0) {
          return reply.send()
        }
        return reply.type('text/plain; charset=utf-8').send(body)
      },
    })
  }
}

export default saulRoutes
