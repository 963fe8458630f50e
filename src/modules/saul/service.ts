/**
 * SAUL Resolution Service
 *
 * Resolves one request against the device directory and encodes the outcome.
 * Every handler is a synchronous decode -> resolve -> encode chain; nothing is
 * kept between requests.
 */
import type { FastifyBaseLogger } from 'fastify'
import type { DeviceDirectory, DeviceRecord, PhysicalReading } from '../../core/types/device'
import { decodeCategory, decodeIndex } from '../../utils/selectorDecoder'
import {
  encodeDecimal,
  encodeText,
  formatDeviceLine,
  payloadCapacity,
  statusOnly,
  type ReplyBuffer,
} from './encoder'
import {
  DIAGNOSTIC_DEVICE_NOT_FOUND,
  DIAGNOSTIC_NO_VALUES,
  ResponseCode,
  type EncodedReply,
  type SaulRequest,
} from './types'

export type SaulLogger = Pick<FastifyBaseLogger, 'debug' | 'warn'>

export class SaulService {
  constructor(
    private directory: DeviceDirectory,
    private logger: SaulLogger
  ) {}

  /**
   * Number of registered devices, as decimal text
   */
  count = (_request: SaulRequest, reply: ReplyBuffer): EncodedReply => {
    const count = this.directory.count()
    return encodeDecimal(reply, ResponseCode.Content, count) ?? this.overflow(reply, 'device count', String(count).length)
  }

  /**
   * Identity of the device at a zero-based position, index taken from the payload
   */
  lookupDevice = (request: SaulRequest, reply: ReplyBuffer): EncodedReply => {
    const index = decodeIndex(request.payload)
    if (index === null) {
      this.logger.debug({ msg: '[SAUL] Malformed device index', payloadLength: request.payload.length })
      return statusOnly(reply, ResponseCode.BadRequest)
    }

    const device = this.directory.findByIndex(index)
    if (!device) {
      return this.diagnostic(reply, ResponseCode.NotFound, DIAGNOSTIC_DEVICE_NOT_FOUND)
    }

    const category = this.directory.categoryName(device.category)
    if (category === null) {
      this.logger.warn({ msg: `[SAUL] Device "${device.name}" has an unknown category`, category: device.category })
      return statusOnly(reply, ResponseCode.InternalServerError)
    }

    const line = formatDeviceLine(index, category, device.name)
    return encodeText(reply, ResponseCode.Changed, line) ?? this.overflow(reply, 'device line', Buffer.byteLength(line))
  }

  /**
   * Value of the first device of the category given as `classid=NNN` in the query
   */
  readFromQuery = (request: SaulRequest, reply: ReplyBuffer): EncodedReply => {
    const category = decodeCategory(request.query)
    if (category === null) {
      this.logger.debug({ msg: '[SAUL] Malformed category query', queryLength: request.query.length })
      return statusOnly(reply, ResponseCode.BadRequest)
    }
    return this.readCategory(category, reply)
  }

  /**
   * Channel 0 of the first device (registration order) of a category
   */
  readCategory(category: number, reply: ReplyBuffer): EncodedReply {
    if (this.directory.categoryName(category) === null) {
      this.logger.debug({ msg: '[SAUL] Unknown category requested', category })
      return this.diagnostic(reply, ResponseCode.NotFound, DIAGNOSTIC_DEVICE_NOT_FOUND)
    }

    const device = this.directory.findFirstByCategory(category)
    if (!device) {
      return this.diagnostic(reply, ResponseCode.NotFound, DIAGNOSTIC_DEVICE_NOT_FOUND)
    }

    const reading = this.readDevice(device)
    if (!reading || reading.dimensions <= 0) {
      return this.diagnostic(reply, ResponseCode.NotFound, DIAGNOSTIC_NO_VALUES)
    }

    const value: number | undefined = reading.values[0]
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.logger.debug({ msg: `[SAUL] No usable channel 0 value from "${device.name}"`, category })
      return this.diagnostic(reply, ResponseCode.NotFound, DIAGNOSTIC_NO_VALUES)
    }

    return encodeDecimal(reply, ResponseCode.Content, value) ?? this.overflow(reply, 'device value', String(value).length)
  }

  private readDevice(device: DeviceRecord): PhysicalReading | null {
    try {
      return this.directory.read(device)
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : 'Unknown error'
      this.logger.warn({ msg: `[SAUL] Read failed for "${device.name}"`, category: device.category, error: errorMessage })
      return null
    }
  }

  /**
   * Status with a diagnostic payload, or the bare status when the text does not fit
   */
  private diagnostic(reply: ReplyBuffer, code: ResponseCode, text: string): EncodedReply {
    return encodeText(reply, code, text) ?? statusOnly(reply, code)
  }

  private overflow(reply: ReplyBuffer, what: string, size: number): EncodedReply {
    this.logger.warn({
      msg: `[SAUL] Reply buffer too small for ${what}`,
      capacity: payloadCapacity(reply),
      size,
    })
    return statusOnly(reply, ResponseCode.InternalServerError)
  }
}
