/**
 * Response Encoder
 *
 * Writes reply payloads into a bounded buffer. The byte length of a payload is
 * computed before anything is written; a payload that does not fit leaves the
 * buffer untouched.
 */
import type { EncodedReply, ResponseCode } from './types'

export interface ReplyBuffer {
  readonly buf: Buffer
  readonly capacity: number       // usable bytes, may be smaller than buf.length
  readonly headerLength: number   // bytes reserved by the transport in front of the payload
}

export function createReplyBuffer(capacity: number, headerLength = 0, buf: Buffer = Buffer.alloc(capacity)): ReplyBuffer {
  if (!Number.isInteger(capacity) || capacity < 0 || capacity > buf.length) {
    throw new RangeError(`Invalid reply capacity ${capacity} for a ${buf.length} byte buffer`)
  }
  if (!Number.isInteger(headerLength) || headerLength < 0 || headerLength > capacity) {
    throw new RangeError(`Invalid header length ${headerLength} for capacity ${capacity}`)
  }
  return { buf, capacity, headerLength }
}

export function payloadCapacity(reply: ReplyBuffer): number {
  return reply.capacity - reply.headerLength
}

/**
 * Write a text payload after the header
 * @returns Bytes used (header + payload), or null when the payload does not fit
 */
export function writePayload(reply: ReplyBuffer, text: string): number | null {
  const size = Buffer.byteLength(text, 'utf8')
  if (size > payloadCapacity(reply)) {
    return null
  }
  reply.buf.write(text, reply.headerLength, size, 'utf8')
  return reply.headerLength + size
}

/**
 * Payload written by a successful reply
 */
export function readPayload(reply: ReplyBuffer, encoded: EncodedReply): Buffer {
  return reply.buf.subarray(reply.headerLength, encoded.length)
}

export function statusOnly(reply: ReplyBuffer, code: ResponseCode): EncodedReply {
  return { code, length: reply.headerLength }
}

export function encodeText(reply: ReplyBuffer, code: ResponseCode, text: string): EncodedReply | null {
  const length = writePayload(reply, text)
  return length === null ? null : { code, length }
}

export function encodeDecimal(reply: ReplyBuffer, code: ResponseCode, value: number): EncodedReply | null {
  return encodeText(reply, code, Math.trunc(value).toString(10))
}

/**
 * One device line of the index lookup: "<index>,<category>,<name>\n"
 */
export function formatDeviceLine(index: number, category: string, name: string): string {
  return `${index},${category},${name}\n`
}
