import { describe, it, expect } from 'vitest'
import {
    createReplyBuffer,
    payloadCapacity,
    writePayload,
    readPayload,
    statusOnly,
    encodeText,
    encodeDecimal,
    formatDeviceLine,
} from '../encoder'
import { ResponseCode } from '../types'

const CANARY = 0xa5

/**
 * Buffer larger than the declared capacity, filled with canary bytes
 */
const createGuardedReply = (capacity: number, headerLength = 0) => {
    const storage = Buffer.alloc(capacity + 8, CANARY)
    return { storage, reply: createReplyBuffer(capacity, headerLength, storage) }
}

const canariesIntact = (storage: Buffer, capacity: number) =>
    storage.subarray(capacity).every(byte => byte === CANARY)

describe('createReplyBuffer', () => {
    it('should allocate a buffer of the requested capacity', () => {
        const reply = createReplyBuffer(64, 4)
        expect(reply.buf.length).toBe(64)
        expect(payloadCapacity(reply)).toBe(60)
    })

    it('should reject a capacity larger than the storage', () => {
        expect(() => createReplyBuffer(16, 0, Buffer.alloc(8))).toThrow(RangeError)
    })

    it('should reject a header longer than the capacity', () => {
        expect(() => createReplyBuffer(8, 9)).toThrow(RangeError)
    })
})

describe('writePayload', () => {
    it('should write after the header and report header + payload length', () => {
        const reply = createReplyBuffer(16, 4)
        expect(writePayload(reply, 'abc')).toBe(7)
        expect(reply.buf.subarray(4, 7).toString()).toBe('abc')
    })

    it('should accept a payload that fills the capacity exactly', () => {
        const { storage, reply } = createGuardedReply(8, 2)
        expect(writePayload(reply, '123456')).toBe(8)
        expect(canariesIntact(storage, 8)).toBe(true)
    })

    it('should write nothing when the payload is one byte too large', () => {
        const { storage, reply } = createGuardedReply(8, 2)
        const before = Buffer.from(storage)

        expect(writePayload(reply, '1234567')).toBeNull()
        expect(storage.equals(before)).toBe(true)
    })

    it('should count UTF-8 bytes, not characters', () => {
        const { storage, reply } = createGuardedReply(4)
        expect(writePayload(reply, 'ééé')).toBeNull()
        expect(writePayload(reply, 'éé')).toBe(4)
        expect(canariesIntact(storage, 4)).toBe(true)
    })
})

describe('encodeText / encodeDecimal / statusOnly', () => {
    it('should encode a diagnostic', () => {
        const reply = createReplyBuffer(32)
        const encoded = encodeText(reply, ResponseCode.NotFound, 'device not found')
        expect(encoded).toEqual({ code: ResponseCode.NotFound, length: 16 })
        expect(encoded && readPayload(reply, encoded).toString()).toBe('device not found')
    })

    it('should encode signed decimals', () => {
        const reply = createReplyBuffer(8)
        const encoded = encodeDecimal(reply, ResponseCode.Content, -125)
        expect(encoded).toEqual({ code: ResponseCode.Content, length: 4 })
        expect(encoded && readPayload(reply, encoded).toString()).toBe('-125')
    })

    it('should return null when a decimal does not fit', () => {
        const reply = createReplyBuffer(3)
        expect(encodeDecimal(reply, ResponseCode.Content, 1000)).toBeNull()
    })

    it('should report the header length for status-only replies', () => {
        const reply = createReplyBuffer(32, 6)
        const encoded = statusOnly(reply, ResponseCode.BadRequest)
        expect(encoded).toEqual({ code: ResponseCode.BadRequest, length: 6 })
        expect(readPayload(reply, encoded).length).toBe(0)
    })
})

describe('formatDeviceLine', () => {
    it('should join index, category and name', () => {
        expect(formatDeviceLine(3, 'SENSE_TEMP', 'tmp0')).toBe('3,SENSE_TEMP,tmp0\n')
    })
})
