/**
 * Response codes use the CoAP layout: class in the top 3 bits, detail in the low 5.
 */
export const ResponseCode = {
  Content: 0x45,             // 2.05
  Changed: 0x44,             // 2.04, success with no further content expected
  BadRequest: 0x80,          // 4.00
  NotFound: 0x84,            // 4.04
  InternalServerError: 0xa0, // 5.00
} as const

export type ResponseCode = (typeof ResponseCode)[keyof typeof ResponseCode]

export function formatResponseCode(code: ResponseCode): string {
  const detail = code & 0x1f
  return `${code >> 5}.${detail.toString().padStart(2, '0')}`
}

/**
 * Outcome of one handled request: status code and number of bytes used in
 * the reply buffer (header + payload).
 */
export interface EncodedReply {
  code: ResponseCode
  length: number
}

export interface SaulRequest {
  payload: string   // request body as text
  query: string     // raw query string, without the leading '?'
}

export const DIAGNOSTIC_DEVICE_NOT_FOUND = 'device not found'
export const DIAGNOSTIC_NO_VALUES = 'no values found'
