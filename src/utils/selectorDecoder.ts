/**
 * Request selector decoding
 * Extracts small unsigned integers from compact request payloads and queries.
 * Only the syntax is checked here: whether a device or category exists is
 * decided by the caller.
 */

export const MAX_INDEX_DIGITS = 5

/** Query key carrying a category code: `classid=NNN` */
export const CATEGORY_QUERY_KEY = 'classid'

const CATEGORY_QUERY_PREFIX = `${CATEGORY_QUERY_KEY}=`
const MAX_CATEGORY_DIGITS = 3

export const CATEGORY_QUERY_MIN_LENGTH = CATEGORY_QUERY_PREFIX.length + 1
export const CATEGORY_QUERY_MAX_LENGTH = CATEGORY_QUERY_PREFIX.length + MAX_CATEGORY_DIGITS

const DIGITS = /^[0-9]+$/

/**
 * Decode a zero-based device index
 * @param text - Request payload, at most 5 ASCII digits (e.g. "3")
 * @returns The index, or null when the payload is malformed
 *
 * @example
 * decodeIndex('42')     // => 42
 * decodeIndex('123456') // => null (too long, not parsed)
 */
export function decodeIndex(text: string): number | null {
  if (text.length > MAX_INDEX_DIGITS) {
    return null
  }
  if (!DIGITS.test(text)) {
    return null
  }
  return parseInt(text, 10)
}

/**
 * Decode a category code from a query string
 * @param query - Raw query text (e.g. "classid=130")
 * @returns The category code, or null when the query is malformed
 *
 * @example
 * decodeCategory('classid=130') // => 130
 * decodeCategory('c=1')         // => null (length out of range, not inspected)
 */
export function decodeCategory(query: string): number | null {
  if (query.length < CATEGORY_QUERY_MIN_LENGTH || query.length > CATEGORY_QUERY_MAX_LENGTH) {
    return null
  }
  if (!query.startsWith(CATEGORY_QUERY_PREFIX)) {
    return null
  }

  const digits = query.slice(CATEGORY_QUERY_PREFIX.length)
  if (!DIGITS.test(digits)) {
    return null
  }
  return parseInt(digits, 10)
}
