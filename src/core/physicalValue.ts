import { PHYSICAL_CHANNELS, type PhysicalReading, type PhysicalUnit } from './types/device'

export const INT16_MAX = 32767
export const INT16_MIN = -32768

// Finest resolution kept when fitting a real number (two decimals)
const MIN_SCALE = -2

function fitsInt16(value: number): boolean {
  return value >= INT16_MIN && value <= INT16_MAX
}

/**
 * Fit a real number into a signed 16-bit mantissa and a power of ten scale.
 *
 * The finest scale that fits is used, then trailing zeros are dropped so that
 * 22.5 becomes { value: 225, scale: -1 } and 101325 becomes { value: 10133, scale: 1 }.
 */
export function fitPhysicalValue(value: number): { value: number; scale: number } {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot fit non-finite value ${value}`)
  }

  let scale = MIN_SCALE
  let scaled = Math.round(value * 10 ** -scale)

  while (!fitsInt16(scaled)) {
    scale++
    scaled = Math.round(value * 10 ** -scale)
  }

  while (scale < 0 && scaled % 10 === 0) {
    scaled = scaled / 10
    scale++
  }

  // Avoid leaking -0 into replies
  return { value: scaled === 0 ? 0 : scaled, scale }
}

/**
 * Build a single-channel reading from a real number
 */
export function toPhysicalReading(value: number, unit: PhysicalUnit): PhysicalReading {
  const fitted = fitPhysicalValue(value)
  const values = new Array<number>(PHYSICAL_CHANNELS).fill(0)
  values[0] = fitted.value

  return {
    values,
    unit,
    scale: fitted.scale,
    dimensions: 1,
  }
}

/**
 * Reading returned by devices that have nothing to report yet
 */
export function emptyReading(unit: PhysicalUnit = 'undef'): PhysicalReading {
  return {
    values: new Array<number>(PHYSICAL_CHANNELS).fill(0),
    unit,
    scale: 0,
    dimensions: 0,
  }
}
