import { describe, it, expect } from 'vitest'
import { fitPhysicalValue, toPhysicalReading, emptyReading } from '../physicalValue'

describe('fitPhysicalValue', () => {
    it('should keep integers with scale 0', () => {
        expect(fitPhysicalValue(22)).toEqual({ value: 22, scale: 0 })
        expect(fitPhysicalValue(-40)).toEqual({ value: -40, scale: 0 })
        expect(fitPhysicalValue(0)).toEqual({ value: 0, scale: 0 })
    })

    it('should keep up to two decimals and drop trailing zeros', () => {
        expect(fitPhysicalValue(22.5)).toEqual({ value: 225, scale: -1 })
        expect(fitPhysicalValue(3.3)).toEqual({ value: 33, scale: -1 })
        expect(fitPhysicalValue(-5.25)).toEqual({ value: -525, scale: -2 })
        expect(fitPhysicalValue(0.1)).toEqual({ value: 1, scale: -1 })
    })

    it('should round below two decimals', () => {
        expect(fitPhysicalValue(22.456)).toEqual({ value: 2246, scale: -2 })
    })

    it('should coarsen values that do not fit in 16 bits', () => {
        expect(fitPhysicalValue(101325)).toEqual({ value: 10133, scale: 1 })
        expect(fitPhysicalValue(32767)).toEqual({ value: 32767, scale: 0 })
        expect(fitPhysicalValue(1000.5)).toEqual({ value: 10005, scale: -1 })
    })

    it('should throw for non-finite values', () => {
        expect(() => fitPhysicalValue(Infinity)).toThrow(RangeError)
        expect(() => fitPhysicalValue(NaN)).toThrow(RangeError)
    })
})

describe('toPhysicalReading', () => {
    it('should fill channel 0 only', () => {
        expect(toPhysicalReading(22.5, 'celsius')).toEqual({
            values: [225, 0, 0],
            unit: 'celsius',
            scale: -1,
            dimensions: 1,
        })
    })
})

describe('emptyReading', () => {
    it('should report no dimensions', () => {
        expect(emptyReading('percent')).toEqual({
            values: [0, 0, 0],
            unit: 'percent',
            scale: 0,
            dimensions: 0,
        })
    })
})
