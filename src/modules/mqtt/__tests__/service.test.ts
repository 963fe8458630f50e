/**
 * Unit tests for MQTT Service
 */
import { describe, it, expect } from 'vitest'
import {
    parseTopic,
    isMeasurementTopic,
    getCanonicalSensorType,
    getMeasurementCategory,
    parseMeasurement,
    buildDeviceKey,
    MEASUREMENT_CATEGORIES,
} from '../service'
import { ACT_SERVO, SENSE_PRESS, SENSE_TEMP, categoryName } from '../../../core/categories'

// ============================================================================
// parseTopic Tests
// ============================================================================

describe('parseTopic', () => {
    it('should parse a three-part measurement topic', () => {
        expect(parseTopic('greenhouse/dht22/temperature')).toEqual({
            moduleId: 'greenhouse',
            category: 'dht22',
            sensorType: 'temperature',
            parts: ['greenhouse', 'dht22', 'temperature'],
        })
    })

    it('should parse a two-part topic', () => {
        expect(parseTopic('greenhouse/system')).toEqual({
            moduleId: 'greenhouse',
            category: 'system',
            sensorType: null,
            parts: ['greenhouse', 'system'],
        })
    })

    it('should return null for single-part topics', () => {
        expect(parseTopic('single')).toBeNull()
        expect(parseTopic('')).toBeNull()
    })

    it('should skip test modules', () => {
        expect(parseTopic('home/dht22/temperature')).toBeNull()
        expect(parseTopic('dev-bench/dht22/temperature')).toBeNull()
        expect(parseTopic('test-module/dht22/temperature')).toBeNull()
    })
})

// ============================================================================
// isMeasurementTopic Tests
// ============================================================================

describe('isMeasurementTopic', () => {
    const check = (topic: string) => {
        const parsed = parseTopic(topic)
        return parsed !== null && isMeasurementTopic(parsed)
    }

    it('should accept module/hardware/measurement', () => {
        expect(check('greenhouse/bmp280/pressure')).toBe(true)
    })

    it('should reject status and config topics', () => {
        expect(check('greenhouse/sensors/status')).toBe(false)
        expect(check('greenhouse/sensors/config')).toBe(false)
        expect(check('greenhouse/system/config')).toBe(false)
        expect(check('greenhouse/dht22/status')).toBe(false)
    })

    it('should reject topics with empty levels or the wrong depth', () => {
        expect(check('greenhouse//temperature')).toBe(false)
        expect(check('greenhouse/dht22')).toBe(false)
        expect(check('greenhouse/dht22/temperature/raw')).toBe(false)
    })
})

// ============================================================================
// Mapping Tests
// ============================================================================

describe('getCanonicalSensorType', () => {
    it('should fold hardware-specific names', () => {
        expect(getCanonicalSensorType('sgp30', 'eco2')).toBe('co2')
        expect(getCanonicalSensorType('ina219', 'bus_voltage')).toBe('voltage')
        expect(getCanonicalSensorType('sg90', 'angle')).toBe('servo')
    })

    it('should pass unknown names through', () => {
        expect(getCanonicalSensorType('unknown', 'custom')).toBe('custom')
        expect(getCanonicalSensorType('dht22', 'temperature')).toBe('temperature')
    })
})

describe('getMeasurementCategory', () => {
    it('should map measurements to categories and units', () => {
        expect(getMeasurementCategory('temperature')).toEqual({ category: SENSE_TEMP, unit: 'celsius', factor: 1 })
        expect(getMeasurementCategory('pressure')).toEqual({ category: SENSE_PRESS, unit: 'pascal', factor: 100 })
        expect(getMeasurementCategory('servo')?.category).toBe(ACT_SERVO)
    })

    it('should return null for unmapped measurements', () => {
        expect(getMeasurementCategory('custom')).toBeNull()
        expect(getMeasurementCategory('toString')).toBeNull()
    })

    it('should only use defined categories', () => {
        for (const mapping of Object.values(MEASUREMENT_CATEGORIES)) {
            expect(categoryName(mapping.category)).not.toBeNull()
        }
    })
})

// ============================================================================
// parseMeasurement Tests
// ============================================================================

describe('parseMeasurement', () => {
    const parsed = (topic: string) => {
        const result = parseTopic(topic)
        if (!result) throw new Error(`unparsable topic ${topic}`)
        return result
    }

    it('should parse a numeric payload', () => {
        expect(parseMeasurement(parsed('greenhouse/sgp30/eco2'), '415')).toEqual({
            moduleId: 'greenhouse',
            sensorType: 'co2',
            hardwareId: 'sgp30',
            value: 415,
        })
    })

    it('should trim whitespace', () => {
        expect(parseMeasurement(parsed('greenhouse/dht22/temperature'), ' 22.5\n')?.value).toBe(22.5)
    })

    it('should reject non-numeric and non-finite payloads', () => {
        const topic = parsed('greenhouse/dht22/temperature')
        expect(parseMeasurement(topic, 'abc')).toBeNull()
        expect(parseMeasurement(topic, '22.5abc')).toBeNull()
        expect(parseMeasurement(topic, 'Infinity')).toBeNull()
        expect(parseMeasurement(topic, '   ')).toBeNull()
    })

    it('should reject topics that are not three levels deep', () => {
        expect(parseMeasurement(parsed('greenhouse/system'), '1')).toBeNull()
    })
})

describe('buildDeviceKey', () => {
    it('should join the topic levels', () => {
        const result = parseTopic('greenhouse/dht22/temperature')
        expect(result && buildDeviceKey(result)).toBe('greenhouse/dht22/temperature')
    })
})
