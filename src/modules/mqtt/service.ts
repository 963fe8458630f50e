/**
 * MQTT Service - Pure functions for the device bridge
 *
 * Topic parsing and measurement-to-category mapping.
 * No dependencies on Fastify, the broker or the registry.
 */
import type { PhysicalUnit } from '../../core/types/device'
import {
    ACT_SERVO,
    SENSE_CO2,
    SENSE_CURRENT,
    SENSE_HUM,
    SENSE_LIGHT,
    SENSE_PM,
    SENSE_POWER,
    SENSE_PRESS,
    SENSE_TEMP,
    SENSE_TVOC,
    SENSE_VOLTAGE,
} from '../../core/categories'

// ============================================================================
// Types
// ============================================================================

export interface TopicParts {
    moduleId: string
    category: string | null
    sensorType: string | null
    parts: string[]
}

export interface ParsedMeasurement {
    moduleId: string
    sensorType: string
    hardwareId: string
    value: number
}

export interface MeasurementCategory {
    category: number
    unit: PhysicalUnit
    factor: number      // multiplier from the published unit to `unit`
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Canonical sensor key mappings - hardware specific names are folded into
 * the canonical measurement names below.
 */
export const CANONICAL_MAPPINGS: Record<string, Record<string, string>> = {
    bmp280: {
        temperature: 'temperature',
        pressure: 'pressure',
    },
    sht40: {
        temperature: 'temperature',
        humidity: 'humidity',
    },
    dht22: {
        temperature: 'temperature',
        humidity: 'humidity',
    },
    sgp30: {
        eco2: 'co2',
        tvoc: 'tvoc',
    },
    sps30: {
        pm1: 'pm',
        pm25: 'pm',
        pm4: 'pm',
        pm10: 'pm',
    },
    ina219: {
        bus_voltage: 'voltage',
        current: 'current',
        power: 'power',
    },
    bh1750: {
        lux: 'light',
    },
    sg90: {
        angle: 'servo',
    },
}

/**
 * Capability category and unit of each canonical measurement
 */
export const MEASUREMENT_CATEGORIES: Record<string, MeasurementCategory> = {
    temperature: { category: SENSE_TEMP, unit: 'celsius', factor: 1 },
    humidity: { category: SENSE_HUM, unit: 'percent', factor: 1 },
    pressure: { category: SENSE_PRESS, unit: 'pascal', factor: 100 },   // published in hPa
    co2: { category: SENSE_CO2, unit: 'ppm', factor: 1 },
    tvoc: { category: SENSE_TVOC, unit: 'ppb', factor: 1 },
    pm: { category: SENSE_PM, unit: 'ug_m3', factor: 1 },
    voltage: { category: SENSE_VOLTAGE, unit: 'volt', factor: 1 },
    current: { category: SENSE_CURRENT, unit: 'ampere', factor: 1 },
    power: { category: SENSE_POWER, unit: 'watt', factor: 1 },
    light: { category: SENSE_LIGHT, unit: 'lux', factor: 1 },
    servo: { category: ACT_SERVO, unit: 'degree', factor: 1 },
}

/**
 * Module IDs to skip (test patterns)
 */
const SKIP_MODULE_PREFIXES = ['home', 'dev'] as const
const SKIP_MODULE_IDS = ['test-module'] as const

// ============================================================================
// Pure Functions
// ============================================================================

/**
 * Parse MQTT topic structure: module_id/hardware_id/measurement
 *
 * @param topic - The MQTT topic string
 * @returns Parsed topic parts or null if topic should be skipped
 *
 * @example
 * parseTopic('greenhouse/dht22/temperature')
 * // => { moduleId: 'greenhouse', category: 'dht22', sensorType: 'temperature', parts: [...] }
 */
export function parseTopic(topic: string): TopicParts | null {
    const parts = topic.split('/')

    if (parts.length < 2) {
        return null
    }

    const moduleId = parts[0]

    for (const prefix of SKIP_MODULE_PREFIXES) {
        if (moduleId.startsWith(prefix)) {
            return null
        }
    }

    if ((SKIP_MODULE_IDS as readonly string[]).includes(moduleId)) {
        return null
    }

    return {
        moduleId,
        category: parts[1],
        sensorType: parts.length > 2 ? parts[2] : null,
        parts,
    }
}

/**
 * Check if a topic carries a measurement: exactly three non-empty levels,
 * none of the module status or config topics
 */
export function isMeasurementTopic(parsed: TopicParts): boolean {
    const { category, parts } = parsed

    return (
        parts.length === 3 &&
        parts.every(part => part.length > 0) &&
        category !== 'sensors' &&
        category !== 'system' &&
        parts[2] !== 'status' &&
        parts[2] !== 'config'
    )
}

/**
 * Map hardware-specific measurement name to canonical name
 *
 * @example
 * getCanonicalSensorType('sgp30', 'eco2')    // => 'co2'
 * getCanonicalSensorType('unknown', 'custom') // => 'custom' (passthrough)
 */
export function getCanonicalSensorType(hardwareId: string, measurementType: string): string {
    const hardwareMap = CANONICAL_MAPPINGS[hardwareId]
    return hardwareMap?.[measurementType] ?? measurementType
}

/**
 * Capability category for a canonical measurement, or null when it has none
 */
export function getMeasurementCategory(sensorType: string): MeasurementCategory | null {
    return Object.prototype.hasOwnProperty.call(MEASUREMENT_CATEGORIES, sensorType)
        ? MEASUREMENT_CATEGORIES[sensorType]
        : null
}

/**
 * Parse a measurement from topic and payload
 *
 * @returns Parsed measurement or null if the payload is not a finite number
 */
export function parseMeasurement(parsed: TopicParts, payload: string): ParsedMeasurement | null {
    const { moduleId, parts } = parsed

    if (parts.length !== 3) {
        return null
    }

    const trimmed = payload.trim()
    if (trimmed.length === 0) {
        return null
    }

    const value = Number(trimmed)
    if (!Number.isFinite(value)) {
        return null
    }

    const hardwareId = parts[1]

    return {
        moduleId,
        sensorType: getCanonicalSensorType(hardwareId, parts[2]),
        hardwareId,
        value,
    }
}

/**
 * Stable key of a bridged device (one device per measurement topic)
 */
export function buildDeviceKey(parsed: TopicParts): string {
    return parsed.parts.join('/')
}
