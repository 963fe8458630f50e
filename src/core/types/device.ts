/**
 * Core types for the device directory.
 * Defines device records, drivers, physical readings and the directory accessor.
 */

// ============================================================================
// Physical readings
// ============================================================================

export type PhysicalUnit =
  | 'undef'
  | 'celsius'
  | 'percent'
  | 'pascal'
  | 'ppm'
  | 'ppb'
  | 'ug_m3'
  | 'volt'
  | 'ampere'
  | 'watt'
  | 'lux'
  | 'degree'

export const PHYSICAL_CHANNELS = 3

export interface PhysicalReading {
  values: number[]        // PHYSICAL_CHANNELS signed 16-bit channels
  unit: PhysicalUnit
  scale: number           // real value = values[i] * 10^scale
  dimensions: number      // valid channels, <= 0 when nothing could be read
}

// ============================================================================
// Devices
// ============================================================================

export interface DeviceDriver {
  read(): PhysicalReading
}

export interface DeviceRecord {
  readonly name: string       // "tmp0", "dht22"
  readonly category: number   // capability category code (see core/categories)
  readonly driver: DeviceDriver
}

// ============================================================================
// Directory accessor
// ============================================================================

/**
 * Read-side view of the device list consumed by request handlers.
 * Every call walks the live list; nothing is cached between calls.
 */
export interface DeviceDirectory {
  count(): number
  findByIndex(index: number): DeviceRecord | null
  findFirstByCategory(category: number): DeviceRecord | null
  read(device: DeviceRecord): PhysicalReading
  categoryName(category: number): string | null
}
