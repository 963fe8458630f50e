/**
 * Capability categories
 *
 * Closed enumeration of SAUL device classes. Actuators live in 0x40..0x7f,
 * sensors in 0x80..0xbf. The display name table is loaded from
 * categories.json and checked once at load time.
 */
import categoryTable from './categories.json'

export interface CategoryDef {
  code: number
  name: string
}

// ============================================================================
// Well-known codes (used by the fixed endpoints and the MQTT bridge)
// ============================================================================

export const ACT_SERVO = 0x43
export const SENSE_TEMP = 0x82
export const SENSE_HUM = 0x83
export const SENSE_LIGHT = 0x84
export const SENSE_PRESS = 0x89
export const SENSE_CO2 = 0x8f
export const SENSE_TVOC = 0x90
export const SENSE_CURRENT = 0x95
export const SENSE_PM = 0x96
export const SENSE_VOLTAGE = 0x98
export const SENSE_POWER = 0x9a

// ============================================================================
// Lookup tables
// ============================================================================

function buildNameIndex(defs: CategoryDef[]): Map<number, string> {
  const byCode = new Map<number, string>()
  const seenNames = new Set<string>()

  for (const def of defs) {
    if (byCode.has(def.code)) {
      throw new Error(`Duplicate category code ${def.code}`)
    }
    if (seenNames.has(def.name)) {
      throw new Error(`Duplicate category name ${def.name}`)
    }
    byCode.set(def.code, def.name)
    seenNames.add(def.name)
  }

  return byCode
}

const CATEGORY_NAMES = buildNameIndex(categoryTable)

/**
 * Display name of a category code, or null for codes outside the enumeration
 */
export function categoryName(code: number): string | null {
  return CATEGORY_NAMES.get(code) ?? null
}

export function isKnownCategory(code: number): boolean {
  return CATEGORY_NAMES.has(code)
}

export function isActuatorCategory(code: number): boolean {
  return (code & 0xc0) === 0x40
}

/**
 * All defined categories, ordered by code
 */
export function listCategories(): CategoryDef[] {
  return Array.from(CATEGORY_NAMES, ([code, name]) => ({ code, name })).sort((a, b) => a.code - b.code)
}
