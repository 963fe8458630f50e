/**
 * Device Service - Pure functions building the inspection responses
 *
 * No dependencies on Fastify.
 */
import type { DeviceRecord } from '../../core/types/device'
import { isActuatorCategory, type CategoryDef } from '../../core/categories'
import type { CategoryListResponse, DeviceListResponse, DeviceSummary } from './schema'

/**
 * Summaries of devices in traversal order
 */
export function buildDeviceList(
    devices: Iterable<DeviceRecord>,
    getCategoryName: (category: number) => string | null
): DeviceListResponse {
    const summaries: DeviceSummary[] = []
    let index = 0

    for (const device of devices) {
        summaries.push({
            index,
            name: device.name,
            category: device.category,
            categoryName: getCategoryName(device.category) ?? 'CLASS_UNKNOWN',
        })
        index++
    }

    return {
        devices: summaries,
        count: summaries.length,
    }
}

export function buildCategoryList(categories: CategoryDef[]): CategoryListResponse {
    return {
        categories: categories.map((def): CategoryListResponse['categories'][number] => ({
            code: def.code,
            name: def.name,
            kind: isActuatorCategory(def.code) ? 'actuator' : 'sensor',
        })),
    }
}
