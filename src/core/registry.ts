/**
 * Device Registry
 *
 * Ordered, singly linked list of registered devices (registration order).
 * Devices are attached and detached at any time by bridges; readers walk the
 * live list on every call and stop at the terminal null link.
 */
import type { DeviceDirectory, DeviceRecord, PhysicalReading } from './types/device'
import { categoryName } from './categories'

interface RegistryEntry {
  device: DeviceRecord
  next: RegistryEntry | null
}

// ============================================================================
// Registry Class
// ============================================================================

export class DeviceRegistry implements DeviceDirectory {
  private head: RegistryEntry | null = null

  /**
   * Append a device at the end of the list
   */
  add(device: DeviceRecord): void {
    if (categoryName(device.category) === null) {
      throw new Error(`Cannot register "${device.name}": unknown category ${device.category}`)
    }

    let tail: RegistryEntry | null = null
    for (let entry = this.head; entry; entry = entry.next) {
      if (entry.device === device) {
        throw new Error(`Device "${device.name}" is already registered`)
      }
      tail = entry
    }

    const entry: RegistryEntry = { device, next: null }
    if (tail) {
      tail.next = entry
    } else {
      this.head = entry
    }
  }

  /**
   * Unlink a device (matched by identity)
   * @returns false when the device was not registered
   */
  remove(device: DeviceRecord): boolean {
    let previous: RegistryEntry | null = null
    let current = this.head

    while (current) {
      if (current.device === device) {
        if (previous) {
          previous.next = current.next
        } else {
          this.head = current.next
        }
        return true
      }
      previous = current
      current = current.next
    }

    return false
  }

  count(): number {
    let count = 0
    for (let entry = this.head; entry; entry = entry.next) {
      count++
    }
    return count
  }

  findByIndex(index: number): DeviceRecord | null {
    if (!Number.isInteger(index) || index < 0) return null

    let position = 0
    for (let entry = this.head; entry; entry = entry.next) {
      if (position === index) return entry.device
      position++
    }
    return null
  }

  findFirstByCategory(category: number): DeviceRecord | null {
    for (let entry = this.head; entry; entry = entry.next) {
      if (entry.device.category === category) return entry.device
    }
    return null
  }

  read(device: DeviceRecord): PhysicalReading {
    return device.driver.read()
  }

  categoryName(category: number): string | null {
    return categoryName(category)
  }

  /**
   * Iterate over devices in registration order
   */
  *devices(): IterableIterator<DeviceRecord> {
    for (let entry = this.head; entry; entry = entry.next) {
      yield entry.device
    }
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

export const registry = new DeviceRegistry()
