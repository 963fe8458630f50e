import type { DeviceDriver, PhysicalReading, PhysicalUnit } from '../../core/types/device'
import { emptyReading, toPhysicalReading } from '../../core/physicalValue'

/**
 * Driver of a device living behind the broker: serves the last value it published
 */
export class RemoteDeviceDriver implements DeviceDriver {
  private reading: PhysicalReading
  private lastSeen: number | null = null

  constructor(private unit: PhysicalUnit) {
    this.reading = emptyReading(unit)
  }

  update(value: number, time: number): void {
    this.reading = toPhysicalReading(value, this.unit)
    this.lastSeen = time
  }

  read(): PhysicalReading {
    return {
      ...this.reading,
      values: [...this.reading.values],
    }
  }

  get lastSeenAt(): number | null {
    return this.lastSeen
  }
}
