import type { FastifyBaseLogger } from 'fastify'
import type { DeviceRecord } from '../../core/types/device'
import type { DeviceRegistry } from '../../core/registry'
import type { BridgeEvent, MqttMeasurement } from '../../types/mqtt'
import { RemoteDeviceDriver } from './remoteDriver'
import {
  buildDeviceKey,
  getMeasurementCategory,
  isMeasurementTopic,
  parseMeasurement,
  parseTopic,
} from './service'

export type BridgeLogger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'success'>

interface BridgedDevice {
  device: DeviceRecord
  driver: RemoteDeviceDriver
}

/**
 * Attaches devices announced on measurement topics to the registry and keeps
 * their last value. One device per topic, named after the hardware id.
 */
export class MqttDeviceBridge {
  private bridged = new Map<string, BridgedDevice>()

  constructor(
    private registry: DeviceRegistry,
    private logger: BridgeLogger,
    private now: () => number = Date.now
  ) {}

  /**
   * Handle one broker message. An empty payload (cleared retained message)
   * detaches the device of that topic.
   */
  handleMessage(topic: string, message: Buffer | string): BridgeEvent {
    const parsed = parseTopic(topic)
    if (!parsed || !isMeasurementTopic(parsed)) {
      return 'ignored'
    }

    const key = buildDeviceKey(parsed)
    const payload = message.toString()

    if (payload.length === 0) {
      return this.detach(key) ? 'detached' : 'ignored'
    }

    const measurement = parseMeasurement(parsed, payload)
    if (!measurement) {
      this.logger.debug({ msg: `[MQTT] Invalid measurement payload on ${topic}`, topic })
      return 'ignored'
    }

    const mapping = getMeasurementCategory(measurement.sensorType)
    if (!mapping) {
      this.logger.debug({ msg: `[MQTT] No device category for "${measurement.sensorType}"`, topic })
      return 'ignored'
    }

    const time = this.now()
    const existing = this.bridged.get(key)
    if (existing) {
      existing.driver.update(measurement.value * mapping.factor, time)
      return 'updated'
    }

    const driver = new RemoteDeviceDriver(mapping.unit)
    driver.update(measurement.value * mapping.factor, time)
    const device: DeviceRecord = {
      name: measurement.hardwareId,
      category: mapping.category,
      driver,
    }

    this.registry.add(device)
    this.bridged.set(key, { device, driver })

    const record: MqttMeasurement = { time: new Date(time), ...measurement }
    this.logger.success({
      msg: `✓ [MQTT] Device attached: ${measurement.hardwareId} (${measurement.sensorType}) from ${measurement.moduleId}`,
      direction: 'IN',
      key,
      measurement: record,
    })
    return 'attached'
  }

  /**
   * Detach devices that did not publish for more than maxAgeMs
   * @returns Keys of detached devices
   */
  removeStale(maxAgeMs: number): string[] {
    const now = this.now()
    const removed: string[] = []

    for (const [key, entry] of this.bridged) {
      const lastSeen = entry.driver.lastSeenAt
      if (lastSeen === null || now - lastSeen > maxAgeMs) {
        this.registry.remove(entry.device)
        this.bridged.delete(key)
        removed.push(key)
      }
    }

    if (removed.length > 0) {
      this.logger.info({
        msg: `[MQTT] Detached ${removed.length} stale devices: ${removed.join(', ')}`,
        count: removed.length,
        devices: removed,
      })
    }

    return removed
  }

  detachAll(): void {
    for (const entry of this.bridged.values()) {
      this.registry.remove(entry.device)
    }
    this.bridged.clear()
  }

  get size(): number {
    return this.bridged.size
  }

  private detach(key: string): boolean {
    const entry = this.bridged.get(key)
    if (!entry) return false

    this.registry.remove(entry.device)
    this.bridged.delete(key)
    this.logger.info({ msg: `[MQTT] Device detached: ${key}`, direction: 'IN', key })
    return true
  }
}
