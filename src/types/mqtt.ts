/**
 * MQTT message types
 */

// Measurement received on <moduleId>/<hardwareId>/<measurement>
export interface MqttMeasurement {
  time: Date
  moduleId: string
  sensorType: string    // Canonical: temperature, humidity, pressure, etc.
  hardwareId: string    // Source hardware: dht22, bmp280, ina219, etc.
  value: number
}

// Outcome of one incoming message, for logs and tests
export type BridgeEvent = 'attached' | 'updated' | 'detached' | 'ignored'
