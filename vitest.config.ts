import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    env: {
      MQTT_ENABLED: 'false',
      LOG_LEVEL: 'silent',
    },
  },
})
