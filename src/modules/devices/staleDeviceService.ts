import type { FastifyBaseLogger } from 'fastify'
import type { MqttDeviceBridge } from '../mqtt/deviceBridge'

/**
 * Periodically detaches bridged devices that stopped publishing
 */
export class StaleDeviceService {
    private isRunning = false
    private intervalId: NodeJS.Timeout | null = null

    constructor(
        private bridge: Pick<MqttDeviceBridge, 'removeStale'>,
        private logger: Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn'>
    ) {}

    /**
     * Start the service
     * @param maxAgeSeconds - Devices silent for longer than this are detached
     * @param intervalSeconds - Delay between two sweeps
     */
    start(maxAgeSeconds: number, intervalSeconds: number = Math.max(1, Math.floor(maxAgeSeconds / 2))) {
        if (this.isRunning) {
            this.logger.warn('[REGISTRY] Stale device service already running')
            return
        }

        this.isRunning = true
        this.logger.info(`[REGISTRY] Stale device service started (max age: ${maxAgeSeconds}s, interval: ${intervalSeconds}s)`)

        this.intervalId = setInterval(() => this.sweep(maxAgeSeconds), intervalSeconds * 1000)
        this.intervalId.unref()
    }

    stop() {
        if (this.intervalId) {
            clearInterval(this.intervalId)
            this.intervalId = null
        }
        this.isRunning = false
        this.logger.info('[REGISTRY] Stale device service stopped')
    }

    get running(): boolean {
        return this.isRunning
    }

    private sweep(maxAgeSeconds: number) {
        this.logger.debug('[REGISTRY] Sweeping stale devices...')
        this.bridge.removeStale(maxAgeSeconds * 1000)
    }
}
