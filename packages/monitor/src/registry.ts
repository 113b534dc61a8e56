/**
 * Monitor Registry — one SeriesMonitor per series id.
 *
 * Monitors are created on first use with the registry's shared config.
 */

import { loadMonitorConfig, type Env } from '@pa-trend/config'
import type { MonitorConfigInput, MonitorSnapshot } from '@pa-trend/shared'
import { createLogger, type Logger } from './logger.js'
import { SeriesMonitor } from './series-monitor.js'

export interface MonitorRegistryOptions {
  config?: MonitorConfigInput
  logger?: Logger
}

export class MonitorRegistry {
  private readonly monitors = new Map<string, SeriesMonitor>()
  private readonly config: MonitorConfigInput | undefined
  private readonly logger: Logger | undefined

  constructor(options: MonitorRegistryOptions = {}) {
    this.config = options.config
    this.logger = options.logger
  }

  /** Registry configured from PA_TREND_* variables. */
  static fromEnv(env?: Env, options: { logger?: Logger } = {}): MonitorRegistry {
    const config = loadMonitorConfig(env)
    return new MonitorRegistry({
      config,
      logger: options.logger ?? createLogger({ level: config.logLevel }),
    })
  }

  /** The monitor for `seriesId`, created if missing. */
  get(seriesId: string): SeriesMonitor {
    let monitor = this.monitors.get(seriesId)
    if (!monitor) {
      monitor = new SeriesMonitor({ seriesId, config: this.config, logger: this.logger })
      this.monitors.set(seriesId, monitor)
    }
    return monitor
  }

  has(seriesId: string): boolean {
    return this.monitors.has(seriesId)
  }

  delete(seriesId: string): boolean {
    return this.monitors.delete(seriesId)
  }

  ids(): string[] {
    return [...this.monitors.keys()]
  }

  get size(): number {
    return this.monitors.size
  }

  /** Restore a monitor from a snapshot, replacing any monitor with the same id. */
  restore(snapshot: unknown): SeriesMonitor {
    const monitor = SeriesMonitor.restore(snapshot, { logger: this.logger })
    this.monitors.set(monitor.seriesId, monitor)
    return monitor
  }

  snapshotAll(): MonitorSnapshot[] {
    return [...this.monitors.values()].map(m => m.snapshot())
  }
}
