/**
 * Series Monitor — the per-series pipeline.
 *
 * waveform → representative pressure → outlier screen → drift detector
 *
 * The accepted series is the screen's baseline and the detector's input.
 * Rejected values are logged and dropped; they never reach the detector.
 */

import {
  DriftDetector,
  InvalidConfigurationError,
  InvalidInputError,
  MIN_BASELINE_POINTS,
  assertFiniteSample,
  detectDrift,
  predictionTest,
  reduceWaveform,
  type DriftResult,
  type DriftState,
  type DriftStepRecord,
  type PredictionTestResult,
  type WaveformPoint,
} from '@pa-trend/signal-core'
import {
  SNAPSHOT_SCHEMA_VERSION,
  formatIssues,
  monitorConfigSchema,
  monitorSnapshotSchema,
  seriesIdSchema,
  waveformSchema,
  type MonitorConfig,
  type MonitorConfigInput,
  type MonitorSnapshot,
} from '@pa-trend/shared'
import { createLogger, type Logger } from './logger.js'

export interface SeriesMonitorOptions {
  seriesId: string
  config?: MonitorConfigInput
  /** Defaults to a stdout logger at `config.logLevel` */
  logger?: Logger
}

export type IngestResult =
  | { status: 'empty' }
  | { status: 'rejected'; value: number; screen: PredictionTestResult }
  | {
      status: 'accepted'
      value: number
      index: number
      step: DriftStepRecord
      /** null while bootstrapping (fewer than 2 accepted values, or all equal) */
      screen: PredictionTestResult | null
    }

/** Validate an untyped waveform payload (e.g. parsed JSON). */
export function parseWaveform(payload: unknown): WaveformPoint[] {
  const result = waveformSchema.safeParse(payload)
  if (!result.success) {
    throw new InvalidInputError(`Invalid waveform: ${formatIssues(result.error)}`)
  }
  return result.data
}

/** Enough distinct values for the screen's interval to have non-zero width. */
function hasSpread(baseline: readonly number[]): boolean {
  if (baseline.length < MIN_BASELINE_POINTS) return false
  const first = baseline[0]
  return baseline.some(v => v !== first)
}

function parseMonitorConfig(config: MonitorConfigInput | undefined): MonitorConfig {
  const result = monitorConfigSchema.safeParse(config ?? {})
  if (!result.success) {
    throw new InvalidConfigurationError('monitor', formatIssues(result.error))
  }
  return result.data
}

export class SeriesMonitor {
  readonly seriesId: string
  readonly config: MonitorConfig
  private readonly logger: Logger
  private detector: DriftDetector
  private series: number[] = []
  private alarms: number[] = []

  constructor(options: SeriesMonitorOptions) {
    const id = seriesIdSchema.safeParse(options.seriesId)
    if (!id.success) {
      throw new InvalidConfigurationError('seriesId', formatIssues(id.error))
    }
    this.seriesId = id.data
    this.config = parseMonitorConfig(options.config)
    this.logger = (options.logger ?? createLogger({ level: this.config.logLevel })).child({
      seriesId: this.seriesId,
    })
    this.detector = this.createDetector(null)
  }

  /**
   * Rebuild a monitor from `snapshot()` output. Continuing from the restored
   * monitor gives the same results as never having stopped.
   *
   * @throws InvalidInputError if the snapshot fails validation
   */
  static restore(snapshot: unknown, options: { logger?: Logger } = {}): SeriesMonitor {
    const result = monitorSnapshotSchema.safeParse(snapshot)
    if (!result.success) {
      throw new InvalidInputError(`Invalid monitor snapshot: ${formatIssues(result.error)}`)
    }
    const data = result.data
    const monitor = new SeriesMonitor({ seriesId: data.seriesId, config: data.config, logger: options.logger })
    monitor.series = [...data.series]
    monitor.alarms = [...data.alarms]
    monitor.detector = monitor.createDetector(data.state)
    monitor.logger.info('monitor.restored', { length: data.series.length, alarms: data.alarms.length })
    return monitor
  }

  /** Reduce one session's waveform and ingest its representative pressure. */
  ingestWaveform(waveform: ReadonlyArray<WaveformPoint>): IngestResult {
    const { representative } = reduceWaveform(waveform, this.config.waveform)
    if (representative === null) {
      this.logger.info('waveform.empty', { samples: waveform.length })
      return { status: 'empty' }
    }
    return this.ingestValue(representative)
  }

  /**
   * Screen one value against the accepted series; if accepted, step the detector.
   * Values are accepted unscreened until the baseline holds two distinct values.
   */
  ingestValue(value: number): IngestResult {
    assertFiniteSample(value, 'value', this.series.length)

    // A flat baseline collapses the interval onto its mean; accept unscreened until it spreads
    let screen: PredictionTestResult | null = null
    const baseline = this.baseline()
    if (hasSpread(baseline)) {
      screen = predictionTest(baseline, value, this.config.screen)
      if (screen.outlier) {
        this.logger.warn('value.rejected', {
          value,
          lower: screen.lower,
          upper: screen.upper,
          pValue: screen.pValue,
        })
        return { status: 'rejected', value, screen }
      }
    }

    const step = this.detector.push(value)
    this.series.push(value)
    if (step.alarmed) {
      this.alarms.push(step.index)
      this.logger.warn('drift.alarm', { index: step.index, value, mu: step.mu, sigma: step.sigma, z: step.z })
    }
    this.logger.debug('value.accepted', { index: step.index, value, sPlus: step.sPlus, sMinus: step.sMinus })
    return { status: 'accepted', value, index: step.index, step, screen }
  }

  /** Batch detection over the accepted series. Alarms match the streamed ones. */
  evaluate(): DriftResult {
    return detectDrift(this.series, this.config.drift)
  }

  snapshot(): MonitorSnapshot {
    return {
      version: SNAPSHOT_SCHEMA_VERSION,
      seriesId: this.seriesId,
      config: structuredClone(this.config),
      series: [...this.series],
      state: this.detector.getState(),
      alarms: [...this.alarms],
    }
  }

  /** Forget the series; the next accepted value starts a new baseline. */
  reset(): void {
    const length = this.series.length
    this.series = []
    this.alarms = []
    this.detector.reset()
    this.logger.info('monitor.reset', { length })
  }

  getSeries(): readonly number[] {
    return [...this.series]
  }

  getAlarms(): readonly number[] {
    return [...this.alarms]
  }

  getState(): DriftState | null {
    return this.detector.getState()
  }

  /** Recent detector steps, oldest first (requires `historySize` > 0). */
  recent(): DriftStepRecord[] {
    return this.detector.recent()
  }

  get length(): number {
    return this.series.length
  }

  private baseline(): number[] {
    const window = this.config.baselineWindow
    return window === null ? this.series : this.series.slice(-window)
  }

  private createDetector(state: DriftState | null): DriftDetector {
    return new DriftDetector({ config: this.config.drift, historySize: this.config.historySize, state })
  }
}
