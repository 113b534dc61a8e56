// ---------------------------------------------------------------------------
// Stateful drift detector for a single series
// ---------------------------------------------------------------------------

import type { DriftConfig, DriftState, DriftStepRecord } from '../types.js';
import { resolveDriftConfig } from './config.js';
import { stepDriftResolved } from './ewma-cusum.js';
import { DriftHistory } from './history.js';

export interface DriftDetectorOptions {
  config?: Partial<DriftConfig>;
  /** Keep the last N step records; 0 keeps none */
  historySize?: number;
  /** Resume from a checkpointed state */
  state?: DriftState | null;
}

/**
 * Owns the (μ, σ², S⁺, S⁻) state of one series.
 *
 * One instance per series, driven by a single owner. Independent instances
 * share nothing, so separate series can be processed side by side.
 */
export class DriftDetector {
  readonly config: DriftConfig;
  private state: DriftState | null;
  private readonly history: DriftHistory<DriftStepRecord> | null;
  private nAlarms: number;

  constructor(options: DriftDetectorOptions = {}) {
    this.config = resolveDriftConfig(options.config);
    this.state = options.state ?? null;
    const historySize = options.historySize ?? 0;
    this.history = historySize > 0 ? new DriftHistory<DriftStepRecord>(historySize) : null;
    this.nAlarms = 0;
  }

  /**
   * Fold in one sample.
   * @returns The recorded step (alarmed = true when drift was flagged here)
   */
  push(x: number): DriftStepRecord {
    const { state, ...record } = stepDriftResolved(this.state, x, this.config);
    this.state = state;
    if (record.alarmed) this.nAlarms++;
    this.history?.push(record);
    return record;
  }

  /** Snapshot of the current state, null before the first sample. */
  getState(): DriftState | null {
    return this.state === null ? null : { ...this.state };
  }

  /** Recent step records, oldest first. Empty when history is disabled. */
  recent(): DriftStepRecord[] {
    return this.history?.toArray() ?? [];
  }

  /** Alarms raised since construction or the last reset. */
  get alarmCount(): number {
    return this.nAlarms;
  }

  /** Discard all state; the next sample seeds a new series. */
  reset(): void {
    this.state = null;
    this.nAlarms = 0;
    this.history?.clear();
  }
}
