// ---------------------------------------------------------------------------
// @pa-trend/signal-core — Types
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Drift detection (EWMA baseline + two-sided CUSUM)
// ---------------------------------------------------------------------------

/**
 * What happens to the baseline when an alarm fires. The accumulators are
 * always re-armed; 'recenter-baseline' also moves μ onto the alarming sample.
 */
export type AlarmPolicy = 'reset-accumulators' | 'recenter-baseline';

export interface DriftConfig {
  /** EWMA decay for the baseline μ (smaller = slower, more drift-sensitive) */
  alphaBaseline: number;
  /** EWMA decay for the residual variance σ² */
  alphaVar: number;
  /** Target shift in σ units; CUSUM reference value k = delta / 2 */
  delta: number;
  /** Decision threshold on S⁺ / S⁻ */
  h: number;
  /** Samples during which alarms are suppressed */
  warmup: number;
  /** Winsorization bound on z; null disables clipping */
  clipZ: number | null;
  /** ε: lower bound on σ² and the guard added to σ before dividing */
  varianceFloor: number;
  /** σ² seed for a fresh series */
  initialVariance: number;
  alarmPolicy: AlarmPolicy;
}

/** Running state of one monitored series. Small, fixed-size, JSON-safe. */
export interface DriftState {
  mu: number;
  variance: number;
  sPlus: number;
  sMinus: number;
  /** Samples folded in so far = zero-based index of the next sample */
  index: number;
}

/** Values recorded for one sample. sPlus/sMinus show the post-alarm reset. */
export interface DriftStepRecord {
  index: number;
  x: number;
  mu: number;
  sigma: number;
  z: number;
  sPlus: number;
  sMinus: number;
  alarmed: boolean;
}

export interface DriftStep extends DriftStepRecord {
  state: DriftState;
}

export interface DriftResult {
  /** Zero-based indices into the input where drift was flagged */
  alarms: number[];
  mu: Float64Array;
  sigma: Float64Array;
  sPlus: Float64Array;
  sMinus: Float64Array;
}

// ---------------------------------------------------------------------------
// Baseline outlier screen
// ---------------------------------------------------------------------------

export type ReferenceDistribution = 't' | 'normal';

export interface PredictionTestOptions {
  /** Two-sided significance level, 0 < alpha < 1 */
  alpha: number;
  /** 'normal' is the large-sample approximation of the Student-t interval */
  distribution: ReferenceDistribution;
}

export interface PredictionTestResult {
  lower: number;
  upper: number;
  pValue: number;
  outlier: boolean;
  mean: number;
  /** Unbiased sample standard deviation of the baseline */
  sd: number;
  /** Critical value at 1 − alpha/2 */
  critical: number;
  /** (candidate − mean) / (sd·√(1 + 1/n)) */
  statistic: number;
  df: number;
}

// ---------------------------------------------------------------------------
// Waveform reduction
// ---------------------------------------------------------------------------

export type QuantizeMode = 'round' | 'floor';

/** One waveform sample: [pressure, time] */
export type WaveformPoint = readonly [pressure: number, time: number];

export interface WaveformOptions {
  /** Minimum spacing between accepted samples (blanking interval) */
  refractory: number;
  quantize: QuantizeMode;
}

export interface WaveformReduction {
  histogram: Int32Array;
  representative: number | null;
}
