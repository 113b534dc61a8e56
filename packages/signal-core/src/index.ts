// ---------------------------------------------------------------------------
// @pa-trend/signal-core — Barrel Export
// ---------------------------------------------------------------------------
// Pure-TypeScript numerics for pressure-ratio monitoring:
// waveform → scalar → outlier screen → drift detector.

export type {
  AlarmPolicy,
  DriftConfig,
  DriftState,
  DriftStepRecord,
  DriftStep,
  DriftResult,
  ReferenceDistribution,
  PredictionTestOptions,
  PredictionTestResult,
  QuantizeMode,
  WaveformPoint,
  WaveformOptions,
  WaveformReduction,
} from './types.js';

export {
  MonitorError,
  InsufficientDataError,
  InvalidConfigurationError,
  InvalidInputError,
  assertFiniteSample,
  type MonitorErrorCode,
} from './errors.js';

// Drift detection (core)
export * from './drift/index.js';

// Baseline outlier screen
export * from './screen/index.js';

// Waveform reduction
export * from './waveform/index.js';
