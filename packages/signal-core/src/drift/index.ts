// Drift detection — EWMA baseline + two-sided CUSUM
export { DRIFT_DEFAULTS, resolveDriftConfig } from './config.js';
export { initialDriftState, stepDrift, stepDriftResolved, detectDrift } from './ewma-cusum.js';
export { DriftHistory } from './history.js';
export { DriftDetector, type DriftDetectorOptions } from './detector.js';
