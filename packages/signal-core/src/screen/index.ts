// Baseline outlier screen
export { predictionTest, SCREEN_DEFAULTS, MIN_BASELINE_POINTS } from './prediction-test.js';
export {
  logGamma,
  regularizedIncompleteBeta,
  studentTCdf,
  studentTQuantile,
  erf,
  normalCdf,
  normalQuantile,
} from './distributions.js';
