// ---------------------------------------------------------------------------
// Baseline Outlier Screen — prediction interval for one new observation
// ---------------------------------------------------------------------------
// With baseline mean x̄, unbiased SD s and n points, a single future value
// from the same distribution lies in
//   x̄ ± t_{1−α/2, n−1} · s·√(1 + 1/n)
// with probability 1 − α. Values outside the interval are flagged.

import type { PredictionTestOptions, PredictionTestResult } from '../types.js';
import { InsufficientDataError, InvalidConfigurationError, assertFiniteSample } from '../errors.js';
import { normalCdf, normalQuantile, studentTCdf, studentTQuantile } from './distributions.js';

export const SCREEN_DEFAULTS: Readonly<PredictionTestOptions> = {
  alpha: 0.01,
  distribution: 't',
};

/** Minimum baseline size: the sample SD needs n − 1 ≥ 1. */
export const MIN_BASELINE_POINTS = 2;

/**
 * Two-sided prediction-interval test of `candidate` against `baseline`.
 *
 * @throws InsufficientDataError if the baseline has fewer than 2 points
 * @throws InvalidConfigurationError if alpha ∉ (0, 1) or the distribution is unknown
 * @throws InvalidInputError if any value is not finite
 */
export function predictionTest(
  baseline: ArrayLike<number>,
  candidate: number,
  options?: Partial<PredictionTestOptions>,
): PredictionTestResult {
  const { alpha, distribution } = { ...SCREEN_DEFAULTS, ...options };
  if (!(alpha > 0 && alpha < 1)) {
    throw new InvalidConfigurationError('alpha', `must be in (0, 1), got ${alpha}`);
  }
  if (distribution !== 't' && distribution !== 'normal') {
    throw new InvalidConfigurationError('distribution', `must be 't' or 'normal', got '${String(distribution)}'`);
  }

  const n = baseline.length;
  if (n < MIN_BASELINE_POINTS) {
    throw new InsufficientDataError(MIN_BASELINE_POINTS, n);
  }
  assertFiniteSample(candidate, 'candidate');

  let sum = 0;
  for (let i = 0; i < n; i++) {
    const v = baseline[i];
    assertFiniteSample(v, 'baseline value', i);
    sum += v;
  }
  const mean = sum / n;

  let ss = 0;
  for (let i = 0; i < n; i++) {
    const diff = baseline[i]! - mean;
    ss += diff * diff;
  }
  const sd = Math.sqrt(ss / (n - 1));
  const sePred = sd * Math.sqrt(1 + 1 / n);
  const df = n - 1;

  const critical = distribution === 't'
    ? studentTQuantile(1 - alpha / 2, df)
    : normalQuantile(1 - alpha / 2);

  const lower = mean - critical * sePred;
  const upper = mean + critical * sePred;

  let statistic: number;
  let pValue: number;
  if (sePred === 0) {
    // Flat baseline: the interval collapses onto the mean
    statistic = candidate === mean ? 0 : Math.sign(candidate - mean) * Infinity;
    pValue = candidate === mean ? 1 : 0;
  } else {
    statistic = (candidate - mean) / sePred;
    const cdf = distribution === 't' ? studentTCdf(Math.abs(statistic), df) : normalCdf(Math.abs(statistic));
    pValue = Math.min(1, Math.max(0, 2 * (1 - cdf)));
  }

  return {
    lower,
    upper,
    pValue,
    outlier: candidate < lower || candidate > upper,
    mean,
    sd,
    critical,
    statistic,
    df,
  };
}
