// ---------------------------------------------------------------------------
// EWMA-CUSUM Drift Detection
// ---------------------------------------------------------------------------
// Slow EWMA baseline μ and EWMA residual variance σ² standardize each sample;
// a two-sided CUSUM on the standardized residual accumulates evidence of a
// sustained shift of `delta` σ:
//
//   μ_t  = (1 − α_b)·μ_{t−1} + α_b·x_t
//   r_t  = x_t − μ_t
//   σ²_t = max((1 − α_v)·σ²_{t−1} + α_v·r_t², ε)
//   z_t  = clip(r_t / (σ_t + ε), ±clipZ)
//   S⁺_t = max(0, S⁺_{t−1} + z_t − k)      k = delta / 2
//   S⁻_t = max(0, S⁻_{t−1} − z_t − k)
//
// Alarm when t ≥ warmup and S⁺_t > h or S⁻_t > h; both paths re-arm at 0.

import type { DriftConfig, DriftResult, DriftState, DriftStep } from '../types.js';
import { InvalidInputError, assertFiniteSample } from '../errors.js';
import { resolveDriftConfig } from './config.js';

/**
 * Seed state for a fresh series. The seeding sample is not folded in yet:
 * pass it to stepDrift as the first observation.
 */
export function initialDriftState(x0: number, config: DriftConfig): DriftState {
  assertFiniteSample(x0, 'seed sample');
  return {
    mu: x0,
    variance: config.initialVariance,
    sPlus: 0,
    sMinus: 0,
    index: 0,
  };
}

/**
 * Fold one sample into a series' state.
 *
 * The input state is never mutated. Passing `null` starts a new series seeded
 * from `x`. `config` must already be resolved: batch callers resolve once
 * instead of per sample.
 *
 * @throws InvalidInputError if `x` is not finite, or so far from μ that r or r² overflows
 */
export function stepDriftResolved(state: DriftState | null, x: number, config: DriftConfig): DriftStep {
  const prev = state ?? initialDriftState(x, config);
  assertFiniteSample(x, 'sample', prev.index);

  const eps = config.varianceFloor;
  const k = config.delta / 2;

  let mu = (1 - config.alphaBaseline) * prev.mu + config.alphaBaseline * x;
  const r = x - mu;
  const variance = Math.max((1 - config.alphaVar) * prev.variance + config.alphaVar * r * r, eps);
  if (!Number.isFinite(r) || !Number.isFinite(variance)) {
    throw new InvalidInputError(
      `sample at index ${prev.index} is out of range: residual ${x} − ${mu} overflows`,
      prev.index,
    );
  }
  const sigma = Math.sqrt(variance);

  let z = r / (sigma + eps);
  if (config.clipZ !== null) {
    z = Math.min(config.clipZ, Math.max(-config.clipZ, z));
  }

  let sPlus = Math.max(0, prev.sPlus + z - k);
  let sMinus = Math.max(0, prev.sMinus - z - k);

  const alarmed = prev.index >= config.warmup && (sPlus > config.h || sMinus > config.h);
  if (alarmed) {
    sPlus = 0;
    sMinus = 0;
    if (config.alarmPolicy === 'recenter-baseline') mu = x;
  }

  return {
    index: prev.index,
    x,
    mu,
    sigma,
    z,
    sPlus,
    sMinus,
    alarmed,
    state: { mu, variance, sPlus, sMinus, index: prev.index + 1 },
  };
}

/**
 * Incremental form of the detector for streaming use.
 *
 * @param state Previous state, or null for the first sample of a series
 * @param x New sample
 * @param config Partial configuration merged over the defaults
 */
export function stepDrift(state: DriftState | null, x: number, config?: Partial<DriftConfig>): DriftStep {
  return stepDriftResolved(state, x, resolveDriftConfig(config));
}

/**
 * Batch form: run the detector over a whole series.
 *
 * Returns per-sample μ, σ, S⁺, S⁻ (same length as the input) and the alarm
 * indices. Replaying the same series with the same configuration produces
 * bit-identical output.
 */
export function detectDrift(signal: ArrayLike<number>, config?: Partial<DriftConfig>): DriftResult {
  const resolved = resolveDriftConfig(config);
  const N = signal.length;

  const mu = new Float64Array(N);
  const sigma = new Float64Array(N);
  const sPlus = new Float64Array(N);
  const sMinus = new Float64Array(N);
  const alarms: number[] = [];

  let state: DriftState | null = null;
  for (let t = 0; t < N; t++) {
    const step: DriftStep = stepDriftResolved(state, signal[t]!, resolved);
    mu[t] = step.mu;
    sigma[t] = step.sigma;
    sPlus[t] = step.sPlus;
    sMinus[t] = step.sMinus;
    if (step.alarmed) alarms.push(t);
    state = step.state;
  }

  return { alarms, mu, sigma, sPlus, sMinus };
}
