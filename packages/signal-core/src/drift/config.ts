// ---------------------------------------------------------------------------
// Drift detector configuration
// ---------------------------------------------------------------------------

import type { DriftConfig } from '../types.js';
import { InvalidConfigurationError } from '../errors.js';

/** Tuned for subtle drift: delta 0.25–0.5σ, h = 5, 100-sample burn-in. */
export const DRIFT_DEFAULTS: Readonly<DriftConfig> = {
  alphaBaseline: 0.01,
  alphaVar: 0.05,
  delta: 0.25,
  h: 5.0,
  warmup: 100,
  clipZ: 6.0,
  varianceFloor: 1e-12,
  initialVariance: 1e-6,
  alarmPolicy: 'reset-accumulators',
};

function requireRate(field: string, value: number): void {
  if (!(value > 0 && value <= 1)) {
    throw new InvalidConfigurationError(field, `must be in (0, 1], got ${value}`);
  }
}

function requirePositive(field: string, value: number): void {
  if (!(value > 0) || !Number.isFinite(value)) {
    throw new InvalidConfigurationError(field, `must be a positive finite number, got ${value}`);
  }
}

/**
 * Merge a partial configuration over DRIFT_DEFAULTS and validate the result.
 * @throws InvalidConfigurationError on any out-of-domain field
 */
export function resolveDriftConfig(config?: Partial<DriftConfig>): DriftConfig {
  const resolved: DriftConfig = { ...DRIFT_DEFAULTS, ...config };

  requireRate('alphaBaseline', resolved.alphaBaseline);
  requireRate('alphaVar', resolved.alphaVar);
  if (!(resolved.delta >= 0) || !Number.isFinite(resolved.delta)) {
    throw new InvalidConfigurationError('delta', `must be a non-negative finite number, got ${resolved.delta}`);
  }
  requirePositive('h', resolved.h);
  if (!Number.isInteger(resolved.warmup) || resolved.warmup < 0) {
    throw new InvalidConfigurationError('warmup', `must be a non-negative integer, got ${resolved.warmup}`);
  }
  if (resolved.clipZ !== null) requirePositive('clipZ', resolved.clipZ);
  requirePositive('varianceFloor', resolved.varianceFloor);
  requirePositive('initialVariance', resolved.initialVariance);
  if (resolved.alarmPolicy !== 'reset-accumulators' && resolved.alarmPolicy !== 'recenter-baseline') {
    throw new InvalidConfigurationError('alarmPolicy', `unknown policy '${String(resolved.alarmPolicy)}'`);
  }

  return resolved;
}
