// ---------------------------------------------------------------------------
// Drift Detection Tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import {
  detectDrift,
  stepDrift,
  stepDriftResolved,
  initialDriftState,
} from '../drift/ewma-cusum.js';
import { DRIFT_DEFAULTS, resolveDriftConfig } from '../drift/config.js';
import { DriftDetector } from '../drift/detector.js';
import { DriftHistory } from '../drift/history.js';
import { InvalidConfigurationError, InvalidInputError } from '../errors.js';
import type { DriftState, DriftStep } from '../types.js';

function stepSeries(before: number, after: number, n = 200): number[] {
  return [...new Array<number>(n).fill(before), ...new Array<number>(n).fill(after)];
}

describe('EWMA-CUSUM drift detection', () => {
  describe('detectDrift', () => {
    it('returns empty containers for an empty series', () => {
      const result = detectDrift([]);
      expect(result.alarms).toEqual([]);
      expect(result.mu.length).toBe(0);
      expect(result.sigma.length).toBe(0);
      expect(result.sPlus.length).toBe(0);
      expect(result.sMinus.length).toBe(0);
    });

    it('initializes from a single sample without alarming', () => {
      const result = detectDrift([3.2]);
      expect(result.alarms).toEqual([]);
      expect(result.mu.length).toBe(1);
      expect(result.mu[0]!).toBeCloseTo(3.2, 12);
      expect(result.sPlus[0]).toBe(0);
      expect(result.sMinus[0]).toBe(0);
    });

    it('flags a sustained upward step and stays quiet before it', () => {
      const x = stepSeries(5.0, 6.0);
      const result = detectDrift(x, { warmup: 100 });

      expect(result.alarms.length).toBeGreaterThan(1);
      expect(result.alarms[0]).toBe(201);
      expect(result.alarms.every(i => i >= 200)).toBe(true);
      // S⁺ built up to ~4.35 at the step itself, below h = 5
      expect(result.sPlus[200]!).toBeCloseTo(4.347, 2);
      expect(result.sMinus[200]).toBe(0);
    });

    it('flags a sustained downward step on the S⁻ path', () => {
      const result = detectDrift(stepSeries(5.0, 4.0));
      expect(result.alarms[0]).toBe(201);
      expect(result.sMinus[200]!).toBeCloseTo(4.347, 2);
      expect(result.sPlus[200]).toBe(0);
    });

    it('records the re-armed accumulators at each alarm index', () => {
      const result = detectDrift(stepSeries(5.0, 6.0));
      for (const i of result.alarms) {
        expect(result.sPlus[i]).toBe(0);
        expect(result.sMinus[i]).toBe(0);
      }
    });

    it('keeps the baseline evolving through an alarm', () => {
      const result = detectDrift(stepSeries(5.0, 6.0));
      // μ keeps creeping towards 6 instead of jumping
      expect(result.mu[201]!).toBeGreaterThan(result.mu[200]!);
      expect(result.mu[201]!).toBeLessThan(5.1);
    });

    it('re-centers the baseline on alarm when configured', () => {
      const result = detectDrift(stepSeries(5.0, 6.0), { alarmPolicy: 'recenter-baseline' });
      expect(result.alarms).toEqual([201]);
      expect(result.mu[201]).toBe(6);
    });

    it('suppresses alarms during warmup', () => {
      const result = detectDrift(stepSeries(5.0, 6.0), { warmup: 300 });
      expect(result.alarms.length).toBeGreaterThan(0);
      expect(result.alarms[0]!).toBeGreaterThanOrEqual(300);
    });

    it('fails fast on non-finite samples', () => {
      expect(() => detectDrift([1, 2, Number.NaN])).toThrow(InvalidInputError);
      try {
        detectDrift([1, 2, 3, Number.POSITIVE_INFINITY]);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidInputError);
        if (err instanceof InvalidInputError) {
          expect(err.index).toBe(3);
          expect(err.code).toBe('INVALID_INPUT');
        }
      }
    });

    it('rejects samples whose residual overflows', () => {
      try {
        detectDrift([1.7e308, -1.7e308]);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidInputError);
        if (err instanceof InvalidInputError) expect(err.index).toBe(1);
      }
    });
  });

  describe('stepDrift', () => {
    it('seeds a fresh series from the first sample', () => {
      const step = stepDrift(null, 2.5);
      expect(step.index).toBe(0);
      expect(step.state.index).toBe(1);
      expect(step.alarmed).toBe(false);
      expect(step.mu).toBeCloseTo(2.5, 12);
    });

    it('does not mutate the previous state', () => {
      const prev: DriftState = { mu: 1, variance: 0.5, sPlus: 2, sMinus: 0, index: 10 };
      const copy = { ...prev };
      stepDrift(prev, 3);
      expect(prev).toEqual(copy);
    });

    it('matches the batch detector sample for sample', () => {
      const x = stepSeries(1.0, 1.4, 150);
      const batch = detectDrift(x, { warmup: 20 });
      let state: DriftState | null = null;
      const alarms: number[] = [];
      for (let t = 0; t < x.length; t++) {
        const step: DriftStep = stepDrift(state, x[t]!, { warmup: 20 });
        expect(step.mu).toBe(batch.mu[t]);
        expect(step.sigma).toBe(batch.sigma[t]);
        expect(step.sPlus).toBe(batch.sPlus[t]);
        expect(step.sMinus).toBe(batch.sMinus[t]);
        if (step.alarmed) alarms.push(step.index);
        state = step.state;
      }
      expect(alarms).toEqual(batch.alarms);
    });

    it('winsorizes the standardized residual', () => {
      const state: DriftState = { mu: 0, variance: 1, sPlus: 0, sMinus: 0, index: 0 };
      const clipped = stepDriftResolved(state, 100, resolveDriftConfig({ clipZ: 2 }));
      const raw = stepDriftResolved(state, 100, resolveDriftConfig({ clipZ: null }));
      // μ = 1, r = 99, σ² = 0.95 + 0.05·99²
      expect(clipped.z).toBe(2);
      expect(raw.z).toBeCloseTo(99 / Math.sqrt(0.95 + 0.05 * 99 * 99), 9);
      expect(clipped.sPlus).toBeCloseTo(2 - DRIFT_DEFAULTS.delta / 2, 12);
    });

    it('floors the variance of a flat series', () => {
      let state: DriftState | null = null;
      for (let t = 0; t < 1000; t++) {
        state = stepDrift(state, 7, { varianceFloor: 1e-12 }).state;
        expect(state.variance).toBeGreaterThanOrEqual(1e-12);
      }
    });

    it('seeds μ and σ² from the configuration', () => {
      const seed = initialDriftState(4, resolveDriftConfig({ initialVariance: 0.25 }));
      expect(seed).toEqual({ mu: 4, variance: 0.25, sPlus: 0, sMinus: 0, index: 0 });
    });
  });

  describe('resolveDriftConfig', () => {
    it('fills every field from the defaults', () => {
      expect(resolveDriftConfig()).toEqual(DRIFT_DEFAULTS);
    });

    it.each([
      [{ alphaBaseline: 0 }],
      [{ alphaVar: 1.5 }],
      [{ delta: -0.1 }],
      [{ h: 0 }],
      [{ warmup: 2.5 }],
      [{ warmup: -1 }],
      [{ clipZ: 0 }],
      [{ varianceFloor: 0 }],
    ])('rejects %o', (config) => {
      expect(() => resolveDriftConfig(config)).toThrow(InvalidConfigurationError);
    });

    it('accepts clipZ = null', () => {
      expect(resolveDriftConfig({ clipZ: null }).clipZ).toBeNull();
    });
  });

  describe('DriftDetector', () => {
    it('keeps a bounded history of recent steps', () => {
      const detector = new DriftDetector({ historySize: 3 });
      for (const x of [1, 2, 3, 4, 5]) detector.push(x);
      const recent = detector.recent();
      expect(recent.map(r => r.index)).toEqual([2, 3, 4]);
      expect(recent.map(r => r.x)).toEqual([3, 4, 5]);
      expect(detector.getState()?.index).toBe(5);
    });

    it('counts alarms and clears on reset', () => {
      const detector = new DriftDetector();
      for (const x of stepSeries(5.0, 6.0)) detector.push(x);
      expect(detector.alarmCount).toBe(detectDrift(stepSeries(5.0, 6.0)).alarms.length);
      expect(detector.recent()).toEqual([]);

      detector.reset();
      expect(detector.getState()).toBeNull();
      expect(detector.alarmCount).toBe(0);
    });

    it('resumes from a checkpointed state', () => {
      const x = stepSeries(2.0, 2.6, 150);
      const first = new DriftDetector({ config: { warmup: 10 } });
      for (const v of x.slice(0, 170)) first.push(v);

      const resumed = new DriftDetector({ config: { warmup: 10 }, state: first.getState() });
      const uninterrupted = new DriftDetector({ config: { warmup: 10 } });
      for (const v of x.slice(0, 170)) uninterrupted.push(v);

      for (const v of x.slice(170)) {
        expect(resumed.push(v)).toEqual(uninterrupted.push(v));
      }
      expect(resumed.getState()).toEqual(uninterrupted.getState());
    });
  });

  describe('DriftHistory', () => {
    it('returns records oldest first and evicts when full', () => {
      const history = new DriftHistory<number>(2);
      expect(history.latest()).toBeUndefined();
      history.push(1);
      history.push(2);
      history.push(3);
      expect(history.toArray()).toEqual([2, 3]);
      expect(history.latest()).toBe(3);
      expect(history.size).toBe(2);
      expect(history.getCapacity()).toBe(2);
      history.clear();
      expect(history.toArray()).toEqual([]);
    });

    it('rejects a non-positive capacity', () => {
      expect(() => new DriftHistory<number>(0)).toThrow(InvalidConfigurationError);
    });
  });
});
