// ---------------------------------------------------------------------------
// Waveform → pressure histogram with a refractory (blanking) gate
// ---------------------------------------------------------------------------

import type { QuantizeMode, WaveformOptions, WaveformPoint } from '../types.js';
import { InvalidConfigurationError, InvalidInputError, assertFiniteSample } from '../errors.js';

/** Upper bound on histogram length (one bin per integer pressure). */
export const MAX_HISTOGRAM_BINS = 1 << 20;

export const WAVEFORM_DEFAULTS: Readonly<WaveformOptions> = {
  refractory: 0.1,
  quantize: 'round',
};

/** Round half to even: 10.5 → 10, 11.5 → 12, −0.5 → 0. */
export function roundHalfEven(x: number): number {
  const f = Math.floor(x);
  const diff = x - f;
  if (diff > 0.5) return f + 1;
  if (diff < 0.5) return f;
  return f % 2 === 0 ? f : f + 1;
}

function quantizer(mode: QuantizeMode): (p: number) => number {
  switch (mode) {
    case 'round':
      return roundHalfEven;
    case 'floor':
      return Math.floor;
    default:
      throw new InvalidConfigurationError('quantize', `must be 'round' or 'floor', got '${String(mode)}'`);
  }
}

/**
 * Count accepted samples per integer pressure.
 *
 * The histogram spans 0..max(quantized pressure). The first sample is always
 * accepted; each later one only when at least `refractory` time units have
 * passed since the last accepted sample. Accepted pressures quantizing below
 * zero are not counted.
 *
 * @throws InvalidConfigurationError for an unknown quantize mode or negative refractory
 * @throws InvalidInputError for a non-finite pressure or time, or a pressure past MAX_HISTOGRAM_BINS
 */
export function pressureHistogram(
  waveform: ReadonlyArray<WaveformPoint>,
  options?: Partial<WaveformOptions>,
): Int32Array {
  const { refractory, quantize } = { ...WAVEFORM_DEFAULTS, ...options };
  const q = quantizer(quantize);
  if (!(refractory >= 0) || !Number.isFinite(refractory)) {
    throw new InvalidConfigurationError('refractory', `must be a non-negative finite number, got ${refractory}`);
  }

  const N = waveform.length;
  const quantized = new Array<number>(N);
  let maxBin = -1;
  for (let i = 0; i < N; i++) {
    const [pressure, time] = waveform[i]!;
    assertFiniteSample(pressure, 'pressure', i);
    assertFiniteSample(time, 'time', i);
    const bin = q(pressure);
    if (bin >= MAX_HISTOGRAM_BINS) {
      throw new InvalidInputError(
        `pressure at index ${i} (${pressure}) exceeds the histogram range 0..${MAX_HISTOGRAM_BINS - 1}`,
        i,
      );
    }
    quantized[i] = bin;
    if (bin > maxBin) maxBin = bin;
  }

  const bins = new Int32Array(Math.max(0, maxBin + 1));
  let lastAccepted: number | null = null;

  for (let i = 0; i < N; i++) {
    const time = waveform[i]![1];
    if (lastAccepted !== null && time - lastAccepted < refractory) continue;

    const bin = quantized[i]!;
    if (bin >= 0 && bin < bins.length) bins[bin] = bins[bin]! + 1;
    lastAccepted = time;
  }

  return bins;
}
