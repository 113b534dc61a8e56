// ---------------------------------------------------------------------------
// Representative pressure from a histogram
// ---------------------------------------------------------------------------
// Two-stage selection:
//   1. modal count = the most frequent non-zero count value; when several
//      count values are equally frequent the highest count value wins
//   2. result = median of the bin indices holding the modal count

import type { WaveformOptions, WaveformPoint, WaveformReduction } from '../types.js';
import { pressureHistogram } from './histogram.js';

function median(sorted: number[]): number {
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 !== 0
    ? sorted[mid]!
    : (sorted[mid - 1]! + sorted[mid]!) / 2;
}

/**
 * Pick the representative pressure of a histogram.
 * @returns Median bin index of the modal count, or null when every bin is empty
 */
export function representativePressure(histogram: ArrayLike<number>): number | null {
  const frequency = new Map<number, number>();
  for (let i = 0; i < histogram.length; i++) {
    const count = histogram[i]!;
    if (count > 0) frequency.set(count, (frequency.get(count) ?? 0) + 1);
  }
  if (frequency.size === 0) return null;

  let modalCount = 0;
  let modalFrequency = 0;
  for (const [count, freq] of frequency) {
    if (freq > modalFrequency || (freq === modalFrequency && count > modalCount)) {
      modalCount = count;
      modalFrequency = freq;
    }
  }

  const indices: number[] = [];
  for (let i = 0; i < histogram.length; i++) {
    if (histogram[i] === modalCount) indices.push(i);
  }
  return median(indices);
}

/** Histogram plus representative pressure for one session's waveform. */
export function reduceWaveform(
  waveform: ReadonlyArray<WaveformPoint>,
  options?: Partial<WaveformOptions>,
): WaveformReduction {
  const histogram = pressureHistogram(waveform, options);
  return { histogram, representative: representativePressure(histogram) };
}
