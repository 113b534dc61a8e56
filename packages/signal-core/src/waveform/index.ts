// Waveform reduction
export { pressureHistogram, roundHalfEven, WAVEFORM_DEFAULTS, MAX_HISTOGRAM_BINS } from './histogram.js';
export { representativePressure, reduceWaveform } from './representative.js';
