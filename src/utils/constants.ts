/**
 * Constants for Beacon Light
 */
import type { BeaconConfig, Rgb, TargetFrequency } from '../types';

// Ultrasonic carriers, ascending
export const TARGET_FREQUENCIES = [18500, 18750, 19000, 19250, 19500] as const;

/**
 * Expected symbol sequence. Slot 0 is the fixed start marker; every other slot
 * carries one bit, the index of the observed carrier within its list.
 */
export const PATTERN_TEMPLATE: readonly (readonly TargetFrequency[])[] = [
  [18500],
  [18750, 19250],
  [19000, 19500],
  [18750, 19250],
  [19000, 19500],
  [18750, 19250],
  [19000, 19500],
  [18750, 19250],
];
export const PATTERN_LENGTH = PATTERN_TEMPLATE.length;
export const CODE_BITS = PATTERN_LENGTH - 1;
export const MAX_CODE = (1 << CODE_BITS) - 1;

// Audible notes (C6 D6 E6 F6 G6) used by the feedback synthesizer
export const AUDIBLE_FREQUENCIES: Readonly<Record<TargetFrequency, number>> = {
  18500: 1046.502,
  18750: 1174.659,
  19000: 1318.51,
  19250: 1396.913,
  19500: 1567.982,
};

export const BLACK: Rgb = { r: 0, g: 0, b: 0 };

// Default configuration
export const DEFAULT_SAMPLE_RATE = 44100;
export const DEFAULT_FFT_SIZE = 1024;

export const DEFAULT_CONFIG: BeaconConfig = {
  sampleRate: DEFAULT_SAMPLE_RATE,
  fftSize: DEFAULT_FFT_SIZE,
  fftNeighborCount: 2,
  historySize: Math.floor(DEFAULT_SAMPLE_RATE / DEFAULT_FFT_SIZE),
  frameIntervalMs: 50,
  offColor: BLACK,
  dominanceFloor: 500,
  dominanceRatio: 3,
};

// Feedback synthesizer
export const FEEDBACK_GAIN = 2.0;
export const FEEDBACK_QUEUE_CAPACITY = 4;
// Seconds of noise levels averaged into the feedback threshold
export const FEEDBACK_NOISE_WINDOW_SEC = 2;

// Simulated beacon
export const BEACON_AMPLITUDE = 12000;
export const BEACON_BLOCKS_PER_SYMBOL = 3;
