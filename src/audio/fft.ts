/**
 * FFT analysis of the ultrasonic carriers
 */
import FFT from 'fft.js';
import type { BeaconConfig, MagnitudeMap, TargetFrequency } from '../types';
import { AudioSourceError } from '../types';
import { TARGET_FREQUENCIES } from '../utils/constants';
import { binIndexOf, validateConfig } from '../utils/config';

/**
 * Hann window coefficients, 0.5 * (1 - cos(2*PI*i / (N - 1)))
 */
export function hannWindow(length: number): Float64Array {
  const window = new Float64Array(length);
  if (length === 1) {
    window[0] = 1;
    return window;
  }
  const denom = length - 1;
  for (let i = 0; i < length; i++) {
    window[i] = 0.5 * (1 - Math.cos((2 * Math.PI * i) / denom));
  }
  return window;
}

/**
 * Converts one block of 16-bit samples into a magnitude per carrier.
 * Bin ranges are validated on construction; analyze() never goes out of range.
 */
export class SpectralAnalyzer {
  readonly binIndices: ReadonlyMap<TargetFrequency, number>;

  private readonly fft: FFT;
  private readonly window: Float64Array;
  // Reused per block
  private readonly input: Float64Array;
  private readonly spectrum: number[];

  constructor(private readonly config: BeaconConfig) {
    validateConfig(config);

    this.fft = new FFT(config.fftSize);
    this.window = hannWindow(config.fftSize);
    this.input = new Float64Array(config.fftSize);
    this.spectrum = this.fft.createComplexArray();

    const indices = new Map<TargetFrequency, number>();
    for (const freq of TARGET_FREQUENCIES) {
      indices.set(freq, binIndexOf(freq, config.fftSize, config.sampleRate));
    }
    this.binIndices = indices;
  }

  analyze(block: ArrayLike<number>): MagnitudeMap {
    const { fftSize } = this.config;
    if (block.length !== fftSize) {
      throw new AudioSourceError(
        `Expected a block of ${fftSize} samples, got ${block.length}`
      );
    }

    for (let i = 0; i < fftSize; i++) {
      this.input[i] = block[i] * this.window[i];
    }
    this.fft.realTransform(this.spectrum, this.input);

    const result = new Map<TargetFrequency, number>();
    for (const [freq, index] of this.binIndices) {
      result.set(freq, this.averageMagnitudeAround(index));
    }
    return result;
  }

  /**
   * Magnitude of a single bin of the last block, scaled to the amplitude of
   * an on-bin sine. The Hann window halves the peak, hence the factor 2.
   */
  magnitudeAt(index: number): number {
    const re = this.spectrum[2 * index];
    const im = this.spectrum[2 * index + 1];
    return (Math.hypot(re, im) / (this.config.fftSize / 2)) * 2;
  }

  private averageMagnitudeAround(index: number): number {
    const n = this.config.fftNeighborCount;
    let sum = 0;
    for (let i = index - n; i <= index + n; i++) {
      sum += this.magnitudeAt(i);
    }
    return sum / (2 * n + 1);
  }
}
