/**
 * Configuration assembly and validation
 */
import type { BeaconConfig, Rgb } from '../types';
import { ConfigurationError } from '../types';
import { DEFAULT_CONFIG, PATTERN_LENGTH, TARGET_FREQUENCIES } from './constants';

export type ConfigOverrides = Partial<BeaconConfig>;

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function isPowerOfTwo(value: number): boolean {
  return isPositiveInteger(value) && value > 1 && (value & (value - 1)) === 0;
}

function isValidColor(color: Rgb): boolean {
  return [color.r, color.g, color.b].every(
    (c) => Number.isInteger(c) && c >= 0 && c <= 255
  );
}

/**
 * FFT bin nearest to a frequency
 */
export function binIndexOf(frequency: number, fftSize: number, sampleRate: number): number {
  return Math.round((frequency * fftSize) / sampleRate);
}

/**
 * Throw if any carrier's averaged bin range falls outside [0, fftSize / 2)
 */
export function assertBinsInRange(config: BeaconConfig): void {
  const { fftSize, sampleRate, fftNeighborCount } = config;
  const binCount = fftSize / 2;

  for (const freq of TARGET_FREQUENCIES) {
    const index = binIndexOf(freq, fftSize, sampleRate);
    const lo = index - fftNeighborCount;
    const hi = index + fftNeighborCount;
    if (lo < 0 || hi >= binCount) {
      throw new ConfigurationError(
        `Bins ${lo}..${hi} for ${freq} Hz fall outside [0, ${binCount}) ` +
          `at sampleRate=${sampleRate}, fftSize=${fftSize}`
      );
    }
  }
}

/**
 * Validate a complete configuration, throwing ConfigurationError on the first problem
 */
export function validateConfig(config: BeaconConfig): void {
  if (!isPositiveInteger(config.sampleRate)) {
    throw new ConfigurationError(`sampleRate must be a positive integer, got ${config.sampleRate}`);
  }
  if (!isPowerOfTwo(config.fftSize)) {
    throw new ConfigurationError(`fftSize must be a power of two, got ${config.fftSize}`);
  }
  if (!Number.isInteger(config.fftNeighborCount) || config.fftNeighborCount < 0) {
    throw new ConfigurationError(
      `fftNeighborCount must be a non-negative integer, got ${config.fftNeighborCount}`
    );
  }
  if (!Number.isInteger(config.historySize) || config.historySize < PATTERN_LENGTH) {
    throw new ConfigurationError(
      `historySize must be an integer of at least ${PATTERN_LENGTH}, got ${config.historySize}`
    );
  }
  if (!(config.frameIntervalMs > 0)) {
    throw new ConfigurationError(`frameIntervalMs must be positive, got ${config.frameIntervalMs}`);
  }
  if (!(config.dominanceFloor >= 0)) {
    throw new ConfigurationError(`dominanceFloor must be >= 0, got ${config.dominanceFloor}`);
  }
  if (!(config.dominanceRatio > 0)) {
    throw new ConfigurationError(`dominanceRatio must be positive, got ${config.dominanceRatio}`);
  }
  if (!isValidColor(config.offColor)) {
    throw new ConfigurationError('offColor channels must be integers in 0..255');
  }
  assertBinsInRange(config);
}

/**
 * Build a configuration from defaults and overrides.
 *
 * When sampleRate or fftSize is overridden without historySize, the history
 * is resized to keep about one second of blocks.
 */
export function createConfig(overrides: ConfigOverrides = {}): BeaconConfig {
  const sampleRate = overrides.sampleRate ?? DEFAULT_CONFIG.sampleRate;
  const fftSize = overrides.fftSize ?? DEFAULT_CONFIG.fftSize;

  const config: BeaconConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
    sampleRate,
    fftSize,
    historySize: overrides.historySize ?? Math.floor(sampleRate / fftSize),
  };

  validateConfig(config);
  return config;
}
