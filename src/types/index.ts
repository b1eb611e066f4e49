/**
 * Core type definitions for Beacon Light
 */
import type { TARGET_FREQUENCIES } from '../utils/constants';

// Ultrasonic carriers
export type TargetFrequency = (typeof TARGET_FREQUENCIES)[number];

/** Magnitude per carrier for one analysis block. Recomputed every block. */
export type MagnitudeMap = ReadonlyMap<TargetFrequency, number>;

/** Dominant carrier of one block, or null when nothing stands out. */
export type BeaconSymbol = TargetFrequency | null;

// 8-bit sRGB color, channels 0-255
export interface Rgb {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/** Maps progress in [0, 1] to a blend fraction in [0, 1]. */
export type EasingFunction = (progress: number) => number;

// Light behaviors
export interface LightingBehavior {
  readonly kind: 'lighting';
  readonly color: Rgb;
}

export interface TurnOffBehavior {
  readonly kind: 'turnOff';
}

export interface BlinkingBehavior {
  readonly kind: 'blinking';
  readonly color: Rgb;
  readonly durationMs: number;
}

export interface GradationBehavior {
  readonly kind: 'gradation';
  readonly colors: readonly Rgb[];
  readonly durationMs: number;
  /** Transition out of the off color. Defaults to half of durationMs. */
  readonly firstDurationMs?: number;
  /** Transitions after the first full loop. Defaults to durationMs. */
  readonly repeatDurationMs?: number;
}

export type LightBehavior =
  | LightingBehavior
  | TurnOffBehavior
  | BlinkingBehavior
  | GradationBehavior;

export interface LightAction {
  readonly code: number;
  readonly name: string;
  readonly behavior: LightBehavior;
}

/** One timed color transition driven by the animation engine. */
export interface Segment {
  readonly from: Rgb;
  readonly to: Rgb;
  readonly durationMs: number;
  readonly easing: EasingFunction;
}

/** Receives every emitted color synchronously. */
export type Renderer = (color: Rgb) => void;

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

// Configuration object
export interface BeaconConfig {
  readonly sampleRate: number;
  readonly fftSize: number;
  readonly fftNeighborCount: number;
  /** Symbols kept in the decoder history (about one second of blocks). */
  readonly historySize: number;
  readonly frameIntervalMs: number;
  readonly offColor: Rgb;
  /** Absolute magnitude a dominant carrier must reach. */
  readonly dominanceFloor: number;
  /** How many times the mean of the other carriers it must exceed. */
  readonly dominanceRatio: number;
}

// Error types
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class AudioSourceError extends Error {
  constructor(
    message: string,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'AudioSourceError';
  }
}
