/**
 * Audible feedback: re-voices carrier magnitudes as notes via inverse FFT
 */
import FFT from 'fft.js';
import type { BeaconConfig, MagnitudeMap, TargetFrequency } from '../types';
import {
  AUDIBLE_FREQUENCIES,
  FEEDBACK_GAIN,
  FEEDBACK_NOISE_WINDOW_SEC,
  FEEDBACK_QUEUE_CAPACITY,
  TARGET_FREQUENCIES,
} from '../utils/constants';
import { binIndexOf } from '../utils/config';
import { reportError, type ErrorSink } from '../utils/errors';

/** Playback collaborator; may apply backpressure by returning a promise. */
export interface PcmSink {
  write(pcm: Int16Array): void | Promise<void>;
}

export interface FeedbackSynthesizerOptions {
  gain?: number;
  queueCapacity?: number;
  audibleFrequencies?: Readonly<Record<TargetFrequency, number>>;
  onError?: ErrorSink;
}

const INT16_MAX = 32767;
const INT16_MIN = -32768;

export class FeedbackSynthesizer {
  gain: number;

  private readonly fft: FFT;
  private readonly noteBins: ReadonlyMap<TargetFrequency, number>;
  private readonly queueCapacity: number;
  private readonly onError: ErrorSink | undefined;
  private readonly noiseLevels: number[];
  private noiseIdx = 0;
  private queue: Int16Array[] = [];
  private draining = false;
  private playing = false;

  constructor(
    private readonly config: BeaconConfig,
    private readonly sink: PcmSink,
    options: FeedbackSynthesizerOptions = {},
  ) {
    this.gain = options.gain ?? FEEDBACK_GAIN;
    this.queueCapacity = options.queueCapacity ?? FEEDBACK_QUEUE_CAPACITY;
    this.onError = options.onError;
    this.fft = new FFT(config.fftSize);

    const notes = options.audibleFrequencies ?? AUDIBLE_FREQUENCIES;
    const bins = new Map<TargetFrequency, number>();
    for (const carrier of TARGET_FREQUENCIES) {
      const index = binIndexOf(notes[carrier], config.fftSize, config.sampleRate);
      if (index > 0 && index < config.fftSize / 2) {
        bins.set(carrier, index);
      }
    }
    this.noteBins = bins;

    const windowSize = Math.max(
      1,
      Math.floor((config.sampleRate / config.fftSize) * FEEDBACK_NOISE_WINDOW_SEC)
    );
    this.noiseLevels = new Array<number>(windowSize).fill(0);
  }

  get running(): boolean {
    return this.playing;
  }

  get queued(): number {
    return this.queue.length;
  }

  start(): void {
    if (this.playing) return;
    this.playing = true;
    console.log('[FeedbackSynth] Started');
  }

  stop(): void {
    if (!this.playing) return;
    this.playing = false;
    this.queue = [];
    console.log('[FeedbackSynth] Stopped');
  }

  /**
   * Queue the synthesized block for playback. Dropped when stopped or the queue is full.
   */
  process(magnitudes: MagnitudeMap): boolean {
    if (!this.playing || this.queue.length >= this.queueCapacity) return false;
    this.queue.push(this.synthesize(magnitudes));
    void this.drain();
    return true;
  }

  /**
   * Current noise threshold: mean of the recent per-block noise levels
   */
  get noiseThreshold(): number {
    let sum = 0;
    for (const level of this.noiseLevels) sum += level;
    return sum / this.noiseLevels.length;
  }

  /**
   * One block of PCM voicing each carrier above the noise threshold
   */
  synthesize(magnitudes: MagnitudeMap): Int16Array {
    const { fftSize } = this.config;
    this.recordNoiseLevel(magnitudes);
    const threshold = this.noiseThreshold;

    const spectrum = this.fft.createComplexArray();
    for (const [carrier, magnitude] of magnitudes) {
      const bin = this.noteBins.get(carrier);
      if (bin === undefined) continue;
      const amplitude = Math.max(magnitude - threshold, 0) * this.gain;
      // Mirror into the negative frequency so the output is real
      const coefficient = (amplitude * fftSize) / 2;
      spectrum[2 * bin] = coefficient;
      spectrum[2 * (fftSize - bin)] = coefficient;
    }

    const output = this.fft.createComplexArray();
    this.fft.inverseTransform(output, spectrum);

    const pcm = new Int16Array(fftSize);
    for (let i = 0; i < fftSize; i++) {
      const value = Math.round(output[2 * i]);
      pcm[i] = Math.min(Math.max(value, INT16_MIN), INT16_MAX);
    }
    return pcm;
  }

  private recordNoiseLevel(magnitudes: MagnitudeMap): void {
    if (magnitudes.size < 2) return;

    let maxValue = -Infinity;
    let total = 0;
    for (const value of magnitudes.values()) {
      total += value;
      if (value > maxValue) maxValue = value;
    }
    const level = (total - maxValue) / (magnitudes.size - 1);

    this.noiseLevels[this.noiseIdx] = level;
    this.noiseIdx = (this.noiseIdx + 1) % this.noiseLevels.length;
  }

  private async drain(): Promise<void> {
    if (this.draining) return;
    this.draining = true;
    try {
      while (this.playing) {
        const next = this.queue.shift();
        if (!next) break;
        await this.sink.write(next);
      }
    } catch (err) {
      reportError('FeedbackSynth', err, this.onError);
    } finally {
      this.draining = false;
    }
  }
}
