/**
 * Audio sources delivering fixed-size blocks of 16-bit mono samples
 */
import { addAbortSignal, type Readable } from 'node:stream';
import type { BeaconConfig, TargetFrequency } from '../types';
import { AudioSourceError } from '../types';
import { sleep } from '../utils/async';
import { BEACON_AMPLITUDE, BEACON_BLOCKS_PER_SYMBOL } from '../utils/constants';
import { toError } from '../utils/errors';
import { encodeCode } from './processing';

export interface AudioSource {
  readonly sampleRate: number;
  readonly blockSize: number;
  blocks(signal?: AbortSignal): AsyncIterable<Int16Array>;
}

/**
 * Re-chunks a raw s16le PCM byte stream (for example `arecord -f S16_LE -c 1`)
 * into blocks of `fftSize` samples. A trailing partial block is dropped.
 * Aborting the signal destroys the stream, so an idle stream ends at once.
 */
export class PcmStreamSource implements AudioSource {
  readonly sampleRate: number;
  readonly blockSize: number;

  constructor(
    private readonly stream: Readable,
    config: Pick<BeaconConfig, 'sampleRate' | 'fftSize'>,
  ) {
    this.sampleRate = config.sampleRate;
    this.blockSize = config.fftSize;
  }

  async *blocks(signal?: AbortSignal): AsyncGenerator<Int16Array> {
    const blockBytes = this.blockSize * 2;
    const stream = signal ? addAbortSignal(signal, this.stream) : this.stream;
    let pending = Buffer.alloc(0);

    try {
      for await (const chunk of stream) {
        if (signal?.aborted) return;
        const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'binary') : Buffer.from(chunk);
        pending = pending.length > 0 ? Buffer.concat([pending, bytes]) : bytes;

        let offset = 0;
        while (pending.length - offset >= blockBytes) {
          const block = new Int16Array(this.blockSize);
          for (let i = 0; i < this.blockSize; i++) {
            block[i] = pending.readInt16LE(offset + i * 2);
          }
          offset += blockBytes;
          yield block;
          if (signal?.aborted) return;
        }
        pending = pending.subarray(offset);
      }
    } catch (err) {
      // AbortError from the signal is a normal end
      if (signal?.aborted) return;
      throw new AudioSourceError('PCM stream failed', toError(err));
    }
  }
}

export interface BeaconToneOptions {
  amplitude?: number;
  blocksPerSymbol?: number;
  /** Silent blocks after each full sequence */
  gapBlocks?: number;
  /** Number of times the sequence is sent; Infinity repeats forever */
  repetitions?: number;
  /** Wait one block period between blocks, like a live capture */
  realtime?: boolean;
}

/**
 * Synthesizes the carrier sequence for a code, phase-continuous across blocks
 */
export class BeaconToneSource implements AudioSource {
  readonly sampleRate: number;
  readonly blockSize: number;
  readonly sequence: readonly TargetFrequency[];

  private readonly amplitude: number;
  private readonly blocksPerSymbol: number;
  private readonly gapBlocks: number;
  private readonly repetitions: number;
  private readonly realtime: boolean;

  constructor(
    readonly code: number,
    config: Pick<BeaconConfig, 'sampleRate' | 'fftSize'>,
    options: BeaconToneOptions = {},
  ) {
    this.sampleRate = config.sampleRate;
    this.blockSize = config.fftSize;
    this.sequence = encodeCode(code);
    this.amplitude = options.amplitude ?? BEACON_AMPLITUDE;
    this.blocksPerSymbol = options.blocksPerSymbol ?? BEACON_BLOCKS_PER_SYMBOL;
    this.gapBlocks = options.gapBlocks ?? 0;
    this.repetitions = options.repetitions ?? Infinity;
    this.realtime = options.realtime ?? false;
  }

  async *blocks(signal?: AbortSignal): AsyncGenerator<Int16Array> {
    const periodMs = (this.blockSize / this.sampleRate) * 1000;
    let phase = 0;

    for (let rep = 0; rep < this.repetitions; rep++) {
      for (const freq of this.sequence) {
        const step = (2 * Math.PI * freq) / this.sampleRate;
        for (let b = 0; b < this.blocksPerSymbol; b++) {
          if (signal?.aborted) return;
          const block = new Int16Array(this.blockSize);
          for (let i = 0; i < this.blockSize; i++) {
            block[i] = Math.round(this.amplitude * Math.sin(phase));
            phase = (phase + step) % (2 * Math.PI);
          }
          yield block;
          if (this.realtime) await sleep(periodMs, signal);
        }
      }

      for (let g = 0; g < this.gapBlocks; g++) {
        if (signal?.aborted) return;
        yield new Int16Array(this.blockSize);
        if (this.realtime) await sleep(periodMs, signal);
      }
    }
  }
}
