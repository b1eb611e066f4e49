/**
 * Signal decoder: symbol history and code state
 */
import type { BeaconConfig, BeaconSymbol, MagnitudeMap } from '../types';
import { decodeHistory, dominantSymbol } from './processing';

export type CodeChangedListener = (code: number) => void;

/**
 * Fixed-capacity FIFO of symbols, oldest evicted first
 */
export class SymbolHistory {
  private readonly slots: BeaconSymbol[];
  private idx = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    this.slots = new Array<BeaconSymbol>(capacity).fill(null);
  }

  get size(): number {
    return this.count;
  }

  push(symbol: BeaconSymbol): void {
    this.slots[this.idx] = symbol;
    this.idx = (this.idx + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  /** Oldest to newest */
  toArray(): BeaconSymbol[] {
    const start = (this.idx - this.count + this.capacity) % this.capacity;
    const result: BeaconSymbol[] = new Array(this.count);
    for (let i = 0; i < this.count; i++) {
      result[i] = this.slots[(start + i) % this.capacity];
    }
    return result;
  }

  clear(): void {
    this.slots.fill(null);
    this.idx = 0;
    this.count = 0;
  }
}

/**
 * Consumes magnitude maps and reports a code whenever a new one is recognized.
 *
 * update() is synchronous and is the only mutator of the history and code, so
 * callers on separate event sources are serialized by the event loop.
 */
export class SignalDecoder {
  private readonly history: SymbolHistory;
  private readonly listeners: Set<CodeChangedListener> = new Set();
  private code: number | null = null;
  private symbol: BeaconSymbol = null;

  constructor(private readonly config: BeaconConfig) {
    this.history = new SymbolHistory(config.historySize);
  }

  /** Last decoded code, or null before the first match */
  get currentCode(): number | null {
    return this.code;
  }

  get lastSymbol(): BeaconSymbol {
    return this.symbol;
  }

  get symbols(): BeaconSymbol[] {
    return this.history.toArray();
  }

  onCodeChanged(listener: CodeChangedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Feed one block's magnitudes. Returns the new code when it changed, else null.
   */
  update(magnitudes: MagnitudeMap): number | null {
    const { dominanceFloor, dominanceRatio } = this.config;
    this.symbol = dominantSymbol(magnitudes, dominanceFloor, dominanceRatio);
    this.history.push(this.symbol);

    const decoded = decodeHistory(this.history.toArray());
    if (decoded === null || decoded === this.code) return null;

    this.code = decoded;
    console.log(`[SignalDecoder] Code changed: ${decoded}`);
    for (const listener of this.listeners) {
      try {
        listener(decoded);
      } catch (err) {
        console.error(`[SignalDecoder] Error in code listener for ${decoded}:`, err);
      }
    }
    return decoded;
  }

  reset(): void {
    this.history.clear();
    this.code = null;
    this.symbol = null;
  }
}
