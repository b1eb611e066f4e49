/**
 * Capture -> decode -> animate pipeline
 */
import type { BeaconConfig, Clock, LightAction, MagnitudeMap, Renderer } from '../types';
import { AnimationEngine } from '../light/engine';
import { StateStore } from '../state/store';
import { safeAsync } from '../utils/errors';
import { SignalDecoder } from './decoder';
import { SpectralAnalyzer } from './fft';
import type { AudioSource } from './source';
import type { FeedbackSynthesizer } from './synth';

export interface PipelineOptions {
  store?: StateStore;
  synthesizer?: FeedbackSynthesizer;
  clock?: Clock;
  actions?: readonly LightAction[];
}

export class BeaconPipeline {
  readonly store: StateStore;
  readonly analyzer: SpectralAnalyzer;
  readonly decoder: SignalDecoder;
  readonly engine: AnimationEngine;

  private readonly synthesizer: FeedbackSynthesizer | undefined;
  // Pending switch, awaited by stop()
  private switching: Promise<unknown> = Promise.resolve();

  constructor(config: BeaconConfig, renderer: Renderer, options: PipelineOptions = {}) {
    this.store = options.store ?? new StateStore();
    this.synthesizer = options.synthesizer;
    this.analyzer = new SpectralAnalyzer(config);
    this.decoder = new SignalDecoder(config);

    const store = this.store;
    this.engine = new AnimationEngine(
      config,
      (color) => {
        store.setColor(color);
        renderer(color);
      },
      {
        actions: options.actions,
        clock: options.clock,
        onError: (error) => store.reportError(error),
      }
    );

    this.engine.onAnimationStart((action) => store.setActiveAction(action));
    this.decoder.onCodeChanged((code) => this.handleCode(code));
  }

  /**
   * Analyze and decode one block. Never blocks on the animation.
   */
  processBlock(block: ArrayLike<number>): MagnitudeMap {
    const magnitudes = this.analyzer.analyze(block);
    this.synthesizer?.process(magnitudes);
    this.decoder.update(magnitudes);
    this.store.setMagnitudes(magnitudes);
    return magnitudes;
  }

  /**
   * Consume blocks until the source ends or `signal` aborts
   */
  async run(source: AudioSource, signal?: AbortSignal): Promise<void> {
    this.store.setRunning(true);
    console.log(
      `[Pipeline] Listening at ${source.sampleRate} Hz, ${source.blockSize} samples per block`
    );
    try {
      for await (const block of source.blocks(signal)) {
        this.processBlock(block);
        if (signal?.aborted) break;
      }
    } finally {
      this.store.setRunning(false);
      console.log('[Pipeline] Source finished');
    }
  }

  /**
   * Resolves once every code switch requested so far has taken effect
   */
  async settled(): Promise<void> {
    await this.switching;
  }

  async stop(): Promise<void> {
    this.synthesizer?.stop();
    await this.switching;
    await this.engine.stop();
  }

  private handleCode(code: number): void {
    const action = this.engine.getAction(code) ?? null;
    this.store.setDetected({ code, action });
    if (!action) {
      console.warn(`[Pipeline] Undefined code: ${code}`);
      return;
    }

    const store = this.store;
    this.switching = safeAsync(() => this.engine.play(code), 'Pipeline', (error) =>
      store.reportError(error)
    );
  }
}
