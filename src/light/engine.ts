/**
 * Animation engine: drives the light action bound to the current code
 */
import type { BeaconConfig, Clock, LightAction, Renderer, Rgb } from '../types';
import { systemClock } from '../utils/async';
import { reportError, type ErrorSink } from '../utils/errors';
import { buildActionMap, LIGHT_ACTIONS } from './patterns';
import { buildSegments, colorAt } from './schedule';

export interface AnimationEngineOptions {
  actions?: readonly LightAction[];
  clock?: Clock;
  onError?: ErrorSink;
}

export type AnimationStartListener = (action: LightAction) => void;

interface ActiveAnimation {
  readonly action: LightAction;
  readonly controller: AbortController;
  done: Promise<void>;
}

/**
 * Owns the single in-flight animation. Switching cancels the running loop,
 * waits for it to exit, then starts the next one; switches are queued so two
 * loops never emit at the same time.
 */
export class AnimationEngine {
  private readonly actions: ReadonlyMap<number, LightAction>;
  private readonly clock: Clock;
  private readonly onError: ErrorSink | undefined;
  private readonly startListeners: Set<AnimationStartListener> = new Set();
  private active: ActiveAnimation | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly config: BeaconConfig,
    private readonly renderer: Renderer,
    options: AnimationEngineOptions = {},
  ) {
    this.actions = buildActionMap(options.actions ?? LIGHT_ACTIONS);
    this.clock = options.clock ?? systemClock;
    this.onError = options.onError;
  }

  get activeAction(): LightAction | null {
    return this.active?.action ?? null;
  }

  getAction(code: number): LightAction | undefined {
    return this.actions.get(code);
  }

  onAnimationStart(listener: AnimationStartListener): () => void {
    this.startListeners.add(listener);
    return () => {
      this.startListeners.delete(listener);
    };
  }

  /**
   * Switch to the action bound to `code`.
   * Resolves false for an unknown code, leaving the current animation running.
   */
  play(code: number): Promise<boolean> {
    const action = this.actions.get(code);
    if (!action) {
      console.warn(`[AnimationEngine] No light action for code ${code}`);
      return Promise.resolve(false);
    }

    return this.enqueue(async () => {
      if (this.active?.action.code === code) return true;
      await this.cancelActive();
      this.start(action);
      return true;
    });
  }

  /**
   * Cancel the running animation and wait for its loop to exit
   */
  stop(): Promise<void> {
    return this.enqueue(() => this.cancelActive());
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async cancelActive(): Promise<void> {
    const current = this.active;
    if (!current) return;

    current.controller.abort();
    await current.done;
    if (this.active === current) {
      this.active = null;
    }
  }

  /**
   * Listeners hear about the action before its first frame is emitted
   */
  private start(action: LightAction): void {
    const animation: ActiveAnimation = {
      action,
      controller: new AbortController(),
      done: Promise.resolve(),
    };
    this.active = animation;

    console.log(`[AnimationEngine] Playing ${action.code}: ${action.name}`);
    for (const listener of this.startListeners) {
      try {
        listener(action);
      } catch (err) {
        console.error(`[AnimationEngine] Error in start listener for ${action.code}:`, err);
      }
    }

    animation.done = this.animate(action, animation.controller.signal).catch((err: unknown) => {
      reportError('AnimationEngine', err, this.onError);
      // A dead loop is not active; the same code can start it again
      if (this.active === animation) this.active = null;
    });
  }

  private emit(color: Rgb, signal: AbortSignal): void {
    if (signal.aborted) return;
    this.renderer(color);
  }

  private async animate(action: LightAction, signal: AbortSignal): Promise<void> {
    const { frameIntervalMs, offColor } = this.config;
    // Nominal start of the current segment; advanced by whole durations so
    // frame jitter never accumulates
    let segmentStart = this.clock.now();

    for (const segment of buildSegments(action.behavior, offColor)) {
      if (signal.aborted) return;

      if (segment.durationMs <= 0) {
        this.emit(segment.to, signal);
        continue;
      }

      let elapsed = this.clock.now() - segmentStart;
      while (elapsed < segment.durationMs) {
        this.emit(colorAt(segment, elapsed), signal);
        await this.clock.sleep(frameIntervalMs, signal);
        if (signal.aborted) return;
        elapsed = this.clock.now() - segmentStart;
      }
      segmentStart += segment.durationMs;
    }
  }
}
