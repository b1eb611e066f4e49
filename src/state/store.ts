/**
 * Centralized state management using EventEmitter pattern
 */
import type { LightAction, MagnitudeMap, Rgb } from '../types';
import { BLACK } from '../utils/constants';

export interface DetectedCode {
  code: number;
  /** Bound action, or null when the code has no entry in the table */
  action: LightAction | null;
}

export interface AppState {
  running: boolean;
  detected: DetectedCode | null;
  activeAction: LightAction | null;
  lastColor: Rgb;
  magnitudes: MagnitudeMap;
}

// Event payloads
export interface StoreEvents {
  stateChange: AppState;
  codeDetected: DetectedCode;
  actionChange: LightAction;
  color: Rgb;
  magnitudes: MagnitudeMap;
  error: Error;
}

type EventType = keyof StoreEvents;
type EventListener<K extends EventType> = (data: StoreEvents[K]) => void;
type ListenerMap = { [K in EventType]?: Set<EventListener<K>> };

export class StateStore {
  private listeners: ListenerMap = {};

  public state: AppState = StateStore.initialState();

  private static initialState(): AppState {
    return {
      running: false,
      detected: null,
      activeAction: null,
      lastColor: BLACK,
      magnitudes: new Map(),
    };
  }

  // Event subscription
  on<K extends EventType>(event: K, listener: EventListener<K>): () => void {
    const existing: ListenerMap[K] = this.listeners[event];
    const set = existing ?? new Set<EventListener<K>>();
    if (!existing) this.listeners[event] = set;
    set.add(listener);

    // Return unsubscribe function
    return () => {
      set.delete(listener);
    };
  }

  // Emit event
  emit<K extends EventType>(event: K, data: StoreEvents[K]): void {
    const listeners: ListenerMap[K] = this.listeners[event];
    if (!listeners) return;
    for (const listener of listeners) {
      try {
        listener(data);
      } catch (err) {
        console.error(`Error in event listener for ${event}:`, err);
      }
    }
  }

  // State setters with event emission
  setRunning(running: boolean): void {
    this.state.running = running;
    this.emit('stateChange', this.state);
  }

  setDetected(detected: DetectedCode): void {
    this.state.detected = detected;
    this.emit('codeDetected', detected);
    this.emit('stateChange', this.state);
  }

  setActiveAction(action: LightAction): void {
    this.state.activeAction = action;
    this.emit('actionChange', action);
    this.emit('stateChange', this.state);
  }

  // High-rate updates skip stateChange
  setColor(color: Rgb): void {
    this.state.lastColor = color;
    this.emit('color', color);
  }

  setMagnitudes(magnitudes: MagnitudeMap): void {
    this.state.magnitudes = magnitudes;
    this.emit('magnitudes', magnitudes);
  }

  reportError(error: Error): void {
    this.emit('error', error);
  }

  reset(): void {
    this.state = StateStore.initialState();
    this.emit('stateChange', this.state);
  }
}
