/**
 * Minimal typed Event Bus with bounded in-memory history
 * - emits events in-process (sync)
 * - listeners never break the emitter; their errors are reported and dropped
 */

import { ulid } from "ulid";

export interface EventPayloads {
  ModelResolvedEvent: { requested: string; resolved: string };
  ModelFallbackEvent: { requested: string; fallback: string; reason: string };
  ModelAcquisitionEvent: { model: string; status: "started" | "succeeded" | "failed"; error?: string };
  GenerationEvent: { model: string; promptLength: number; responseLength: number; duration: number };
  GenerationErrorEvent: { model: string; kind: string; error: string };
  RequestEvent: { method: string; path: string; statusCode: number; duration: number };
  ListenerErrorEvent: { type: string; error: string };
}

export type EventType = keyof EventPayloads;

export interface EventEnvelope<K extends EventType = EventType> {
  id: string;
  type: K;
  timestamp: number;
  payload: EventPayloads[K];
}

type Listener<K extends EventType> = (evt: EventEnvelope<K>) => void;
type AnyListener = (evt: EventEnvelope) => void;

export interface EventBusConfig {
  maxHistorySize?: number;
}

export class EventBus {
  private listeners: { [K in EventType]?: Set<Listener<K>> } = {};
  private anyListeners: Set<AnyListener> = new Set();
  public history: EventEnvelope[] = [];
  private maxHistorySize: number;

  constructor(config: EventBusConfig = {}) {
    this.maxHistorySize = config.maxHistorySize ?? 1000;
  }

  on<K extends EventType>(type: K, listener: Listener<K>): void {
    const existing: Set<Listener<K>> | undefined = this.listeners[type];
    if (existing) {
      existing.add(listener);
      return;
    }
    const created = new Set<Listener<K>>([listener]);
    this.setListeners(type, created);
  }

  off<K extends EventType>(type: K, listener: Listener<K>): void {
    const existing: Set<Listener<K>> | undefined = this.listeners[type];
    existing?.delete(listener);
  }

  onAny(listener: AnyListener): void {
    this.anyListeners.add(listener);
  }

  emit<K extends EventType>(type: K, payload: EventPayloads[K]): EventEnvelope<K> {
    const envelope: EventEnvelope<K> = {
      id: ulid(),
      type,
      timestamp: Date.now(),
      payload,
    };

    this.history.push(envelope);
    if (this.history.length > this.maxHistorySize) {
      this.history.splice(0, this.history.length - this.maxHistorySize);
    }

    const typed: Set<Listener<K>> | undefined = this.listeners[type];
    if (typed) {
      for (const l of typed) {
        try {
          l(envelope);
        } catch (e) {
          this.reportListenerError(type, e);
        }
      }
    }

    for (const l of this.anyListeners) {
      try {
        l(envelope);
      } catch (e) {
        this.reportListenerError(type, e);
      }
    }

    return envelope;
  }

  /**
   * Get history with optional filtering
   */
  getHistory<K extends EventType>(options: { type: K; limit?: number }): EventEnvelope<K>[];
  getHistory(options?: { limit?: number }): EventEnvelope[];
  getHistory(options?: { type?: EventType; limit?: number }): EventEnvelope[] {
    let filtered = this.history;

    if (options?.type) {
      filtered = filtered.filter((e) => e.type === options.type);
    }

    if (options?.limit) {
      filtered = filtered.slice(-options.limit);
    }

    return filtered;
  }

  private setListeners<K extends EventType>(type: K, set: Set<Listener<K>>): void {
    Object.assign(this.listeners, { [type]: set });
  }

  private reportListenerError(type: EventType, e: unknown): void {
    console.error(`[EventBus] Listener error for ${type}:`, e);
    // Never recurse on a failing error listener
    if (type === "ListenerErrorEvent") return;
    this.emit("ListenerErrorEvent", { type, error: e instanceof Error ? e.message : String(e) });
  }
}
