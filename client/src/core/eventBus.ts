/**
 * Typed event bus for field events.
 * Zero-dependency pub/sub with type safety.
 */

import type { DegradedStage, FrameStats, LODPresetName, QualityPreset } from '../types';

type Listener<T> = (payload: T) => void;

type ListenerTable<EventMap> = { [K in keyof EventMap]?: Set<Listener<EventMap[K]>> };

export class EventBus<EventMap extends { [K in keyof EventMap]: unknown }> {
  private listeners: ListenerTable<EventMap> = {};

  on<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    const set = this.listeners[event] ?? new Set<Listener<EventMap[K]>>();
    this.listeners[event] = set;
    set.add(listener);

    return () => {
      set.delete(listener);
      if (set.size === 0 && this.listeners[event] === set) delete this.listeners[event];
    };
  }

  once<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    const unsub = this.on(event, (payload) => {
      unsub();
      listener(payload);
    });
    return unsub;
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const set = this.listeners[event];
    if (!set) return;
    // Snapshot so a listener may unsubscribe itself mid-dispatch.
    for (const listener of [...set]) {
      listener(payload);
    }
  }

  off<K extends keyof EventMap>(event: K): void {
    delete this.listeners[event];
  }

  listenerCount<K extends keyof EventMap>(event: K): number {
    return this.listeners[event]?.size ?? 0;
  }

  clear(): void {
    this.listeners = {};
  }
}

// ── Field Event Map ─────────────────────────────────────────────

export interface FieldEventMap {
  features_changed: { count: number; revision: number };
  indices_rebuilt: { revision: number; features: number; buildTimeMs: number };
  lod_preset_changed: { from: LODPresetName; to: LODPresetName };
  quality_changed: { from: QualityPreset; to: QualityPreset };
  frame_rendered: FrameStats;
  stage_degraded: { year: number; stages: DegradedStage[] };
}
