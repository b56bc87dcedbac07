/**
 * @module event-bus
 * Synchronous, typed pub/sub shared by the managers, tools and host.
 *
 * Managers and tools announce state changes here instead of holding
 * references to each other. Every listener has run by the time `emit`
 * returns.
 *
 * @see {@link @layerkit/types#EventBus} for the interface contract
 * @see {@link @layerkit/types#EventMap} for the event catalogue
 */

import type { EventBus, EventCallback, EventMap } from '@layerkit/types';

type Callback = (...args: unknown[]) => void;

/**
 * Subscriptions per event, keyed by the callback the subscriber passed in.
 * The value is what `emit` actually calls: the callback itself for `on`,
 * a self-removing wrapper for `once`. Keying per event means `off(event, cb)`
 * only ever touches that event's entry, however many events share `cb`.
 */
type Subscriptions = Map<Callback, Callback>;

/**
 * Map-backed {@link EventBus}. Delivery follows subscription order.
 * A throwing listener stops delivery to the listeners after it and the
 * error reaches the emitter.
 */
export class EventBusImpl implements EventBus {
  private readonly events = new Map<string, Subscriptions>();

  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    const key = callback as Callback;
    this.subscriptions(event).set(key, key);
    return () => this.off(event, callback);
  }

  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    const key = callback as Callback;
    const invoke: Callback = (...args) => {
      this.off(event, callback);
      key(...args);
    };
    this.subscriptions(event).set(key, invoke);
    return () => this.off(event, callback);
  }

  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void {
    const subs = this.events.get(event);
    if (!subs?.delete(callback as Callback)) return;
    if (subs.size === 0) this.events.delete(event);
  }

  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void {
    const subs = this.events.get(event);
    if (!subs) return;
    // Snapshot: subscriptions made or dropped by a listener apply from the next emit.
    for (const invoke of [...subs.values()]) {
      invoke(...args);
    }
  }

  listenerCount<K extends keyof EventMap>(event: K): number {
    return this.events.get(event)?.size ?? 0;
  }

  clear(): void {
    this.events.clear();
  }

  private subscriptions(event: string): Subscriptions {
    let subs = this.events.get(event);
    if (!subs) {
      subs = new Map();
      this.events.set(event, subs);
    }
    return subs;
  }
}
