/**
 * @fileoverview Typed in-process event hub
 *
 * @packageDocumentation
 * @module @canopy/core/domain/events
 *
 * The container, the locator and the bring-up pipeline raise their
 * notifications through an EventHub so that instrumentation and logging
 * collaborators can subscribe without the emitter depending on them.
 *
 * The event map is a plain interface: keys are event names, values are
 * payload types.
 *
 * @example
 * ```typescript
 * interface PhaseEvents {
 *   phaseStarted: { phase: string };
 *   phaseCompleted: { phase: string; durationMs: number };
 * }
 *
 * const hub = new EventHub<PhaseEvents>();
 * const off = hub.on('phaseCompleted', ({ phase, durationMs }) => {
 *   logger.info(`${phase} took ${durationMs}ms`);
 * });
 *
 * hub.emit('phaseCompleted', { phase: 'CoreSystems', durationMs: 12 });
 * off();
 * ```
 */

/**
 * Listener for a single event
 */
export type EventListener<TPayload> = (payload: TPayload) => void;

/**
 * Unsubscribe handle returned by `on` and `once`
 */
export type Unsubscribe = () => void;

/**
 * Called when a listener throws; emission continues with the next listener
 */
export type ListenerErrorHandler = (
  eventName: string,
  error: unknown,
) => void;

/**
 * Read side of an event hub, exposed by components as `events`
 */
export interface IEventSource<TEvents extends object> {
  /**
   * Subscribe to an event
   *
   * @returns Function that removes the subscription
   */
  on<K extends keyof TEvents>(
    eventName: K,
    listener: EventListener<TEvents[K]>,
  ): Unsubscribe;

  /**
   * Subscribe to the next occurrence of an event only
   */
  once<K extends keyof TEvents>(
    eventName: K,
    listener: EventListener<TEvents[K]>,
  ): Unsubscribe;

  /**
   * Remove a listener previously passed to `on` or `once`
   */
  off<K extends keyof TEvents>(
    eventName: K,
    listener: EventListener<TEvents[K]>,
  ): void;

  /**
   * Number of listeners currently attached to an event
   */
  listenerCount<K extends keyof TEvents>(eventName: K): number;
}

type ListenerTable<TEvents extends object> = {
  [K in keyof TEvents]?: Set<EventListener<TEvents[K]>>;
};

/**
 * Synchronous, typed event hub
 */
export class EventHub<TEvents extends object> implements IEventSource<TEvents> {
  private listeners: ListenerTable<TEvents> = {};

  /** `once` wrapper to the listener it wraps */
  private readonly onceOriginals = new WeakMap<object, object>();

  constructor(private readonly onListenerError?: ListenerErrorHandler) {}

  on<K extends keyof TEvents>(
    eventName: K,
    listener: EventListener<TEvents[K]>,
  ): Unsubscribe {
    let set = this.listeners[eventName];
    if (!set) {
      set = new Set<EventListener<TEvents[K]>>();
      this.listeners[eventName] = set;
    }
    set.add(listener);
    return () => this.off(eventName, listener);
  }

  once<K extends keyof TEvents>(
    eventName: K,
    listener: EventListener<TEvents[K]>,
  ): Unsubscribe {
    const wrapper: EventListener<TEvents[K]> = (payload) => {
      this.off(eventName, wrapper);
      listener(payload);
    };
    this.onceOriginals.set(wrapper, listener);
    return this.on(eventName, wrapper);
  }

  off<K extends keyof TEvents>(
    eventName: K,
    listener: EventListener<TEvents[K]>,
  ): void {
    const set = this.listeners[eventName];
    if (!set || set.delete(listener)) return;

    for (const candidate of set) {
      if (this.onceOriginals.get(candidate) === listener) {
        set.delete(candidate);
        return;
      }
    }
  }

  /**
   * Deliver a payload to every listener in subscription order
   */
  emit<K extends keyof TEvents>(eventName: K, payload: TEvents[K]): void {
    const set = this.listeners[eventName];
    if (!set || set.size === 0) return;

    for (const listener of [...set]) {
      try {
        listener(payload);
      } catch (error) {
        if (!this.onListenerError) throw error;
        this.onListenerError(String(eventName), error);
      }
    }
  }

  listenerCount<K extends keyof TEvents>(eventName: K): number {
    return this.listeners[eventName]?.size ?? 0;
  }

  /**
   * Drop every subscription
   */
  clear(): void {
    this.listeners = {};
  }
}
