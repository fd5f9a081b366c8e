/**
 * EventBus - async notification bus
 *
 * - Priority-based listener ordering
 * - Wildcard patterns (`fsm:enter:*`, `fsm:**`)
 * - Error boundary so one failing listener cannot block the others
 * - AbortSignal cleanup
 */

import { BusEvent } from './bus-event.js';
import { findMatchingPatterns } from './wildcard.js';
import {
  toError,
  type BusListener,
  type EventBusOptions,
  type ListenerEntry,
  type ListenerOptions,
  type UnbindFunction,
} from './types.js';

interface ResolvedOptions<T> {
  delimiter: string;
  wildcard: boolean;
  maxListeners: number;
  debug: boolean;
  onError: (error: Error, event: BusEvent<T>) => void;
}

export class EventBus<T = unknown> {
  private listeners = new Map<string, ListenerEntry<T>[]>();
  private options: ResolvedOptions<T>;
  private listenerIdCounter = 0;

  constructor(options: EventBusOptions<T> = {}) {
    this.options = {
      delimiter: options.delimiter ?? ':',
      wildcard: options.wildcard ?? true,
      maxListeners: options.maxListeners ?? Infinity,
      debug: options.debug ?? false,
      onError: options.onError ?? ((error: Error) => {
        console.error('EventBus error:', error);
      }),
    };

    if (this.options.debug) {
      console.debug('[EventBus] Bus initialized', {
        delimiter: this.options.delimiter,
        wildcard: this.options.wildcard,
        maxListeners: this.options.maxListeners,
      });
    }
  }

  /**
   * Register a listener for an event name or wildcard pattern.
   * Returns an unbind function.
   */
  on(eventName: string, listener: BusListener<T>, options: ListenerOptions = {}): UnbindFunction {
    if (options.signal?.aborted) {
      if (this.options.debug) {
        console.debug('[EventBus] Listener not added (signal already aborted)', {
          event: eventName,
        });
      }
      return () => {};
    }

    const entry: ListenerEntry<T> = {
      id: options.id ?? `listener_${++this.listenerIdCounter}`,
      callback: listener,
      priority: options.priority ?? 0,
      once: options.once ?? false,
      signal: options.signal,
    };

    if (options.signal) {
      entry.abortListener = () => this.off(eventName, listener);
    }

    const entries = this.listeners.get(eventName) ?? [];
    entries.push(entry);
    // Higher priority first; stable for equal priorities
    entries.sort((a, b) => b.priority - a.priority);
    this.listeners.set(eventName, entries);

    if (this.options.debug) {
      console.debug('[EventBus] Listener added', {
        event: eventName,
        listenerId: entry.id,
        priority: entry.priority,
        once: entry.once,
        totalListeners: entries.length,
      });
    }

    if (entries.length > this.options.maxListeners) {
      console.warn(
        `MaxListenersExceeded: Event "${eventName}" has ${entries.length} listeners (limit: ${this.options.maxListeners})`
      );
    }

    if (options.signal && entry.abortListener) {
      options.signal.addEventListener('abort', entry.abortListener, { once: true });
    }

    return () => this.off(eventName, listener);
  }

  /**
   * Register a listener that is removed after its first execution
   */
  once(
    eventName: string,
    listener: BusListener<T>,
    options: Omit<ListenerOptions, 'once'> = {}
  ): UnbindFunction {
    return this.on(eventName, listener, { ...options, once: true });
  }

  /**
   * Remove a listener.
   * Without a listener, removes every listener for the event name.
   */
  off(eventName: string, listener?: BusListener<T>): void {
    const entries = this.listeners.get(eventName);

    if (!entries) {
      return;
    }

    const removed = listener
      ? entries.filter((entry) => entry.callback === listener)
      : entries;

    for (const entry of removed) {
      if (entry.signal && entry.abortListener) {
        entry.signal.removeEventListener('abort', entry.abortListener);
      }
    }

    const remaining = listener
      ? entries.filter((entry) => entry.callback !== listener)
      : [];

    if (this.options.debug && removed.length > 0) {
      console.debug('[EventBus] Listener removed', {
        event: eventName,
        removed: removed.length,
        remaining: remaining.length,
      });
    }

    if (remaining.length === 0) {
      this.listeners.delete(eventName);
    } else {
      this.listeners.set(eventName, remaining);
    }
  }

  /**
   * Emit an event.
   * Matching listeners run concurrently; resolves when all have settled.
   */
  async emit(eventName: string, data: T): Promise<void> {
    const entries = this.collectListeners(eventName);

    if (entries.length === 0) {
      if (this.options.debug) {
        console.debug('[EventBus] Event emitted (no listeners)', { event: eventName });
      }
      return;
    }

    if (this.options.debug) {
      console.debug('[EventBus] Event emitted', {
        event: eventName,
        listenerCount: entries.length,
      });
    }

    const event = new BusEvent<T>(eventName, data);

    await Promise.all(entries.map((entry) => this.executeListener(entry, event)));

    this.removeOnceListeners(entries);
  }

  private collectListeners(eventName: string): ListenerEntry<T>[] {
    const patterns = this.options.wildcard
      ? findMatchingPatterns(eventName, this.listeners.keys(), this.options.delimiter)
      : this.listeners.has(eventName) ? [eventName] : [];

    const collected: ListenerEntry<T>[] = [];
    for (const pattern of patterns) {
      const entries = this.listeners.get(pattern);
      if (entries) {
        collected.push(...entries);
      }
    }

    return collected.sort((a, b) => b.priority - a.priority);
  }

  /**
   * Execute a single listener; failures go to onError and never reject emit()
   */
  private async executeListener(entry: ListenerEntry<T>, event: BusEvent<T>): Promise<void> {
    try {
      await entry.callback(event);
    } catch (thrown) {
      const error = toError(thrown);

      if (this.options.debug) {
        console.debug('[EventBus] Listener error', {
          listenerId: entry.id,
          error: error.message,
        });
      }

      this.options.onError(error, event);
    }
  }

  private removeOnceListeners(entries: ListenerEntry<T>[]): void {
    for (const entry of entries) {
      if (!entry.once) {
        continue;
      }
      for (const [pattern, registered] of this.listeners.entries()) {
        if (registered.includes(entry)) {
          this.off(pattern, entry.callback);
          break;
        }
      }
    }
  }

  /**
   * Number of listeners for an event name, or across all events
   */
  listenerCount(eventName?: string): number {
    if (eventName === undefined) {
      let total = 0;
      for (const entries of this.listeners.values()) {
        total += entries.length;
      }
      return total;
    }
    return this.listeners.get(eventName)?.length ?? 0;
  }

  eventNames(): string[] {
    return Array.from(this.listeners.keys());
  }

  /**
   * Remove all listeners for all events (or one event)
   */
  offAll(eventName?: string): void {
    if (eventName !== undefined) {
      this.off(eventName);
      return;
    }
    for (const name of this.eventNames()) {
      this.off(name);
    }
  }

  debug(enabled: boolean): void {
    this.options.debug = enabled;
    console.debug(`[EventBus] Debug mode ${enabled ? 'enabled' : 'disabled'}`);
  }
}

export const createEventBus = <T = unknown>(options?: EventBusOptions<T>): EventBus<T> => {
  return new EventBus<T>(options);
};
