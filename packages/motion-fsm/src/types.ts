/**
 * Type definitions for the notification bus
 *
 * Every event published on one bus carries the same payload type, so
 * wildcard listeners (`fsm:enter:*`) stay typed.
 */

import type { BusEvent } from './bus-event.js';

// ============================================================================
// Listener Types
// ============================================================================

/**
 * Listener function signature
 * @template T - The event data type
 */
export type BusListener<T> = (event: BusEvent<T>) => void | Promise<void>;

/**
 * Options for registering a listener
 */
export interface ListenerOptions {
  /** Identifier reported in error and debug output */
  id?: string;

  /** Priority - higher values execute earlier */
  priority?: number;

  /** Remove the listener after its first execution */
  once?: boolean;

  /** AbortSignal for cleanup */
  signal?: AbortSignal;
}

/**
 * Internal listener entry stored in the bus
 * @internal
 */
export interface ListenerEntry<T> {
  id: string;
  callback: BusListener<T>;
  priority: number;
  once: boolean;
  signal?: AbortSignal;

  /** Abort event listener reference for cleanup */
  abortListener?: () => void;
}

// ============================================================================
// Bus Options
// ============================================================================

/**
 * Options for creating a bus instance
 */
export interface EventBusOptions<T> {
  /** Event name delimiter for namespacing (default: ':') */
  delimiter?: string;

  /** Enable wildcard pattern matching (default: true) */
  wildcard?: boolean;

  /** Maximum listeners per event before a warning (default: Infinity) */
  maxListeners?: number;

  /** Error handler for listener exceptions */
  onError?: (error: Error, event: BusEvent<T>) => void;

  /** Debug mode - enables `console.debug` diagnostics */
  debug?: boolean;
}

/**
 * Unbind function returned by on() and once()
 */
export type UnbindFunction = () => void;

/**
 * Normalize anything thrown into an Error
 */
export const toError = (value: unknown): Error => {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : String(value));
};
