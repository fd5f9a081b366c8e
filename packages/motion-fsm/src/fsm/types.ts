/**
 * FSM engine types
 */

import type { SystemEvent, SystemState } from './states.js';

/**
 * Notified after a transition (or reset) has committed. Cannot veto.
 */
export type StateChangeCallback = (
  oldState: SystemState,
  newState: SystemState
) => void | Promise<void>;

/**
 * Consulted before committing a transition on its event.
 * Anything but `true` (or a throw) vetoes the transition.
 */
export type EventCallback = (
  event: SystemEvent,
  data?: string
) => boolean | Promise<boolean>;

/**
 * Receives one formatted, timestamped line per log message
 */
export type LogCallback = (line: string) => void;

/**
 * Why a dispatch did not commit
 * - `no-state-entry`: the current state has no row in the table
 * - `unsupported`: the event has no edge from the current state
 * - `declined`: the event callback returned false
 * - `callback-error`: the event callback threw or rejected
 * - `invalid-transition`: the edge no longer matched at commit time
 */
export type RejectionReason =
  | 'no-state-entry'
  | 'unsupported'
  | 'declined'
  | 'callback-error'
  | 'invalid-transition';

export type DispatchResult =
  | {
      ok: true;
      event: SystemEvent;
      from: SystemState;
      to: SystemState;
    }
  | {
      ok: false;
      event: SystemEvent;
      state: SystemState;
      reason: RejectionReason;
      error?: Error;
    };

/**
 * Committed transition kept when history tracking is on
 */
export interface HistoryEntry {
  from: SystemState;
  to: SystemState;
  event: SystemEvent;
  timestamp: number;
}

/**
 * Payload of every notification published on the engine bus
 */
export interface FsmNotification {
  /** Bus prefix of the publishing engine */
  machine: string;
  /** Current state once the notification is published */
  state: SystemState;
  from?: SystemState;
  to?: SystemState;
  event?: SystemEvent;
  reason?: RejectionReason;
  data?: string;
}

export interface WaitForStateOptions {
  /** Milliseconds; 0 waits indefinitely */
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * Engine configuration
 */
export interface MotionFsmOptions {
  /** Serialize mutating operations from the start (default: false) */
  threadSafe?: boolean;

  /** Initial log sink (default: console writer) */
  logger?: LogCallback;

  /** Timestamp source for log lines (default: current time) */
  clock?: () => Date;

  /** Verbose `console.debug` diagnostics (default: false) */
  debug?: boolean;

  /** Bus event prefix (default: 'fsm') */
  prefix?: string;

  /** Keep committed transitions (default: false) */
  trackHistory?: boolean;

  /** History entries kept (default: 100) */
  maxHistory?: number;
}
