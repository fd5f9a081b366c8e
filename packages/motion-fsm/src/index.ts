/**
 * motion-fsm - lifecycle state machine for a robotic motion pipeline
 *
 * - Static transition table over closed state and event sets
 * - Veto callbacks per event, one state-change callback
 * - Opt-in serialization of concurrent callers
 * - Awaitable waits on a target state
 * - Notification bus with wildcard patterns
 * - Zero runtime dependencies
 */

export const VERSION = '1.0.0';

// Notification bus
export { BusEvent } from './bus-event.js';
export { EventBus, createEventBus } from './event-bus.js';
export { matchesPattern, findMatchingPatterns, clearPatternCache } from './wildcard.js';
export { toError } from './types.js';
export type {
  BusListener,
  ListenerOptions,
  EventBusOptions,
  UnbindFunction,
} from './types.js';

// FSM engine
export * from './fsm/index.js';
