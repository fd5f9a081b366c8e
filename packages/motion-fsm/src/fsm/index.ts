/**
 * FSM Module - lifecycle engine of the motion pipeline
 *
 * @example
 * ```ts
 * import { createMotionFsm, SystemEvent, SystemState } from 'motion-fsm/fsm';
 *
 * const fsm = createMotionFsm({ threadSafe: true, trackHistory: true });
 * await fsm.initialize();
 *
 * const ready = fsm.waitForState(SystemState.Planning, 5000);
 * await fsm.triggerEvent(SystemEvent.StartMoveit);
 * await fsm.triggerEvent(SystemEvent.MoveitReady);
 * await ready; // true
 * ```
 */

export { MotionFsm, createMotionFsm } from './engine.js';
export {
  SystemState,
  SystemEvent,
  ALL_STATES,
  ALL_EVENTS,
  UNKNOWN_STATE,
  UNKNOWN_EVENT,
  isSystemState,
  isSystemEvent,
  stateToString,
  eventToString,
} from './states.js';
export {
  createTransitionTable,
  lookupTransition,
  isValidTransition,
  eventsFrom,
  listTransitions,
} from './transition-table.js';
export type { TransitionTable, TransitionRow, TransitionEdge } from './transition-table.js';
export { Mutex, Passthrough } from './sync.js';
export type { Synchronizer } from './sync.js';
export { Condition } from './condition.js';
export type { WaitOptions } from './condition.js';
export { formatLogLine, consoleLogSink, LOG_TAG } from './logging.js';
export type {
  StateChangeCallback,
  EventCallback,
  LogCallback,
  RejectionReason,
  DispatchResult,
  HistoryEntry,
  FsmNotification,
  WaitForStateOptions,
  MotionFsmOptions,
} from './types.js';
