/**
 * Closed state and event sets of the motion pipeline
 *
 * Values double as the stable display names used in log lines.
 */

export const SystemState = Object.freeze({
  Idle: 'IDLE',
  MoveitStarting: 'MOVEIT_STARTING',
  Planning: 'PLANNING',
  Executing: 'EXECUTING',
  ObstacleDetected: 'OBSTACLE_DETECTED',
  Error: 'ERROR',
} as const);

export type SystemState = (typeof SystemState)[keyof typeof SystemState];

export const SystemEvent = Object.freeze({
  StartMoveit: 'START_MOVEIT',
  MoveitReady: 'MOVEIT_READY',
  MoveitFailed: 'MOVEIT_FAILED',
  StartPlanning: 'START_PLANNING',
  PlanningSuccess: 'PLANNING_SUCCESS',
  PlanningFailed: 'PLANNING_FAILED',
  ExecutionComplete: 'EXECUTION_COMPLETE',
  ObstacleAppeared: 'OBSTACLE_APPEARED',
  // Declared but not wired to any transition
  ObstacleCleared: 'OBSTACLE_CLEARED',
  StopRequest: 'STOP_REQUEST',
  ErrorOccurred: 'ERROR_OCCURRED',
  ResetRequest: 'RESET_REQUEST',
} as const);

export type SystemEvent = (typeof SystemEvent)[keyof typeof SystemEvent];

export const ALL_STATES: readonly SystemState[] = Object.freeze(Object.values(SystemState));

export const ALL_EVENTS: readonly SystemEvent[] = Object.freeze(Object.values(SystemEvent));

const stateSet = new Set<unknown>(ALL_STATES);
const eventSet = new Set<unknown>(ALL_EVENTS);

export const UNKNOWN_STATE = 'UNKNOWN';
export const UNKNOWN_EVENT = 'UNKNOWN_EVENT';

export function isSystemState(value: unknown): value is SystemState {
  return stateSet.has(value);
}

export function isSystemEvent(value: unknown): value is SystemEvent {
  return eventSet.has(value);
}

/**
 * Display name of a state; `"UNKNOWN"` for anything outside the set
 */
export function stateToString(state: SystemState): string {
  return isSystemState(state) ? state : UNKNOWN_STATE;
}

/**
 * Display name of an event; `"UNKNOWN_EVENT"` for anything outside the set
 */
export function eventToString(event: SystemEvent): string {
  return isSystemEvent(event) ? event : UNKNOWN_EVENT;
}
