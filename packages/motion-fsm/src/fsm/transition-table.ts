/**
 * Transition table of the motion pipeline
 *
 * Keyed by every state, so a missing state row is a compile error and a
 * target outside SystemState cannot be written. Absence of an event under a
 * state means the event is rejected there.
 */

import { ALL_EVENTS, SystemEvent, SystemState } from './states.js';

export type TransitionRow = Readonly<Partial<Record<SystemEvent, SystemState>>>;

export type TransitionTable = Readonly<Record<SystemState, TransitionRow>>;

/**
 * One edge of the table
 */
export interface TransitionEdge {
  from: SystemState;
  event: SystemEvent;
  to: SystemState;
}

/**
 * Build the table. Called once per engine; the result is frozen.
 */
export function createTransitionTable(): TransitionTable {
  const rows: Record<SystemState, TransitionRow> = {
    [SystemState.Idle]: {
      [SystemEvent.StartMoveit]: SystemState.MoveitStarting,
      [SystemEvent.ResetRequest]: SystemState.Idle,
      [SystemEvent.ErrorOccurred]: SystemState.Error,
    },
    [SystemState.MoveitStarting]: {
      [SystemEvent.MoveitReady]: SystemState.Planning,
      [SystemEvent.MoveitFailed]: SystemState.Error,
      [SystemEvent.ErrorOccurred]: SystemState.Error,
      [SystemEvent.StopRequest]: SystemState.Idle,
    },
    [SystemState.Planning]: {
      [SystemEvent.PlanningSuccess]: SystemState.Executing,
      [SystemEvent.PlanningFailed]: SystemState.Error,
      [SystemEvent.ErrorOccurred]: SystemState.Error,
      [SystemEvent.ObstacleAppeared]: SystemState.ObstacleDetected,
      [SystemEvent.StopRequest]: SystemState.Idle,
    },
    [SystemState.Executing]: {
      [SystemEvent.ExecutionComplete]: SystemState.Idle,
      [SystemEvent.ObstacleAppeared]: SystemState.ObstacleDetected,
      [SystemEvent.StopRequest]: SystemState.Idle,
      [SystemEvent.ErrorOccurred]: SystemState.Error,
    },
    [SystemState.ObstacleDetected]: {
      [SystemEvent.StartPlanning]: SystemState.Planning,
      [SystemEvent.StopRequest]: SystemState.Idle,
      [SystemEvent.ErrorOccurred]: SystemState.Error,
    },
    [SystemState.Error]: {
      [SystemEvent.ResetRequest]: SystemState.Idle,
      [SystemEvent.StopRequest]: SystemState.Idle,
    },
  };

  for (const row of Object.values(rows)) {
    Object.freeze(row);
  }
  return Object.freeze(rows);
}

/**
 * Target of `event` from `from`, or undefined when the event is rejected
 */
export function lookupTransition(
  table: TransitionTable,
  from: SystemState,
  event: SystemEvent
): SystemState | undefined {
  // Own keys only; untyped input such as 'constructor' must not reach Object.prototype
  if (!Object.hasOwn(table, from)) {
    return undefined;
  }
  const row = table[from];
  return Object.hasOwn(row, event) ? row[event] : undefined;
}

/**
 * True only when `(from, event)` exists and maps to `to`
 */
export function isValidTransition(
  table: TransitionTable,
  from: SystemState,
  to: SystemState,
  event: SystemEvent
): boolean {
  const target = lookupTransition(table, from, event);
  return target !== undefined && target === to;
}

/**
 * Events accepted in `state`, in declaration order
 */
export function eventsFrom(table: TransitionTable, state: SystemState): SystemEvent[] {
  return ALL_EVENTS.filter((event) => lookupTransition(table, state, event) !== undefined);
}

export function listTransitions(table: TransitionTable): TransitionEdge[] {
  const edges: TransitionEdge[] = [];
  for (const from of Object.values(SystemState)) {
    for (const event of eventsFrom(table, from)) {
      const to = table[from][event];
      if (to !== undefined) {
        edges.push({ from, event, to });
      }
    }
  }
  return edges;
}
