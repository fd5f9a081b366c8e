/**
 * Integration tests for the motion pipeline lifecycle
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MotionFsm, createMotionFsm } from '../../src/fsm/engine.js';
import { ALL_EVENTS, ALL_STATES, SystemEvent, SystemState } from '../../src/fsm/states.js';

type Edge = readonly [from: string, event: string, to: string];

const EXPECTED_EDGES: readonly Edge[] = [
  ['IDLE', 'START_MOVEIT', 'MOVEIT_STARTING'],
  ['IDLE', 'RESET_REQUEST', 'IDLE'],
  ['IDLE', 'ERROR_OCCURRED', 'ERROR'],
  ['MOVEIT_STARTING', 'MOVEIT_READY', 'PLANNING'],
  ['MOVEIT_STARTING', 'MOVEIT_FAILED', 'ERROR'],
  ['MOVEIT_STARTING', 'ERROR_OCCURRED', 'ERROR'],
  ['MOVEIT_STARTING', 'STOP_REQUEST', 'IDLE'],
  ['PLANNING', 'PLANNING_SUCCESS', 'EXECUTING'],
  ['PLANNING', 'PLANNING_FAILED', 'ERROR'],
  ['PLANNING', 'ERROR_OCCURRED', 'ERROR'],
  ['PLANNING', 'OBSTACLE_APPEARED', 'OBSTACLE_DETECTED'],
  ['PLANNING', 'STOP_REQUEST', 'IDLE'],
  ['EXECUTING', 'EXECUTION_COMPLETE', 'IDLE'],
  ['EXECUTING', 'OBSTACLE_APPEARED', 'OBSTACLE_DETECTED'],
  ['EXECUTING', 'STOP_REQUEST', 'IDLE'],
  ['EXECUTING', 'ERROR_OCCURRED', 'ERROR'],
  ['OBSTACLE_DETECTED', 'START_PLANNING', 'PLANNING'],
  ['OBSTACLE_DETECTED', 'STOP_REQUEST', 'IDLE'],
  ['OBSTACLE_DETECTED', 'ERROR_OCCURRED', 'ERROR'],
  ['ERROR', 'RESET_REQUEST', 'IDLE'],
  ['ERROR', 'STOP_REQUEST', 'IDLE'],
];

const PATHS: Record<SystemState, SystemEvent[]> = {
  [SystemState.Idle]: [],
  [SystemState.MoveitStarting]: [SystemEvent.StartMoveit],
  [SystemState.Planning]: [SystemEvent.StartMoveit, SystemEvent.MoveitReady],
  [SystemState.Executing]: [
    SystemEvent.StartMoveit,
    SystemEvent.MoveitReady,
    SystemEvent.PlanningSuccess,
  ],
  [SystemState.ObstacleDetected]: [
    SystemEvent.StartMoveit,
    SystemEvent.MoveitReady,
    SystemEvent.ObstacleAppeared,
  ],
  [SystemState.Error]: [SystemEvent.ErrorOccurred],
};

const expectedTarget = (from: string, event: string): string | undefined =>
  EXPECTED_EDGES.find((edge) => edge[0] === from && edge[1] === event)?.[2];

const freshEngineIn = async (state: SystemState): Promise<MotionFsm> => {
  const fsm = createMotionFsm({ logger: () => {} });
  await fsm.initialize();
  for (const event of PATHS[state]) {
    await fsm.triggerEvent(event);
  }
  return fsm;
};

describe('motion pipeline', () => {
  let fsm: MotionFsm;
  let lines: string[];

  beforeEach(async () => {
    lines = [];
    fsm = createMotionFsm({
      logger: (line) => {
        lines.push(line);
      },
    });
    await fsm.initialize();
  });

  describe('table coverage', () => {
    it('reaches every state through its path', async () => {
      for (const state of ALL_STATES) {
        const engine = await freshEngineIn(state);
        expect(engine.getCurrentState()).toBe(state);
      }
    });

    it('commits exactly the expected edges from every state', async () => {
      for (const state of ALL_STATES) {
        for (const event of ALL_EVENTS) {
          const engine = await freshEngineIn(state);
          const target = expectedTarget(state, event);

          const accepted = await engine.triggerEvent(event);

          expect(accepted, `${state} + ${event}`).toBe(target !== undefined);
          expect(engine.getCurrentState(), `${state} + ${event}`).toBe(target ?? state);
          if (target !== undefined) {
            expect(engine.getPreviousState()).toBe(state);
          }
        }
      }
    });

    it('leaves the state unchanged when any edge is vetoed', async () => {
      for (const [from, event] of EXPECTED_EDGES) {
        const state = ALL_STATES.find((candidate) => candidate === from);
        const trigger = ALL_EVENTS.find((candidate) => candidate === event);
        if (state === undefined || trigger === undefined) {
          throw new Error(`Unknown edge ${from} + ${event}`);
        }

        const engine = await freshEngineIn(state);
        engine.setEventCallback(trigger, () => false);

        await expect(engine.triggerEvent(trigger)).resolves.toBe(false);
        expect(engine.getCurrentState()).toBe(state);
      }
    });
  });

  describe('scenarios', () => {
    it('runs a plan from start to completion', async () => {
      const visited: string[] = [];
      fsm.setStateChangeCallback((_, next) => {
        visited.push(next);
      });

      for (const event of [
        SystemEvent.StartMoveit,
        SystemEvent.MoveitReady,
        SystemEvent.PlanningSuccess,
        SystemEvent.ExecutionComplete,
      ]) {
        await expect(fsm.triggerEvent(event)).resolves.toBe(true);
      }

      expect(visited).toEqual(['MOVEIT_STARTING', 'PLANNING', 'EXECUTING', 'IDLE']);
      expect(fsm.getPreviousState()).toBe(SystemState.Executing);
    });

    it('replans after an obstacle during execution', async () => {
      await fsm.triggerEvent(SystemEvent.StartMoveit);
      await fsm.triggerEvent(SystemEvent.MoveitReady);
      await fsm.triggerEvent(SystemEvent.PlanningSuccess);

      await expect(fsm.triggerEvent(SystemEvent.ObstacleAppeared)).resolves.toBe(true);
      await expect(fsm.triggerEvent(SystemEvent.ObstacleCleared)).resolves.toBe(false);
      await expect(fsm.triggerEvent(SystemEvent.StartPlanning)).resolves.toBe(true);

      expect(fsm.getCurrentState()).toBe(SystemState.Planning);
      expect(fsm.getPreviousState()).toBe(SystemState.ObstacleDetected);
    });

    it('only leaves ERROR through reset or stop', async () => {
      await fsm.triggerEvent(SystemEvent.ErrorOccurred);

      const accepted = ALL_EVENTS.filter((event) => fsm.canTransition(event));
      expect(accepted).toEqual(['STOP_REQUEST', 'RESET_REQUEST']);

      await expect(fsm.triggerEvent(SystemEvent.StartMoveit)).resolves.toBe(false);
      await expect(fsm.triggerEvent(SystemEvent.ResetRequest)).resolves.toBe(true);
      expect(fsm.getCurrentState()).toBe(SystemState.Idle);
    });

    it('aborts MoveIt startup on failure and recovers with a reset', async () => {
      await fsm.triggerEvent(SystemEvent.StartMoveit);
      await fsm.triggerEvent(SystemEvent.MoveitFailed);
      expect(fsm.getCurrentState()).toBe(SystemState.Error);

      await fsm.reset();

      expect(fsm.getCurrentState()).toBe(SystemState.Idle);
      expect(fsm.getPreviousState()).toBe(SystemState.Error);
      await expect(fsm.triggerEvent(SystemEvent.StartMoveit)).resolves.toBe(true);
    });

    it('lets a waiter follow a pipeline driven by another caller', async () => {
      const engine = createMotionFsm({ threadSafe: true, logger: () => {} });
      await engine.initialize();

      const executing = engine.waitForState(SystemState.Executing, 1000);
      const driver = (async () => {
        await engine.triggerEvent(SystemEvent.StartMoveit);
        await engine.triggerEvent(SystemEvent.MoveitReady);
        await engine.triggerEvent(SystemEvent.PlanningSuccess);
      })();

      await expect(executing).resolves.toBe(true);
      await driver;
    });

    it('logs one line per outcome', async () => {
      await fsm.triggerEvent(SystemEvent.StartMoveit);
      await fsm.triggerEvent(SystemEvent.PlanningSuccess);

      const messages = lines.map((line) => line.replace(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] /, ''));
      expect(messages).toEqual([
        'State machine initialized',
        'State transition: IDLE -> MOVEIT_STARTING (START_MOVEIT)',
        'State MOVEIT_STARTING does not support event PLANNING_SUCCESS',
      ]);
    });
  });
});
