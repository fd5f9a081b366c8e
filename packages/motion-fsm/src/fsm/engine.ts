/**
 * MotionFsm - lifecycle engine of the motion pipeline
 *
 * Dispatch runs on the caller's promise chain; there is no internal
 * scheduler. Every outcome reaches the caller as a boolean (or a typed
 * DispatchResult) plus one log line; no error crosses the public surface.
 *
 * Bus notifications are built under the lock and published after it is
 * released, so a listener may call back into the engine.
 */

import { EventBus } from '../event-bus.js';
import { toError, type BusListener, type ListenerOptions, type UnbindFunction } from '../types.js';
import { Condition } from './condition.js';
import { consoleLogSink, formatLogLine } from './logging.js';
import {
  SystemEvent,
  SystemState,
  eventToString,
  stateToString,
} from './states.js';
import { Mutex, Passthrough, type Synchronizer } from './sync.js';
import {
  createTransitionTable,
  eventsFrom,
  isValidTransition,
  lookupTransition,
  type TransitionTable,
} from './transition-table.js';
import type {
  DispatchResult,
  EventCallback,
  FsmNotification,
  HistoryEntry,
  LogCallback,
  MotionFsmOptions,
  RejectionReason,
  StateChangeCallback,
  WaitForStateOptions,
} from './types.js';

interface PendingNotification {
  name: string;
  payload: FsmNotification;
}

interface DispatchOutcome {
  result: DispatchResult;
  notifications: PendingNotification[];
}

interface ResolvedOptions {
  clock: () => Date;
  debug: boolean;
  prefix: string;
  trackHistory: boolean;
  maxHistory: number;
}

/**
 * @example
 * ```ts
 * const fsm = createMotionFsm({ threadSafe: true });
 * await fsm.initialize();
 *
 * fsm.setEventCallback(SystemEvent.StartMoveit, async () => planner.ping());
 * fsm.on('enter:ERROR', (e) => alarm(e.data.from));
 * fsm.on('enter:ERROR', () => fsm.reset()); // listeners may re-enter
 *
 * await fsm.triggerEvent(SystemEvent.StartMoveit); // true, MOVEIT_STARTING
 * ```
 */
export class MotionFsm {
  static readonly stateToString = stateToString;
  static readonly eventToString = eventToString;

  /** Notification bus; events are published under `<prefix>:` */
  readonly bus: EventBus<FsmNotification>;

  /** Built once, read-only afterwards */
  readonly table: TransitionTable;

  private currentState: SystemState = SystemState.Idle;
  private previousState: SystemState = SystemState.Idle;
  private running = false;
  // Reserved; no transition advances it
  private executionProgress = 0;

  private threadSafe: boolean;
  private readonly mutex = new Mutex();
  private readonly passthrough = new Passthrough();
  private readonly condition = new Condition();

  private stateChangeCallback: StateChangeCallback | null = null;
  private readonly eventCallbacks = new Map<SystemEvent, EventCallback>();
  private logCallback: LogCallback;

  private readonly options: ResolvedOptions;
  private history: HistoryEntry[] = [];

  constructor(options: MotionFsmOptions = {}) {
    this.options = {
      clock: options.clock ?? (() => new Date()),
      debug: options.debug ?? false,
      prefix: options.prefix ?? 'fsm',
      trackHistory: options.trackHistory ?? false,
      maxHistory: options.maxHistory ?? 100,
    };
    this.threadSafe = options.threadSafe ?? false;
    this.logCallback = options.logger ?? consoleLogSink;
    this.table = createTransitionTable();
    this.bus = new EventBus<FsmNotification>({
      debug: this.options.debug,
      onError: (error, event) => {
        this.logMessage(`Listener failed for ${event.name}: ${error.message}`);
      },
    });

    this.debugLog('Engine created', {
      prefix: this.options.prefix,
      threadSafe: this.threadSafe,
      trackHistory: this.options.trackHistory,
    });
  }

  private get sync(): Synchronizer {
    return this.threadSafe ? this.mutex : this.passthrough;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Reset the state pair to IDLE and mark the engine running
   */
  initialize(): Promise<boolean> {
    return this.sync.run(() => {
      this.currentState = SystemState.Idle;
      this.previousState = SystemState.Idle;
      this.running = true;
      this.executionProgress = 0;

      this.logMessage('State machine initialized');
      return true;
    });
  }

  /**
   * Mark the engine running and put it in IDLE. The previous state is kept.
   */
  start(): Promise<void> {
    return this.sync.run(() => {
      this.logMessage('State machine started');
      this.running = true;
      this.currentState = SystemState.Idle;
      this.condition.notifyAll();
    });
  }

  /**
   * Same as `triggerEvent(SystemEvent.StopRequest)`
   */
  stop(): Promise<boolean> {
    return this.triggerEvent(SystemEvent.StopRequest);
  }

  /**
   * Force IDLE without consulting the table. Fires the state-change
   * callback exactly once, even when already in IDLE.
   */
  async reset(): Promise<void> {
    const notification = await this.sync.run(async () => {
      this.logMessage('State machine reset');
      this.previousState = this.currentState;
      this.currentState = SystemState.Idle;

      await this.notifyStateChange(this.previousState, this.currentState);
      this.condition.notifyAll();
      return this.notification('reset', { from: this.previousState, to: this.currentState });
    });
    await this.publish([notification]);
  }

  /**
   * Mark the engine stopped and release every pending waitForState()
   */
  async shutdown(): Promise<void> {
    const notification = await this.sync.run(() => {
      this.logMessage('State machine shut down');
      this.running = false;

      const released = this.condition.notifyAll();
      this.debugLog('Waiters released', { released });
      return this.notification('shutdown', {});
    });
    await this.publish([notification]);
  }

  /**
   * Shut down when still running, then drop every bus listener
   */
  async destroy(): Promise<void> {
    if (this.running) {
      await this.shutdown();
    }
    this.bus.offAll();
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  /**
   * Dispatch an event. Resolves true when the transition committed.
   * `data` is forwarded unchanged to the event callback.
   */
  async triggerEvent(event: SystemEvent, data?: string): Promise<boolean> {
    const result = await this.dispatch(event, data);
    return result.ok;
  }

  /**
   * Dispatch an event and describe the outcome
   */
  async dispatch(event: SystemEvent, data?: string): Promise<DispatchResult> {
    const { result, notifications } = await this.sync.run(() =>
      this.dispatchInternal(event, data)
    );
    await this.publish(notifications);
    return result;
  }

  private async dispatchInternal(event: SystemEvent, data?: string): Promise<DispatchOutcome> {
    const eventName = eventToString(event);

    if (!Object.hasOwn(this.table, this.currentState)) {
      this.logMessage(`No transition table for state ${this.getCurrentStateName()}`);
      return this.reject(event, 'no-state-entry', data);
    }

    const target = lookupTransition(this.table, this.currentState, event);
    if (target === undefined) {
      this.logMessage(`State ${this.getCurrentStateName()} does not support event ${eventName}`);
      return this.reject(event, 'unsupported', data);
    }

    const callback = this.eventCallbacks.get(event);
    if (callback) {
      let accepted: boolean;
      try {
        accepted = (await callback(event, data)) === true;
      } catch (thrown) {
        const error = toError(thrown);
        this.logMessage(`Event callback failed for ${eventName}: ${error.message}`);
        return this.reject(event, 'callback-error', data, error);
      }

      if (!accepted) {
        this.logMessage(`Event callback declined: ${eventName}`);
        return this.reject(event, 'declined', data);
      }
    }

    const from = this.currentState;
    if (!(await this.executeTransition(from, target, event))) {
      return this.reject(event, 'invalid-transition', data);
    }

    const change = { from, to: target, event, data };
    return {
      result: { ok: true, event, from, to: target },
      notifications: [
        this.notification(`exit:${from}`, change),
        this.notification('transition', change),
        this.notification(`enter:${target}`, change),
      ],
    };
  }

  /**
   * Commit `from -> to` after re-checking the edge against the table
   */
  private async executeTransition(
    from: SystemState,
    to: SystemState,
    event: SystemEvent
  ): Promise<boolean> {
    if (!isValidTransition(this.table, from, to, event)) {
      this.logMessage(`Invalid transition: ${stateToString(from)} -> ${stateToString(to)}`);
      return false;
    }

    this.previousState = this.currentState;
    this.currentState = to;

    this.logMessage(
      `State transition: ${stateToString(from)} -> ${stateToString(to)} (${eventToString(event)})`
    );
    this.recordHistory(from, to, event);

    await this.notifyStateChange(this.previousState, this.currentState);
    this.condition.notifyAll();
    return true;
  }

  private async notifyStateChange(oldState: SystemState, newState: SystemState): Promise<void> {
    const callback = this.stateChangeCallback;
    if (!callback) {
      return;
    }
    try {
      await callback(oldState, newState);
    } catch (thrown) {
      // Already committed; the fault is only reported
      this.logMessage(`State change callback failed: ${toError(thrown).message}`);
    }
  }

  private reject(
    event: SystemEvent,
    reason: RejectionReason,
    data?: string,
    error?: Error
  ): DispatchOutcome {
    const state = this.currentState;
    this.debugLog('Event rejected', { event, state, reason });
    return {
      result: error
        ? { ok: false, event, state, reason, error }
        : { ok: false, event, state, reason },
      notifications: [this.notification('rejected', { event, reason, data })],
    };
  }

  private recordHistory(from: SystemState, to: SystemState, event: SystemEvent): void {
    if (!this.options.trackHistory) {
      return;
    }
    this.history.push({ from, to, event, timestamp: this.options.clock().getTime() });
    if (this.history.length > this.options.maxHistory) {
      this.history = this.history.slice(-this.options.maxHistory);
    }
  }

  // ==========================================================================
  // Queries
  //
  // Lock-free and synchronous. The state pair is written in one step, so a
  // read always sees a committed pair; while a serialized dispatch awaits its
  // event callback, reads still return the state from before that commit.
  // ==========================================================================

  getCurrentState(): SystemState {
    return this.currentState;
  }

  getPreviousState(): SystemState {
    return this.previousState;
  }

  getCurrentStateName(): string {
    return stateToString(this.currentState);
  }

  isInState(state: SystemState): boolean {
    return this.currentState === state;
  }

  /**
   * Whether the table has an edge for `event` from the current state.
   * Event callbacks are not consulted.
   */
  canTransition(event: SystemEvent): boolean {
    return lookupTransition(this.table, this.currentState, event) !== undefined;
  }

  /**
   * Events the table accepts from the current state
   */
  availableEvents(): SystemEvent[] {
    return eventsFrom(this.table, this.currentState);
  }

  isRunning(): boolean {
    return this.running;
  }

  isThreadSafe(): boolean {
    return this.threadSafe;
  }

  getExecutionProgress(): number {
    return this.executionProgress;
  }

  /**
   * Committed transitions, oldest first (empty unless trackHistory is on)
   */
  getHistory(): HistoryEntry[] {
    return [...this.history];
  }

  // ==========================================================================
  // Waiting
  // ==========================================================================

  /**
   * Resolve true once the engine is in `target`.
   *
   * Requires thread safety; without it, logs and resolves false. Resolves
   * false on shutdown, timeout (milliseconds, 0 = none) or abort before the
   * target is reached, and at once when the engine is not running. Waiting
   * does not hold the lock.
   */
  async waitForState(
    target: SystemState,
    timeout: number | WaitForStateOptions = 0
  ): Promise<boolean> {
    if (!this.threadSafe) {
      this.logMessage('waitForState requires thread safety to be enabled');
      return false;
    }

    if (this.currentState === target) {
      return true;
    }

    const options = typeof timeout === 'number' ? { timeout } : timeout;
    this.debugLog('Waiting for state', { target, timeout: options.timeout ?? 0 });

    await this.condition.wait(
      () => this.currentState === target || !this.running,
      options
    );
    return this.currentState === target;
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  setStateChangeCallback(callback: StateChangeCallback | null): void {
    this.stateChangeCallback = callback;
    this.logMessage(callback ? 'State change callback registered' : 'State change callback cleared');
  }

  setEventCallback(event: SystemEvent, callback: EventCallback | null): void {
    if (callback) {
      this.eventCallbacks.set(event, callback);
      this.logMessage(`Event callback registered: ${eventToString(event)}`);
    } else {
      this.eventCallbacks.delete(event);
      this.logMessage(`Event callback cleared: ${eventToString(event)}`);
    }
  }

  setLogCallback(callback: LogCallback): void {
    this.logCallback = callback;
  }

  /**
   * Switch between serialized and unsynchronized operations. Operations
   * already queued on the lock still run under it.
   */
  enableThreadSafety(enable: boolean): void {
    this.threadSafe = enable;
    this.debugLog(`Thread safety ${enable ? 'enabled' : 'disabled'}`);
  }

  /**
   * Subscribe to `<prefix>:<name>` on the bus, e.g. `enter:PLANNING`,
   * `enter:*`, `transition`, `rejected`, `**`. Listeners run after the
   * lock is released and may call back into the engine; the operation that
   * published resolves once they settle.
   */
  on(
    name: string,
    listener: BusListener<FsmNotification>,
    options?: ListenerOptions
  ): UnbindFunction {
    return this.bus.on(this.eventName(name), listener, options);
  }

  off(name: string, listener?: BusListener<FsmNotification>): void {
    this.bus.off(this.eventName(name), listener);
  }

  // ==========================================================================
  // Logging
  // ==========================================================================

  /**
   * Send one timestamped line to the active log sink
   */
  logMessage(message: string): void {
    const line = formatLogLine(message, this.options.clock());
    try {
      this.logCallback(line);
    } catch (error) {
      console.error(`[FSM] Log callback failed: ${toError(error).message}`, line);
    }
  }

  private debugLog(message: string, details?: Record<string, unknown>): void {
    if (this.options.debug) {
      console.debug('[MotionFsm]', message, details ?? {});
    }
  }

  private eventName(name: string): string {
    return `${this.options.prefix}:${name}`;
  }

  /**
   * Snapshot a notification; `state` is taken now, not at publish time
   */
  private notification(
    name: string,
    payload: Omit<FsmNotification, 'machine' | 'state'>
  ): PendingNotification {
    return {
      name: this.eventName(name),
      payload: { machine: this.options.prefix, state: this.currentState, ...payload },
    };
  }

  private async publish(notifications: PendingNotification[]): Promise<void> {
    for (const { name, payload } of notifications) {
      await this.bus.emit(name, payload);
    }
  }
}

/**
 * Factory function to create an engine
 */
export const createMotionFsm = (options?: MotionFsmOptions): MotionFsm => {
  return new MotionFsm(options);
};
