/**
 * Task Completion Poller
 *
 * Waits for an asynchronous FortiManager task (install, script run,
 * template validation) to reach a terminal state, or for the time budget
 * to run out.
 *
 * Outcomes:
 * - terminal: the task reached done, error or cancelled. `success` only for done.
 * - timed_out: the budget elapsed first. Not an exception.
 *
 * A failing status fetch is neither; its error propagates to the caller.
 *
 * Usage:
 *   const outcome = await waitForTask(client, 4121, { timeout: 600 });
 *   if (outcome.kind === 'terminal' && outcome.success) { ... }
 */

import { performance } from 'node:perf_hooks';
import { ValidationError } from './errors.js';
import { log } from './logger.js';

// ============================================================================
// Types
// ============================================================================

export type TerminalTaskState = 'done' | 'error' | 'cancelled';

export type TaskState = 'pending' | 'running' | 'cancelling' | 'unknown' | TerminalTaskState;

export type TaskPayload = Record<string, unknown>;

/** Anything that can read a task by id; the API client in production, a fake in tests */
export interface TaskSource {
  getTask(taskId: number): Promise<TaskPayload>;
}

export type PollCallback = (task: TaskPayload, state: TaskState, attempt: number) => void | Promise<void>;

export interface WaitForTaskOptions {
  /** Seconds (default 300) */
  timeout?: number;
  /** Seconds between fetches (default 5) */
  pollInterval?: number;
  /** Monotonic milliseconds */
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
  onPoll?: PollCallback;
}

export interface TerminalOutcome {
  kind: 'terminal';
  success: boolean;
  completed: true;
  state: TerminalTaskState;
  task: TaskPayload;
  attempts: number;
  message: string;
}

export interface TimedOutOutcome {
  kind: 'timed_out';
  success: false;
  completed: false;
  task?: TaskPayload;
  attempts: number;
  message: string;
}

export type TaskOutcome = TerminalOutcome | TimedOutOutcome;

export const DEFAULT_TASK_TIMEOUT = 300;
export const DEFAULT_POLL_INTERVAL = 5;

// ============================================================================
// State decoding
// ============================================================================

const NUMERIC_TASK_STATES: ReadonlyMap<number, TaskState> = new Map([
  [0, 'pending'],
  [1, 'running'],
  [3, 'cancelled'],
  [4, 'done'],
  [5, 'error'],
]);

const TASK_STATE_LABELS: ReadonlySet<string> = new Set([
  'pending',
  'running',
  'cancelling',
  'done',
  'error',
  'cancelled',
]);

function isTaskState(label: string): label is TaskState {
  return TASK_STATE_LABELS.has(label);
}

/** Map the raw `state` field (label or integer code) to one TaskState */
export function decodeTaskState(raw: unknown): TaskState {
  if (typeof raw === 'number') {
    return NUMERIC_TASK_STATES.get(raw) ?? 'unknown';
  }
  if (typeof raw === 'string') {
    const label = raw.trim().toLowerCase();
    return isTaskState(label) ? label : 'unknown';
  }
  return 'unknown';
}

export function isTerminalState(state: TaskState): state is TerminalTaskState {
  return state === 'done' || state === 'error' || state === 'cancelled';
}

// ============================================================================
// Poller
// ============================================================================

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function requirePositive(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${label} must be greater than 0`);
  }
}

export async function waitForTask(
  source: TaskSource,
  taskId: number,
  options: WaitForTaskOptions = {}
): Promise<TaskOutcome> {
  const timeout = options.timeout ?? DEFAULT_TASK_TIMEOUT;
  const pollInterval = options.pollInterval ?? DEFAULT_POLL_INTERVAL;
  const clock = options.clock ?? (() => performance.now());
  const sleep = options.sleep ?? defaultSleep;

  if (!Number.isInteger(taskId) || taskId <= 0) {
    throw new ValidationError('Task ID must be a positive integer');
  }
  requirePositive(timeout, 'Timeout');
  requirePositive(pollInterval, 'Poll interval');

  // Upper bound on fetches whatever the clock does
  const maxFetches = Math.ceil(timeout / pollInterval) + 1;
  const start = clock();
  const elapsedSeconds = () => (clock() - start) / 1000;

  let attempts = 0;
  let lastTask: TaskPayload | undefined;

  log.debug('Waiting for task', { taskId, timeout, pollInterval });

  while (elapsedSeconds() <= timeout && attempts < maxFetches) {
    const task = await source.getTask(taskId);
    attempts++;
    lastTask = task;

    const state = decodeTaskState(task.state);
    if (options.onPoll) {
      await options.onPoll(task, state, attempts);
    }

    if (isTerminalState(state)) {
      log.info('Task reached terminal state', { taskId, state, attempts });
      return {
        kind: 'terminal',
        success: state === 'done',
        completed: true,
        state,
        task,
        attempts,
        message: `Task completed with state: ${state}`,
      };
    }

    if (elapsedSeconds() + pollInterval > timeout) {
      break;
    }
    await sleep(pollInterval * 1000);
  }

  log.warn('Task wait timed out', { taskId, timeout, attempts });
  return {
    kind: 'timed_out',
    success: false,
    completed: false,
    task: lastTask,
    attempts,
    message: `Task ${taskId} timed out after ${timeout} seconds`,
  };
}
