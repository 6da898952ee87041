import { describe, it, expect, vi } from 'vitest';
import { ConnectionError, ValidationError } from '../src/lib/errors.js';
import {
  decodeTaskState,
  isTerminalState,
  waitForTask,
  type TaskPayload,
  type TaskSource,
} from '../src/lib/task-poller.js';

/** Task source replaying `states`, repeating the last one forever */
class ScriptedSource implements TaskSource {
  calls = 0;

  constructor(private readonly states: unknown[]) {}

  async getTask(taskId: number): Promise<TaskPayload> {
    const state = this.states[Math.min(this.calls, this.states.length - 1)];
    this.calls++;
    return { id: taskId, state, percent: this.calls * 10 };
  }
}

const scriptedSource = (states: unknown[]) => new ScriptedSource(states);

/** Clock that only moves when the poller sleeps */
function fakeTime() {
  let now = 0;
  return {
    clock: () => now,
    sleep: vi.fn(async (ms: number) => {
      now += ms;
    }),
  };
}

describe('decodeTaskState', () => {
  it('decodes labels in any case', () => {
    expect(decodeTaskState('done')).toBe('done');
    expect(decodeTaskState(' Running ')).toBe('running');
    expect(decodeTaskState('CANCELLING')).toBe('cancelling');
  });

  it('decodes integer codes', () => {
    expect(decodeTaskState(0)).toBe('pending');
    expect(decodeTaskState(1)).toBe('running');
    expect(decodeTaskState(3)).toBe('cancelled');
    expect(decodeTaskState(4)).toBe('done');
    expect(decodeTaskState(5)).toBe('error');
  });

  it('treats anything else as unknown', () => {
    expect(decodeTaskState(2)).toBe('unknown');
    expect(decodeTaskState('paused')).toBe('unknown');
    expect(decodeTaskState(undefined)).toBe('unknown');
  });

  it('only done, error and cancelled are terminal', () => {
    expect(isTerminalState('done')).toBe(true);
    expect(isTerminalState('cancelled')).toBe(true);
    expect(isTerminalState('cancelling')).toBe(false);
    expect(isTerminalState('unknown')).toBe(false);
  });
});

describe('waitForTask', () => {
  it('treats integer state 4 exactly like the label done', async () => {
    const numericTime = fakeTime();
    const labelTime = fakeTime();

    const numeric = await waitForTask(scriptedSource([1, 1, 4]), 123, { timeout: 300, pollInterval: 1, ...numericTime });
    const labelled = await waitForTask(scriptedSource(['running', 'running', 'done']), 123, {
      timeout: 300,
      pollInterval: 1,
      ...labelTime,
    });

    expect(numeric).toEqual({
      kind: 'terminal',
      success: true,
      completed: true,
      state: 'done',
      task: { id: 123, state: 4, percent: 30 },
      attempts: 3,
      message: 'Task completed with state: done',
    });
    expect({ ...numeric, task: undefined }).toEqual({ ...labelled, task: undefined });
    expect(numericTime.sleep.mock.calls).toEqual([[1000], [1000]]);
    expect(numericTime.clock()).toBe(2000);
  });

  it('reports integer state 5 as a completed failure', async () => {
    const outcome = await waitForTask(scriptedSource([5]), 789, { ...fakeTime() });

    expect(outcome).toMatchObject({ kind: 'terminal', completed: true, success: false, state: 'error', attempts: 1 });
  });

  it('returns success once the task is done', async () => {
    const source = scriptedSource(['running', 'running', 'done']);
    const time = fakeTime();

    const outcome = await waitForTask(source, 812, { timeout: 30, pollInterval: 5, ...time });

    expect(outcome).toEqual({
      kind: 'terminal',
      success: true,
      completed: true,
      state: 'done',
      task: { id: 812, state: 'done', percent: 30 },
      attempts: 3,
      message: 'Task completed with state: done',
    });
    expect(time.sleep).toHaveBeenCalledTimes(2);
    expect(time.sleep).toHaveBeenCalledWith(5000);
  });

  it('reports a failed task as terminal without success', async () => {
    const outcome = await waitForTask(scriptedSource([1, 5]), 7, { timeout: 30, pollInterval: 1, ...fakeTime() });
    expect(outcome.kind).toBe('terminal');
    expect(outcome.success).toBe(false);
    expect(outcome.completed).toBe(true);
    expect(outcome.message).toBe('Task completed with state: error');
  });

  it('keeps polling through cancelling and stops at cancelled', async () => {
    const outcome = await waitForTask(scriptedSource(['cancelling', 'cancelled']), 7, {
      timeout: 30,
      pollInterval: 1,
      ...fakeTime(),
    });
    expect(outcome.kind === 'terminal' && outcome.state).toBe('cancelled');
    expect(outcome.attempts).toBe(2);
  });

  it('times out without throwing', async () => {
    const source = scriptedSource(['running']);
    const time = fakeTime();

    const outcome = await waitForTask(source, 9, { timeout: 10, pollInterval: 5, ...time });

    expect(outcome).toEqual({
      kind: 'timed_out',
      success: false,
      completed: false,
      task: { id: 9, state: 'running', percent: 30 },
      attempts: 3,
      message: 'Task 9 timed out after 10 seconds',
    });
    expect(time.sleep).toHaveBeenCalledTimes(2);
  });

  it('bounds the number of fetches when the clock does not move', async () => {
    const source = scriptedSource(['pending']);
    const outcome = await waitForTask(source, 9, {
      timeout: 10,
      pollInterval: 5,
      clock: () => 0,
      sleep: async () => {},
    });
    expect(outcome.kind).toBe('timed_out');
    expect(source.calls).toBe(3);
  });

  it('checks a task already finished with a single fetch', async () => {
    const source = scriptedSource(['done']);
    const time = fakeTime();
    const outcome = await waitForTask(source, 3, { ...time });
    expect(outcome.success).toBe(true);
    expect(source.calls).toBe(1);
    expect(time.sleep).not.toHaveBeenCalled();
  });

  it('calls onPoll with each fetched task', async () => {
    const onPoll = vi.fn();
    await waitForTask(scriptedSource(['running', 'done']), 4, { pollInterval: 1, onPoll, ...fakeTime() });
    expect(onPoll).toHaveBeenCalledTimes(2);
    expect(onPoll).toHaveBeenNthCalledWith(1, { id: 4, state: 'running', percent: 10 }, 'running', 1);
    expect(onPoll).toHaveBeenNthCalledWith(2, { id: 4, state: 'done', percent: 20 }, 'done', 2);
  });

  it('propagates status fetch failures', async () => {
    const source: TaskSource = {
      getTask: async () => {
        throw new ConnectionError('connect ECONNREFUSED');
      },
    };
    await expect(waitForTask(source, 5, fakeTime())).rejects.toThrow(ConnectionError);
  });

  it('rejects invalid arguments before fetching', async () => {
    const source = scriptedSource(['done']);
    await expect(waitForTask(source, 0)).rejects.toThrow('Task ID must be a positive integer');
    await expect(waitForTask(source, 1.5)).rejects.toThrow(ValidationError);
    await expect(waitForTask(source, 5, { timeout: 0 })).rejects.toThrow('Timeout must be greater than 0');
    await expect(waitForTask(source, 5, { pollInterval: -1 })).rejects.toThrow('Poll interval must be greater than 0');
    expect(source.calls).toBe(0);
  });
});
