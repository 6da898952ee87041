import { describe, it, expect, vi } from 'vitest';
import type { ServerNotification } from '@modelcontextprotocol/sdk/types.js';
import { TaskProgressReporter, readTaskPercent } from '../src/lib/progress.js';
import { decodeDeviceStatus } from '../src/lib/device-status.js';

describe('readTaskPercent', () => {
  it('reads numbers and numeric strings, clamped to 0..100', () => {
    expect(readTaskPercent({ percent: 40 })).toBe(40);
    expect(readTaskPercent({ percent: '75' })).toBe(75);
    expect(readTaskPercent({ percent: 140 })).toBe(100);
    expect(readTaskPercent({ percent: 'n/a' })).toBeUndefined();
    expect(readTaskPercent({})).toBeUndefined();
  });
});

describe('TaskProgressReporter', () => {
  it('sends MCP progress notifications for new percentages only', async () => {
    const send = vi.fn(async (_notification: ServerNotification) => {});
    const reporter = new TaskProgressReporter('wait_for_task', 'tok-1', send);
    const onPoll = reporter.asPollCallback(4121);

    await onPoll({ percent: 50 }, 'running', 1);
    await onPoll({ percent: 50 }, 'running', 2);
    await onPoll({}, 'done', 3);

    expect(send).toHaveBeenCalledTimes(2);
    expect(send).toHaveBeenNthCalledWith(1, {
      method: 'notifications/progress',
      params: { progressToken: 'tok-1', progress: 50, total: 100, message: 'Task 4121 running (poll 1)' },
    });
    expect(send).toHaveBeenNthCalledWith(2, {
      method: 'notifications/progress',
      params: { progressToken: 'tok-1', progress: 100, total: 100, message: 'Task 4121 done (poll 3)' },
    });
  });

  it('does not fail when the client cannot be notified', async () => {
    const reporter = new TaskProgressReporter('install_package', 7, async () => {
      throw new Error('transport closed');
    });
    await expect(reporter.update(10, 'installing')).resolves.toBeUndefined();
  });
});

describe('decodeDeviceStatus', () => {
  it('adds a label beside each status field present', () => {
    expect(decodeDeviceStatus({ name: 'FGT1', conn_status: 1, conf_status: 2, db_status: 9 })).toEqual({
      name: 'FGT1',
      conn_status: 1,
      conn_status_str: 'up',
      conf_status: 2,
      conf_status_str: 'out_of_sync',
      db_status: 9,
      db_status_str: 'unknown',
    });
  });

  it('labels install state', () => {
    expect(decodeDeviceStatus({ dev_status: 4 })).toEqual({ dev_status: 4, dev_status_str: 'installed' });
    expect(decodeDeviceStatus({ dev_status: 'x' })).toEqual({ dev_status: 'x', dev_status_str: 'unknown' });
  });
});
