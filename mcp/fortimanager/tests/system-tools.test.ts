import { describe, it, expect, vi } from 'vitest';
import { handleSystemTool } from '../src/tools/system.js';
import { ConnectionError } from '../src/lib/errors.js';
import { TaskProgressReporter } from '../src/lib/progress.js';
import { parse, testContext } from './helpers.js';

describe('system tools', () => {
  it('should return system status', async () => {
    const ctx = testContext();
    vi.spyOn(ctx.client, 'getSystemStatus').mockResolvedValue({ Hostname: 'fmg-lab', Version: 'v7.4.3' });

    const result = parse(await handleSystemTool('get_system_status', {}, ctx));

    expect(result).toEqual({ status: 'success', data: { Hostname: 'fmg-lab', Version: 'v7.4.3' } });
  });

  it('should fall back to the configured default ADOM', async () => {
    const ctx = testContext({ defaultAdom: 'branches' });
    const listDevices = vi.spyOn(ctx.client, 'listDevices').mockResolvedValue([{ name: 'FGT1' }, { name: 'FGT2' }]);

    const result = parse(await handleSystemTool('list_devices', {}, ctx));

    expect(listDevices).toHaveBeenCalledWith('branches', { fields: undefined });
    expect(result).toEqual({ status: 'success', count: 2, devices: [{ name: 'FGT1' }, { name: 'FGT2' }] });
  });

  it('should reject an invalid ADOM before calling the API', async () => {
    const ctx = testContext();
    const listDevices = vi.spyOn(ctx.client, 'listDevices');

    await expect(handleSystemTool('list_devices', { adom: '../etc' }, ctx)).rejects.toThrow(/Invalid ADOM name/);
    expect(listDevices).not.toHaveBeenCalled();
  });

  it('should include task lines on request', async () => {
    const ctx = testContext();
    vi.spyOn(ctx.client, 'getTask').mockResolvedValue({ id: 5, state: 'done' });
    vi.spyOn(ctx.client, 'getTaskLine').mockResolvedValue([{ name: 'FGT1', state: 'done' }]);

    const result = parse(await handleSystemTool('get_task', { task_id: 5, include_details: true }, ctx));

    expect(result).toEqual({
      status: 'success',
      task: { id: 5, state: 'done' },
      lines: [{ name: 'FGT1', state: 'done' }],
    });
  });

  it('should start a package install and return its task id', async () => {
    const ctx = testContext();
    const install = vi.spyOn(ctx.client, 'installPackage').mockResolvedValue({ task: 4121 });

    const result = parse(
      await handleSystemTool(
        'install_package',
        { adom: 'root', package: 'default', devices: [{ name: 'FGT1', vdom: 'root' }] },
        ctx
      )
    );

    expect(install).toHaveBeenCalledWith('root', 'default', [{ name: 'FGT1', vdom: 'root' }], ['none']);
    expect(result).toEqual({
      status: 'success',
      task_id: 4121,
      preview: false,
      message: 'Installation started, task ID: 4121',
    });
  });

  it('should lock an ADOM', async () => {
    const ctx = testContext();
    vi.spyOn(ctx.client, 'lockAdom').mockResolvedValue({});
    const result = parse(await handleSystemTool('lock_adom', { adom: 'root' }, ctx));
    expect(result).toEqual({ status: 'success', message: "ADOM 'root' locked successfully" });
  });

  it('should reject unknown tool names', async () => {
    await expect(handleSystemTool('reboot', {}, testContext())).rejects.toThrow('Unknown system tool: reboot');
  });
});

describe('wait_for_task', () => {
  it('should report a completed task', async () => {
    const ctx = testContext();
    vi.spyOn(ctx.client, 'getTask')
      .mockResolvedValueOnce({ id: 77, state: 'running', percent: 50 })
      .mockResolvedValueOnce({ id: 77, state: 'done', percent: 100 });

    const result = parse(await handleSystemTool('wait_for_task', { task_id: 77, timeout: 5, poll_interval: 0.01 }, ctx));

    expect(result).toEqual({
      status: 'success',
      completed: true,
      success: true,
      state: 'done',
      task: { id: 77, state: 'done', percent: 100 },
      attempts: 2,
      message: 'Task completed with state: done',
    });
  });

  it('should report a failed task as completed without success', async () => {
    const ctx = testContext();
    vi.spyOn(ctx.client, 'getTask').mockResolvedValue({ id: 78, state: 'error', num_err: 1 });

    const result = parse(await handleSystemTool('wait_for_task', { task_id: 78 }, ctx));

    expect(result).toEqual({
      status: 'error',
      completed: true,
      success: false,
      state: 'error',
      task: { id: 78, state: 'error', num_err: 1 },
      attempts: 1,
      message: 'Task completed with state: error',
    });
  });

  it('should return a timeout result instead of throwing', async () => {
    const ctx = testContext();
    vi.spyOn(ctx.client, 'getTask').mockResolvedValue({ id: 79, state: 'running' });

    const result = parse(
      await handleSystemTool('wait_for_task', { task_id: 79, timeout: 0.02, poll_interval: 0.01 }, ctx)
    );

    expect(result).toMatchObject({
      status: 'timeout',
      completed: false,
      success: false,
      task: { id: 79, state: 'running' },
      message: 'Task 79 timed out after 0.02 seconds',
    });
  });

  it('should relay task progress when the caller asked for it', async () => {
    const ctx = testContext();
    const send = vi.fn(async () => {});
    ctx.reportProgress = new TaskProgressReporter('wait_for_task', 'tok-9', send);
    vi.spyOn(ctx.client, 'getTask').mockResolvedValue({ id: 80, state: 'done', percent: 100 });

    await handleSystemTool('wait_for_task', { task_id: 80 }, ctx);

    expect(send).toHaveBeenCalledWith({
      method: 'notifications/progress',
      params: { progressToken: 'tok-9', progress: 100, total: 100, message: 'Task 80 done (poll 1)' },
    });
  });

  it('should propagate status fetch failures', async () => {
    const ctx = testContext();
    vi.spyOn(ctx.client, 'getTask').mockRejectedValue(new ConnectionError('Failed to reach FortiManager'));

    await expect(handleSystemTool('wait_for_task', { task_id: 81 }, ctx)).rejects.toThrow(
      'Failed to reach FortiManager'
    );
  });

  it('should validate its arguments', async () => {
    const ctx = testContext();
    await expect(handleSystemTool('wait_for_task', {}, ctx)).rejects.toThrow('Missing required argument: task_id');
    await expect(handleSystemTool('wait_for_task', { task_id: -4 }, ctx)).rejects.toThrow(
      'Task ID must be a positive integer'
    );
    await expect(handleSystemTool('wait_for_task', { task_id: 4, timeout: 0 }, ctx)).rejects.toThrow(
      'Timeout must be greater than 0'
    );
  });
});
