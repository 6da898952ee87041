import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, realpathSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { handleDeviceTool } from '../src/tools/devices.js';
import { handlePolicyTool } from '../src/tools/policy.js';
import { parse, testContext } from './helpers.js';

describe('device tools', () => {
  it('should decode status codes in get_device_status', async () => {
    const ctx = testContext();
    const getStatus = vi
      .spyOn(ctx.client, 'getDeviceStatus')
      .mockResolvedValue([{ name: 'FGT1', conn_status: 1, conf_status: 1 }]);

    const result = parse(await handleDeviceTool('get_device_status', { device: 'FGT1' }, ctx));

    expect(getStatus).toHaveBeenCalledWith('root', 'FGT1');
    expect(result).toEqual({
      status: 'success',
      count: 1,
      devices: [{ name: 'FGT1', conn_status: 1, conn_status_str: 'up', conf_status: 1, conf_status_str: 'in_sync' }],
    });
  });

  it('should build search filters from the given criteria', async () => {
    const ctx = testContext();
    const listDevices = vi.spyOn(ctx.client, 'listDevices').mockResolvedValue([]);

    await handleDeviceTool('search_devices', { name_filter: 'branch', connection_status: 'UP' }, ctx);

    expect(listDevices).toHaveBeenCalledWith('root', {
      filter: [
        ['name', 'contain', 'branch'],
        ['conn_status', '==', 1],
      ],
    });
  });

  it('should not echo device credentials back', async () => {
    const ctx = testContext();
    const addDevice = vi.spyOn(ctx.client, 'addDevice').mockResolvedValue({ taskid: 31 });

    const result = parse(
      await handleDeviceTool(
        'add_device',
        { name: 'FGT-BR1', ip: '10.20.0.1', admin_user: 'admin', admin_pass: 'test-secret' },
        ctx
      )
    );

    expect(addDevice).toHaveBeenCalledWith(
      'root',
      {
        name: 'FGT-BR1',
        mgmt_mode: 'fmg',
        ip: '10.20.0.1',
        adm_usr: 'admin',
        adm_pass: 'test-secret',
        platform_str: 'FortiGate-VM64',
      },
      undefined
    );
    expect(result).toEqual({
      status: 'success',
      device: { name: 'FGT-BR1', mgmt_mode: 'fmg', ip: '10.20.0.1', adm_usr: 'admin', platform_str: 'FortiGate-VM64' },
      task_id: 31,
      message: 'Device FGT-BR1 added successfully',
    });
  });

  it('should add a model device by serial number', async () => {
    const ctx = testContext();
    const addDevice = vi.spyOn(ctx.client, 'addDevice').mockResolvedValue({});

    await handleDeviceTool('add_model_device', { name: 'FGT-BR2', serial_number: 'fgvm01tm00000001' }, ctx);

    expect(addDevice).toHaveBeenCalledWith('root', {
      name: 'FGT-BR2',
      sn: 'FGVM01TM00000001',
      platform_str: 'FortiGate-VM64',
      os_ver: '7.0',
      mgmt_mode: 'fmg',
      'device action': 'add_model',
    });
  });

  it('should require at least one field for update_device', async () => {
    await expect(handleDeviceTool('update_device', { device: 'FGT1' }, testContext())).rejects.toThrow(
      'No update parameters provided'
    );
  });

  it('should query interfaces through the device proxy', async () => {
    const ctx = testContext();
    const proxy = vi.spyOn(ctx.client, 'proxyCall').mockResolvedValue([{ response: { results: {} } }]);

    await handleDeviceTool('get_device_interfaces', { device: 'FGT1', adom: 'lab' }, ctx);

    expect(proxy).toHaveBeenCalledWith('get', '/api/v2/monitor/system/interface', ['/adom/lab/device/FGT1']);
  });
});

describe('policy tools', () => {
  let exportDir: string | undefined;

  afterEach(() => {
    if (exportDir) rmSync(exportDir, { recursive: true, force: true });
    exportDir = undefined;
  });

  it('should create a policy with defaults filled in', async () => {
    const ctx = testContext();
    const create = vi.spyOn(ctx.client, 'createFirewallPolicy').mockResolvedValue({ policyid: 12 });

    const result = parse(
      await handlePolicyTool(
        'create_firewall_policy',
        {
          package: 'default',
          name: 'allow-web',
          srcintf: ['port1'],
          dstintf: ['port2'],
          srcaddr: ['all'],
          dstaddr: ['web-servers'],
          service: ['HTTPS'],
        },
        ctx
      )
    );

    expect(create).toHaveBeenCalledWith('root', 'default', {
      name: 'allow-web',
      srcintf: ['port1'],
      dstintf: ['port2'],
      srcaddr: ['all'],
      dstaddr: ['web-servers'],
      service: ['HTTPS'],
      action: 'accept',
      schedule: 'always',
      nat: 'disable',
      logtraffic: 'utm',
      status: 'enable',
    });
    expect(result).toEqual({ status: 'success', policyid: 12, message: 'Policy allow-web created successfully' });
  });

  it('should page policies with a range and report the total', async () => {
    const ctx = testContext();
    vi.spyOn(ctx.client, 'getFirewallPolicyCount').mockResolvedValue(40);
    const list = vi.spyOn(ctx.client, 'listFirewallPolicies').mockResolvedValue([{ policyid: 11 }, { policyid: 12 }]);

    const result = parse(
      await handlePolicyTool('list_firewall_policies', { package: 'default', limit: 2, offset: 10 }, ctx)
    );

    expect(list).toHaveBeenCalledWith('root', 'default', { fields: undefined, range: [10, 2] });
    expect(result).toEqual({ status: 'success', count: 2, total: 40, policies: [{ policyid: 11 }, { policyid: 12 }] });
  });

  it('should only send the fields given to update_firewall_policy', async () => {
    const ctx = testContext();
    const update = vi.spyOn(ctx.client, 'updateFirewallPolicy').mockResolvedValue({});

    await handlePolicyTool(
      'update_firewall_policy',
      { package: 'default', policyid: 12, action: 'DENY', nat: true },
      ctx
    );

    expect(update).toHaveBeenCalledWith('root', 'default', 12, { action: 'deny', nat: 'enable' });
  });

  it('should delete several policies at once', async () => {
    const ctx = testContext();
    const remove = vi.spyOn(ctx.client, 'deleteFirewallPolicies').mockResolvedValue({});

    const result = parse(
      await handlePolicyTool('delete_firewall_policies_bulk', { package: 'default', policyids: [3, 4] }, ctx)
    );

    expect(remove).toHaveBeenCalledWith('root', 'default', [3, 4]);
    expect(result).toEqual({ status: 'success', deleted_count: 2, message: 'Deleted 2 policies' });
  });

  it('should move a policy', async () => {
    const ctx = testContext();
    const move = vi.spyOn(ctx.client, 'moveFirewallPolicy').mockResolvedValue({});

    const result = parse(
      await handlePolicyTool(
        'move_firewall_policy',
        { package: 'default', policyid: 7, target_policyid: 2, position: 'after' },
        ctx
      )
    );

    expect(move).toHaveBeenCalledWith('root', 'default', 7, 2, 'after');
    expect(result).toEqual({ status: 'success', message: 'Policy 7 moved after policy 2' });
  });

  it('should export policies into an allowed directory', async () => {
    exportDir = realpathSync(mkdtempSync(join(tmpdir(), 'fmg-policies-')));
    const ctx = testContext({ allowedOutputDirs: exportDir });
    vi.spyOn(ctx.client, 'listFirewallPolicies').mockResolvedValue([{ policyid: 1, name: 'allow-dns' }]);

    const result = parse(await handlePolicyTool('export_firewall_policies', { package: 'default', output_dir: exportDir }, ctx));

    const path = join(exportDir, 'root_default_policies.json');
    expect(result).toEqual({ status: 'success', path, count: 1, message: `Exported 1 policies to ${path}` });
    const written = JSON.parse(readFileSync(path, 'utf8'));
    expect(written.adom).toBe('root');
    expect(written.package).toBe('default');
    expect(written.policies).toEqual([{ policyid: 1, name: 'allow-dns' }]);
  });

  it('should refuse exports outside the allowed directories', async () => {
    exportDir = realpathSync(mkdtempSync(join(tmpdir(), 'fmg-policies-')));
    const ctx = testContext({ allowedOutputDirs: exportDir });
    const list = vi.spyOn(ctx.client, 'listFirewallPolicies');

    await expect(
      handlePolicyTool('export_firewall_policies', { package: 'default', output_dir: tmpdir() }, ctx)
    ).rejects.toThrow(/is not within allowed directories/);
    expect(list).not.toHaveBeenCalled();
  });
});
