/**
 * System, ADOM, Task & Install Tools
 *
 * Appliance status, ADOM and device inventory, task tracking, package
 * installation and workspace locking.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  optionalBoolean,
  optionalNumber,
  optionalString,
  optionalStringArray,
  requireInteger,
  requireScope,
  requireString,
  type ToolArgs,
} from '../lib/args.js';
import { waitForTask, DEFAULT_POLL_INTERVAL, DEFAULT_TASK_TIMEOUT } from '../lib/task-poller.js';
import { validateAdom, validateDeviceName, validatePackageName } from '../lib/validation.js';
import { adomArg, taskIdOf, toJson, type ToolContext } from './context.js';

const adomProperty = {
  type: 'string',
  description: 'ADOM name (default: DEFAULT_ADOM, usually "root")',
} as const;

const scopeProperty = {
  type: 'array',
  description: 'Target devices, e.g. [{"name": "FGT-HQ", "vdom": "root"}]',
  items: {
    type: 'object',
    properties: {
      name: { type: 'string', description: 'Device name' },
      vdom: { type: 'string', description: 'VDOM (default: root)' },
    },
    required: ['name'],
  },
} as const;

export const systemTools: Tool[] = [
  {
    name: 'get_system_status',
    description: `Get FortiManager system status.

Returns version and build, hostname, serial number, ADOM mode, platform
and HA summary.

Use for:
- Confirming which appliance and firmware you are talking to
- Checking ADOM mode before ADOM-scoped operations

Related tools:
- get_ha_status: Cluster details
- check_connection: Quick reachability test`,
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'get_ha_status',
    description: `Get FortiManager HA cluster status: mode, members, roles and sync state.

Related tools:
- get_system_status: Appliance summary`,
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'list_adoms',
    description: `List Administrative Domains (ADOMs).

ADOMs partition FortiManager into separate management domains, each with
its own devices, packages and objects.

Related tools:
- get_adom: Details for one ADOM
- list_devices: Devices inside an ADOM`,
    inputSchema: {
      type: 'object',
      properties: {
        fields: { type: 'array', items: { type: 'string' }, description: 'Fields to return (default: all)' },
      },
    },
  },
  {
    name: 'get_adom',
    description: `Get one ADOM's configuration.

Related tools:
- list_adoms: All ADOMs`,
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'ADOM name' },
        include_details: { type: 'boolean', description: 'Include sub-objects (default: false)' },
      },
      required: ['name'],
    },
  },
  {
    name: 'list_devices',
    description: `List managed devices in an ADOM.

Returns name, IP, platform, firmware and serial for each device.

Use for:
- Inventory before installs or script runs
- Finding the exact device name for other tools

Related tools:
- get_device: Full device record
- get_device_status: Connection and sync state
- search_devices: Filter by name, platform or firmware`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        fields: { type: 'array', items: { type: 'string' }, description: 'Fields to return (default: all)' },
      },
    },
  },
  {
    name: 'get_device',
    description: `Get one managed device.

Related tools:
- list_device_vdoms: VDOMs on the device
- get_device_status: Decoded status fields`,
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Device name' },
        adom: adomProperty,
        include_details: { type: 'boolean', description: 'Include sub-objects such as VDOMs (default: false)' },
      },
      required: ['name'],
    },
  },
  {
    name: 'list_device_groups',
    description: `List device groups in an ADOM.

Groups are install and script targets for many devices at once.

Related tools:
- execute_script_on_device_group: Run a script across a group`,
    inputSchema: { type: 'object', properties: { adom: adomProperty } },
  },
  {
    name: 'list_tasks',
    description: `List FortiManager background tasks.

Tasks track installs, provisioning, script runs and template validation.

Related tools:
- get_task: One task, optionally with per-device lines
- wait_for_task: Block until a task finishes`,
    inputSchema: {
      type: 'object',
      properties: {
        filter_state: {
          type: 'string',
          description: 'Only tasks in this state: pending, running, done, error, cancelling, cancelled',
        },
      },
    },
  },
  {
    name: 'get_task',
    description: `Get one task's state, percent and result.

Related tools:
- wait_for_task: Poll until the task is terminal`,
    inputSchema: {
      type: 'object',
      properties: {
        task_id: { type: 'number', description: 'Task ID' },
        include_details: { type: 'boolean', description: 'Include per-device task lines (default: false)' },
      },
      required: ['task_id'],
    },
  },
  {
    name: 'wait_for_task',
    description: `Wait for a task to complete.

Polls the task every poll_interval seconds until it reaches done, error or
cancelled, or until timeout seconds pass.

Returns:
- completed=true, success=true: task finished with state done
- completed=true, success=false: task ended in error or cancelled
- completed=false: timed out while still running (call again to keep waiting)

A failure to read the task is reported as a tool error, not as a timeout.
Sends progress notifications when the request carries a progressToken.

Use after:
- install_package, install_device_settings, preview_install
- execute_script_on_* tools
- validate_template

Related tools:
- get_task: Single read without waiting`,
    inputSchema: {
      type: 'object',
      properties: {
        task_id: { type: 'number', description: 'Task ID' },
        timeout: { type: 'number', description: `Maximum wait in seconds (default: ${DEFAULT_TASK_TIMEOUT})` },
        poll_interval: { type: 'number', description: `Seconds between checks (default: ${DEFAULT_POLL_INTERVAL})` },
      },
      required: ['task_id'],
    },
  },
  {
    name: 'list_packages',
    description: `List policy packages in an ADOM.

Related tools:
- get_package: One package
- list_firewall_policies: Policies inside a package
- install_package: Push a package to devices`,
    inputSchema: { type: 'object', properties: { adom: adomProperty } },
  },
  {
    name: 'get_package',
    description: `Get one policy package, including its scope members.

Related tools:
- assign_package: Change which devices the package targets`,
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Package name' },
        adom: adomProperty,
        include_details: { type: 'boolean', description: 'Include policies and settings (default: false)' },
      },
      required: ['name'],
    },
  },
  {
    name: 'install_package',
    description: `Install a policy package to devices.

Asynchronous: returns a task_id. Follow with wait_for_task.

Use preview=true to stage without applying.

Related tools:
- preview_install: Generate a CLI preview first
- wait_for_task: Monitor the install
- install_device_settings: Device-level settings only`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        package: { type: 'string', description: 'Policy package name' },
        devices: scopeProperty,
        preview: { type: 'boolean', description: 'Preview only (default: false)' },
      },
      required: ['adom', 'package', 'devices'],
    },
  },
  {
    name: 'install_device_settings',
    description: `Install device-level settings (interfaces, DNS, NTP, routing) without the policy package.

Asynchronous: returns a task_id. Follow with wait_for_task.

Related tools:
- install_package: Full package install`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        devices: scopeProperty,
      },
      required: ['adom', 'devices'],
    },
  },
  {
    name: 'lock_adom',
    description: `Lock an ADOM for editing (workspace mode).

In workspace mode changes require the lock. Order: lock_adom, make
changes, commit_adom, unlock_adom.

Related tools:
- commit_adom: Save changes
- unlock_adom: Release the lock`,
    inputSchema: { type: 'object', properties: { adom: adomProperty }, required: ['adom'] },
  },
  {
    name: 'unlock_adom',
    description: `Release the workspace lock on an ADOM. Commit first to keep changes.

Related tools:
- commit_adom: Save changes before unlocking`,
    inputSchema: { type: 'object', properties: { adom: adomProperty }, required: ['adom'] },
  },
  {
    name: 'commit_adom',
    description: `Commit pending workspace changes in an ADOM.

Related tools:
- lock_adom / unlock_adom: Workspace lock`,
    inputSchema: { type: 'object', properties: { adom: adomProperty }, required: ['adom'] },
  },
];

export async function handleSystemTool(name: string, args: ToolArgs, ctx: ToolContext): Promise<string> {
  const { client } = ctx;

  switch (name) {
    case 'get_system_status': {
      const data = await client.getSystemStatus();
      return toJson({ status: 'success', data });
    }

    case 'get_ha_status': {
      const data = await client.getHaStatus();
      return toJson({ status: 'success', data });
    }

    case 'list_adoms': {
      const adoms = await client.listAdoms({ fields: optionalStringArray(args, 'fields') });
      return toJson({ status: 'success', count: adoms.length, adoms });
    }

    case 'get_adom': {
      const adomName = validateAdom(requireString(args, 'name'));
      const loadsub = optionalBoolean(args, 'include_details', false) ? 1 : 0;
      const adom = await client.getAdom(adomName, loadsub);
      return toJson({ status: 'success', adom });
    }

    case 'list_devices': {
      const adom = adomArg(args, ctx);
      const devices = await client.listDevices(adom, { fields: optionalStringArray(args, 'fields') });
      return toJson({ status: 'success', count: devices.length, devices });
    }

    case 'get_device': {
      const deviceName = validateDeviceName(requireString(args, 'name'));
      const adom = adomArg(args, ctx);
      const loadsub = optionalBoolean(args, 'include_details', false) ? 1 : 0;
      const device = await client.getDevice(adom, deviceName, loadsub);
      return toJson({ status: 'success', device });
    }

    case 'list_device_groups': {
      const groups = await client.listDeviceGroups(adomArg(args, ctx));
      return toJson({ status: 'success', count: groups.length, groups });
    }

    case 'list_tasks': {
      const filterState = optionalString(args, 'filter_state');
      const tasks = await client.listTasks(filterState ? [['state', '==', filterState]] : undefined);
      return toJson({ status: 'success', count: tasks.length, tasks });
    }

    case 'get_task': {
      const taskId = requireInteger(args, 'task_id');
      const task = await client.getTask(taskId);
      const result: Record<string, unknown> = { status: 'success', task };
      if (optionalBoolean(args, 'include_details', false)) {
        result.lines = await client.getTaskLine(taskId);
      }
      return toJson(result);
    }

    case 'wait_for_task': {
      const taskId = requireInteger(args, 'task_id');
      const startedAt = Date.now();
      const outcome = await waitForTask(client, taskId, {
        timeout: optionalNumber(args, 'timeout', DEFAULT_TASK_TIMEOUT),
        pollInterval: optionalNumber(args, 'poll_interval', DEFAULT_POLL_INTERVAL),
        onPoll: ctx.reportProgress?.asPollCallback(taskId),
      });
      ctx.taskWaits?.recordTaskWait({
        state: outcome.kind === 'terminal' ? outcome.state : 'timeout',
        attempts: outcome.attempts,
        waitedMs: Date.now() - startedAt,
      });

      if (outcome.kind === 'terminal') {
        return toJson({
          status: outcome.success ? 'success' : 'error',
          completed: true,
          success: outcome.success,
          state: outcome.state,
          task: outcome.task,
          attempts: outcome.attempts,
          message: outcome.message,
        });
      }
      return toJson({
        status: 'timeout',
        completed: false,
        success: false,
        task: outcome.task,
        attempts: outcome.attempts,
        message: outcome.message,
      });
    }

    case 'list_packages': {
      const packages = await client.listPackages(adomArg(args, ctx));
      return toJson({ status: 'success', count: packages.length, packages });
    }

    case 'get_package': {
      const pkgName = validatePackageName(requireString(args, 'name'));
      const adom = adomArg(args, ctx);
      const loadsub = optionalBoolean(args, 'include_details', false) ? 1 : 0;
      const pkg = await client.getPackage(adom, pkgName, loadsub);
      return toJson({ status: 'success', package: pkg });
    }

    case 'install_package': {
      const adom = adomArg(args, ctx);
      const pkg = validatePackageName(requireString(args, 'package'));
      const scope = requireScope(args, 'devices');
      const preview = optionalBoolean(args, 'preview', false);
      const result = await client.installPackage(adom, pkg, scope, preview ? ['preview'] : ['none']);
      const taskId = taskIdOf(result);
      return toJson({
        status: 'success',
        task_id: taskId,
        preview,
        message: `Installation ${preview ? 'preview ' : ''}started, task ID: ${taskId}`,
      });
    }

    case 'install_device_settings': {
      const adom = adomArg(args, ctx);
      const scope = requireScope(args, 'devices');
      const result = await client.installDevice(adom, scope);
      const taskId = taskIdOf(result);
      return toJson({
        status: 'success',
        task_id: taskId,
        message: `Device settings installation started, task ID: ${taskId}`,
      });
    }

    case 'lock_adom': {
      const adom = adomArg(args, ctx);
      await client.lockAdom(adom);
      return toJson({ status: 'success', message: `ADOM '${adom}' locked successfully` });
    }

    case 'unlock_adom': {
      const adom = adomArg(args, ctx);
      await client.unlockAdom(adom);
      return toJson({ status: 'success', message: `ADOM '${adom}' unlocked successfully` });
    }

    case 'commit_adom': {
      const adom = adomArg(args, ctx);
      await client.commitAdom(adom);
      return toJson({ status: 'success', message: `ADOM '${adom}' changes committed successfully` });
    }

    default:
      throw new Error(`Unknown system tool: ${name}`);
  }
}
