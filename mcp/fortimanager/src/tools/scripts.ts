/**
 * CLI Script Tools
 *
 * Scripts live in an ADOM and run against the device database, the ADOM
 * database (policy packages) or live devices. Execution is asynchronous:
 * every execute_* tool returns a task id for wait_for_task.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  optionalInteger,
  optionalString,
  requireInteger,
  requireString,
  requireStringArray,
  type ToolArgs,
} from '../lib/args.js';
import { ValidationError } from '../lib/errors.js';
import type { FmgFilter, FmgRecord } from '../lib/fmg-client.js';
import { validateDeviceName, validatePackageName } from '../lib/validation.js';
import { adomArg, taskIdOf, toJson, type ToolContext } from './context.js';

const SCRIPT_FIELDS = ['name', 'type', 'target', 'desc', 'content', 'modification_time'];
const DEFAULT_LIST_LIMIT = 100;

const adomProperty = { type: 'string', description: 'ADOM name (default: DEFAULT_ADOM)' } as const;
const scriptProperty = { type: 'string', description: 'Script name' } as const;
const typeProperty = { type: 'string', description: 'Script type: cli, tcl, cligrp, tclgrp, jinja' } as const;
const targetProperty = {
  type: 'string',
  description: 'Run target: device_database, adom_database or remote_device',
} as const;

export const scriptTools: Tool[] = [
  {
    name: 'list_scripts',
    description: `List CLI scripts in an ADOM.

Related tools:
- get_script: Full script including content
- execute_script_on_device: Run a script`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        script_type: typeProperty,
        target: targetProperty,
        limit: { type: 'number', description: 'Maximum scripts returned (default: 100)' },
      },
    },
  },
  {
    name: 'get_script',
    description: `Get one CLI script with its content.`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, name: scriptProperty },
      required: ['adom', 'name'],
    },
  },
  {
    name: 'create_script',
    description: `Create a CLI script.

target decides where it runs:
- device_database: FortiManager's copy of device config (install to push)
- adom_database: policy package objects
- remote_device: directly on the FortiGate`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        name: scriptProperty,
        content: { type: 'string', description: 'Script body' },
        script_type: { ...typeProperty, description: 'Script type (default: cli)' },
        target: { ...targetProperty, description: 'Run target (default: device_database)' },
        description: { type: 'string', description: 'Description' },
      },
      required: ['adom', 'name', 'content'],
    },
  },
  {
    name: 'update_script',
    description: `Update a CLI script's content, description, type or target.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        name: scriptProperty,
        content: { type: 'string', description: 'Script body' },
        description: { type: 'string', description: 'Description' },
        script_type: typeProperty,
        target: targetProperty,
      },
      required: ['adom', 'name'],
    },
  },
  {
    name: 'delete_script',
    description: `Delete a CLI script.`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, name: scriptProperty },
      required: ['adom', 'name'],
    },
  },
  {
    name: 'execute_script_on_device',
    description: `Run a script on one device (global VDOM scope).

Returns a task id.

Related tools:
- wait_for_task: Wait for the run to finish
- get_script_log_latest: Read the output`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        script: scriptProperty,
        device: { type: 'string', description: 'Device name' },
      },
      required: ['adom', 'script', 'device'],
    },
  },
  {
    name: 'execute_script_on_devices',
    description: `Run a script on several devices in one task.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        script: scriptProperty,
        devices: { type: 'array', items: { type: 'string' }, description: 'Device names' },
      },
      required: ['adom', 'script', 'devices'],
    },
  },
  {
    name: 'execute_script_on_device_group',
    description: `Run a script on every member of a device group.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        script: scriptProperty,
        group: { type: 'string', description: 'Device group name' },
      },
      required: ['adom', 'script', 'group'],
    },
  },
  {
    name: 'execute_script_on_package',
    description: `Run an adom_database script against a policy package.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        script: scriptProperty,
        package: { type: 'string', description: 'Policy package name' },
      },
      required: ['adom', 'script', 'package'],
    },
  },
  {
    name: 'get_script_log_latest',
    description: `Get the most recent script execution log, optionally for one device.`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, device: { type: 'string', description: 'Device name' } },
      required: ['adom'],
    },
  },
  {
    name: 'get_script_log_summary',
    description: `List script execution history (log ids, scripts, times).

Related tools:
- get_script_log_output: Output of one run`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, device: { type: 'string', description: 'Device name' } },
      required: ['adom'],
    },
  },
  {
    name: 'get_script_log_output',
    description: `Get the output of one script run by log id.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        log_id: { type: 'number', description: 'Log id from get_script_log_summary' },
        device: { type: 'string', description: 'Device name' },
      },
      required: ['adom', 'log_id'],
    },
  },
];

function optionalDevice(args: ToolArgs): string | undefined {
  const device = optionalString(args, 'device');
  return device ? validateDeviceName(device) : undefined;
}

export async function handleScriptTool(name: string, args: ToolArgs, ctx: ToolContext): Promise<string> {
  const { client } = ctx;
  const adom = adomArg(args, ctx);

  switch (name) {
    case 'list_scripts': {
      const filter: FmgFilter[] = [];
      const scriptType = optionalString(args, 'script_type');
      const target = optionalString(args, 'target');
      if (scriptType) filter.push(['type', '==', scriptType]);
      if (target) filter.push(['target', '==', target]);
      const limit = optionalInteger(args, 'limit', DEFAULT_LIST_LIMIT);
      const scripts = (await client.listScripts(adom, { fields: SCRIPT_FIELDS, filter })).slice(0, limit);
      return toJson({ adom, count: scripts.length, scripts });
    }

    case 'get_script': {
      const script = await client.getScript(adom, requireString(args, 'name'));
      return toJson({ script });
    }

    case 'create_script': {
      const scriptName = requireString(args, 'name');
      const script: FmgRecord = {
        name: scriptName,
        content: requireString(args, 'content'),
        type: optionalString(args, 'script_type', 'cli'),
        target: optionalString(args, 'target', 'device_database'),
      };
      const description = optionalString(args, 'description');
      if (description) script.desc = description;
      const result = await client.createScript(adom, script);
      return toJson({ success: true, message: `Script '${scriptName}' created successfully`, result });
    }

    case 'update_script': {
      const scriptName = requireString(args, 'name');
      const data: FmgRecord = {};
      const fields: Array<[arg: string, field: string]> = [
        ['content', 'content'],
        ['description', 'desc'],
        ['script_type', 'type'],
        ['target', 'target'],
      ];
      for (const [arg, field] of fields) {
        const value = optionalString(args, arg);
        if (value !== undefined) data[field] = value;
      }
      if (Object.keys(data).length === 0) {
        throw new ValidationError('No update parameters provided');
      }
      const result = await client.updateScript(adom, scriptName, data);
      return toJson({ success: true, message: `Script '${scriptName}' updated successfully`, result });
    }

    case 'delete_script': {
      const scriptName = requireString(args, 'name');
      const result = await client.deleteScript(adom, scriptName);
      return toJson({ success: true, message: `Script '${scriptName}' deleted successfully`, result });
    }

    case 'execute_script_on_device': {
      const script = requireString(args, 'script');
      const device = validateDeviceName(requireString(args, 'device'));
      const result = await client.executeScript(adom, script, [{ name: device, vdom: 'global' }]);
      return toJson({
        success: true,
        message: `Script '${script}' execution started on device '${device}'`,
        task_id: taskIdOf(result),
        result,
      });
    }

    case 'execute_script_on_devices': {
      const script = requireString(args, 'script');
      const devices = requireStringArray(args, 'devices').map(validateDeviceName);
      const scope = devices.map((device) => ({ name: device, vdom: 'global' }));
      const result = await client.executeScript(adom, script, scope);
      return toJson({
        success: true,
        message: `Script '${script}' execution started on ${devices.length} devices`,
        task_id: taskIdOf(result),
        devices,
        result,
      });
    }

    case 'execute_script_on_device_group': {
      const script = requireString(args, 'script');
      const group = requireString(args, 'group');
      const result = await client.executeScript(adom, script, [{ name: group }]);
      return toJson({
        success: true,
        message: `Script '${script}' execution started on device group '${group}'`,
        task_id: taskIdOf(result),
        result,
      });
    }

    case 'execute_script_on_package': {
      const script = requireString(args, 'script');
      const pkg = validatePackageName(requireString(args, 'package'));
      const result = await client.executeScript(adom, script, undefined, pkg);
      return toJson({
        success: true,
        message: `Script '${script}' execution started on package '${pkg}'`,
        task_id: taskIdOf(result),
        result,
      });
    }

    case 'get_script_log_latest': {
      const entry = await client.getScriptLogLatest(adom, optionalDevice(args));
      return toJson({ log: entry });
    }

    case 'get_script_log_summary': {
      const device = optionalDevice(args);
      const logs = await client.getScriptLogSummary(adom, device);
      return toJson({ adom, device: device ?? null, count: logs.length, logs });
    }

    case 'get_script_log_output': {
      const entry = await client.getScriptLogOutput(adom, requireInteger(args, 'log_id'), optionalDevice(args));
      return toJson({ log: entry });
    }

    default:
      throw new Error(`Unknown script tool: ${name}`);
  }
}
