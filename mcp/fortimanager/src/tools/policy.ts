/**
 * Policy Package & Firewall Policy Tools
 *
 * Package lifecycle, firewall policy CRUD, ordering, search, install
 * preview and JSON export.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  optionalBoolean,
  optionalInteger,
  optionalString,
  optionalStringArray,
  requireInteger,
  requireIntegerArray,
  requireScope,
  requireString,
  requireStringArray,
  type ToolArgs,
} from '../lib/args.js';
import { ValidationError } from '../lib/errors.js';
import type { FmgFilter, FmgRecord } from '../lib/fmg-client.js';
import { log } from '../lib/logger.js';
import {
  getAllowedOutputDirs,
  validateFilename,
  validateInterfaceName,
  validateLogTrafficMode,
  validateMovePosition,
  validateNgfwMode,
  validateOutputPath,
  validatePackageName,
  validatePolicyAction,
  validatePolicyId,
  validatePolicyName,
  validateStatus,
} from '../lib/validation.js';
import { adomArg, taskIdOf, toJson, type ToolContext } from './context.js';

const adomProperty = { type: 'string', description: 'ADOM name (default: DEFAULT_ADOM)' } as const;
const packageProperty = { type: 'string', description: 'Policy package name' } as const;
const policyIdProperty = { type: 'number', description: 'Policy ID' } as const;
const stringList = (description: string) => ({ type: 'array', items: { type: 'string' }, description }) as const;

const scopeProperty = {
  type: 'array',
  description: 'Target devices, e.g. [{"name": "FGT-HQ", "vdom": "root"}]',
  items: {
    type: 'object',
    properties: { name: { type: 'string' }, vdom: { type: 'string' } },
    required: ['name'],
  },
} as const;

const policyFieldProperties = {
  name: { type: 'string', description: 'Policy name' },
  srcintf: stringList('Source interfaces or zones'),
  dstintf: stringList('Destination interfaces or zones'),
  srcaddr: stringList('Source address objects'),
  dstaddr: stringList('Destination address objects'),
  service: stringList('Service objects'),
  action: { type: 'string', enum: ['accept', 'deny', 'ipsec', 'ssl-vpn'], description: 'Action' },
  schedule: { type: 'string', description: 'Schedule object' },
  nat: { type: 'boolean', description: 'Enable source NAT' },
  logtraffic: { type: 'string', enum: ['all', 'utm', 'disable'], description: 'Traffic logging' },
  status: { type: 'string', enum: ['enable', 'disable'], description: 'Policy status' },
  comments: { type: 'string', description: 'Comments' },
} as const;

export const policyTools: Tool[] = [
  {
    name: 'create_package',
    description: `Create a policy package.

Related tools:
- clone_package: Start from an existing package
- assign_package: Set install targets`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        name: { type: 'string', description: 'Package name' },
        ngfw_mode: { type: 'string', enum: ['profile-based', 'policy-based'], description: 'NGFW mode (default: profile-based)' },
        central_nat: { type: 'boolean', description: 'Enable central NAT (default: false)' },
      },
      required: ['adom', 'name'],
    },
  },
  {
    name: 'delete_package',
    description: `Delete a policy package and every policy in it.`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, package: packageProperty },
      required: ['adom', 'package'],
    },
  },
  {
    name: 'clone_package',
    description: `Copy a policy package under a new name.

Use for:
- Staging changes on a copy before touching production`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        package: packageProperty,
        new_name: { type: 'string', description: 'Name for the copy' },
      },
      required: ['adom', 'package', 'new_name'],
    },
  },
  {
    name: 'assign_package',
    description: `Set the devices a policy package installs to (its scope members).`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, package: packageProperty, devices: scopeProperty },
      required: ['adom', 'package', 'devices'],
    },
  },
  {
    name: 'list_firewall_policies',
    description: `List firewall policies in a package, in evaluation order.

Returns the page of policies plus the package's total policy count.
Use limit/offset to page through large packages.

Related tools:
- search_firewall_policies: Filter by name, address, service
- export_firewall_policies: Save the full list to a file`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        package: packageProperty,
        fields: stringList('Fields to return (default: all)'),
        limit: { type: 'number', description: 'Maximum policies to return' },
        offset: { type: 'number', description: 'Policies to skip (default: 0)' },
      },
      required: ['adom', 'package'],
    },
  },
  {
    name: 'get_firewall_policy',
    description: `Get one firewall policy by ID.`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, package: packageProperty, policyid: policyIdProperty },
      required: ['adom', 'package', 'policyid'],
    },
  },
  {
    name: 'create_firewall_policy',
    description: `Create a firewall policy.

Defaults: action accept, schedule always, NAT off, logtraffic utm,
status enable. New policies are appended; use move_firewall_policy to
place them.

Related tools:
- move_firewall_policy: Reorder
- install_package: Push to devices`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        package: packageProperty,
        ...policyFieldProperties,
        policyid: { type: 'number', description: 'Explicit policy ID (default: assigned)' },
      },
      required: ['adom', 'package', 'name', 'srcintf', 'dstintf', 'srcaddr', 'dstaddr', 'service'],
    },
  },
  {
    name: 'update_firewall_policy',
    description: `Update fields of an existing firewall policy. Only the given fields change.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        package: packageProperty,
        policyid: policyIdProperty,
        ...policyFieldProperties,
      },
      required: ['adom', 'package', 'policyid'],
    },
  },
  {
    name: 'delete_firewall_policy',
    description: `Delete one firewall policy.`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, package: packageProperty, policyid: policyIdProperty },
      required: ['adom', 'package', 'policyid'],
    },
  },
  {
    name: 'delete_firewall_policies_bulk',
    description: `Delete several firewall policies by ID in one request.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        package: packageProperty,
        policyids: { type: 'array', items: { type: 'number' }, description: 'Policy IDs' },
      },
      required: ['adom', 'package', 'policyids'],
    },
  },
  {
    name: 'move_firewall_policy',
    description: `Move a policy before or after another policy.

Order matters: the first matching policy wins.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        package: packageProperty,
        policyid: { type: 'number', description: 'Policy to move' },
        target_policyid: { type: 'number', description: 'Reference policy' },
        position: { type: 'string', enum: ['before', 'after'], description: 'Placement (default: before)' },
      },
      required: ['adom', 'package', 'policyid', 'target_policyid'],
    },
  },
  {
    name: 'search_firewall_policies',
    description: `Search policies in a package.

Name, address and service filters are substring matches; action and
status are exact.

Use for:
- Finding every policy that references an address before deleting it
- Auditing deny or disabled rules`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        package: packageProperty,
        name_filter: { type: 'string', description: 'Name contains' },
        srcaddr_filter: { type: 'string', description: 'Source address contains' },
        dstaddr_filter: { type: 'string', description: 'Destination address contains' },
        service_filter: { type: 'string', description: 'Service contains' },
        action_filter: { type: 'string', description: 'Action equals' },
        status_filter: { type: 'string', description: 'Status equals' },
      },
      required: ['adom', 'package'],
    },
  },
  {
    name: 'preview_install',
    description: `Generate an install preview (the CLI that would be pushed) for devices.

Asynchronous: wait for the task, then read get_preview_result.

Related tools:
- wait_for_task
- get_preview_result`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, package: packageProperty, devices: scopeProperty },
      required: ['adom', 'package', 'devices'],
    },
  },
  {
    name: 'get_preview_result',
    description: `Read the result of a finished install preview.`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, devices: scopeProperty },
      required: ['adom', 'devices'],
    },
  },
  {
    name: 'export_firewall_policies',
    description: `Export all firewall policies in a package to a JSON file.

The output directory must be inside FMG_ALLOWED_OUTPUT_DIRS (default:
home, Downloads, Documents, Desktop, Reports).

Returns the written path and policy count.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        package: packageProperty,
        output_dir: { type: 'string', description: 'Directory to write to, e.g. ~/Reports' },
        filename: { type: 'string', description: 'File name (default: <adom>_<package>_policies.json)' },
      },
      required: ['adom', 'package', 'output_dir'],
    },
  },
];

function interfaceList(args: ToolArgs, key: string): string[] {
  return requireStringArray(args, key).map(validateInterfaceName);
}

/** Policy fields shared by create and update, read only when present */
function readPolicyFields(args: ToolArgs): FmgRecord {
  const data: FmgRecord = {};

  const name = optionalString(args, 'name');
  if (name !== undefined) data.name = validatePolicyName(name);
  if (args.srcintf !== undefined) data.srcintf = interfaceList(args, 'srcintf');
  if (args.dstintf !== undefined) data.dstintf = interfaceList(args, 'dstintf');

  for (const key of ['srcaddr', 'dstaddr', 'service']) {
    const value = optionalStringArray(args, key);
    if (value !== undefined) data[key] = value;
  }

  const action = optionalString(args, 'action');
  if (action !== undefined) data.action = validatePolicyAction(action);
  const schedule = optionalString(args, 'schedule');
  if (schedule !== undefined) data.schedule = schedule;
  if (args.nat !== undefined) data.nat = optionalBoolean(args, 'nat', false) ? 'enable' : 'disable';
  const logtraffic = optionalString(args, 'logtraffic');
  if (logtraffic !== undefined) data.logtraffic = validateLogTrafficMode(logtraffic);
  const status = optionalString(args, 'status');
  if (status !== undefined) data.status = validateStatus(status);
  const comments = optionalString(args, 'comments');
  if (comments !== undefined) data.comments = comments;

  return data;
}

export async function handlePolicyTool(name: string, args: ToolArgs, ctx: ToolContext): Promise<string> {
  const { client } = ctx;

  switch (name) {
    case 'create_package': {
      const adom = adomArg(args, ctx);
      const pkgName = validatePackageName(requireString(args, 'name'));
      const settings = {
        'ngfw-mode': validateNgfwMode(optionalString(args, 'ngfw_mode', 'profile-based')),
        'central-nat': optionalBoolean(args, 'central_nat', false) ? 'enable' : 'disable',
      };
      await client.createPackage(adom, pkgName, settings);
      return toJson({ status: 'success', package: pkgName, message: `Package ${pkgName} created successfully` });
    }

    case 'delete_package': {
      const adom = adomArg(args, ctx);
      const pkg = validatePackageName(requireString(args, 'package'));
      await client.deletePackage(adom, pkg);
      return toJson({ status: 'success', message: `Package ${pkg} deleted successfully` });
    }

    case 'clone_package': {
      const adom = adomArg(args, ctx);
      const pkg = validatePackageName(requireString(args, 'package'));
      const newName = validatePackageName(requireString(args, 'new_name'));
      await client.clonePackage(adom, pkg, newName);
      return toJson({ status: 'success', package: newName, message: `Package ${pkg} cloned to ${newName}` });
    }

    case 'assign_package': {
      const adom = adomArg(args, ctx);
      const pkg = validatePackageName(requireString(args, 'package'));
      const scope = requireScope(args, 'devices');
      await client.assignPackage(adom, pkg, scope);
      return toJson({ status: 'success', message: `Package ${pkg} assigned to ${scope.length} device(s)` });
    }

    case 'list_firewall_policies': {
      const adom = adomArg(args, ctx);
      const pkg = validatePackageName(requireString(args, 'package'));
      const limit = optionalInteger(args, 'limit');
      const offset = optionalInteger(args, 'offset', 0);

      const total = await client.getFirewallPolicyCount(adom, pkg);
      const policies = await client.listFirewallPolicies(adom, pkg, {
        fields: optionalStringArray(args, 'fields'),
        range: limit ? [offset, limit] : undefined,
      });
      return toJson({ status: 'success', count: policies.length, total, policies });
    }

    case 'get_firewall_policy': {
      const adom = adomArg(args, ctx);
      const pkg = validatePackageName(requireString(args, 'package'));
      const policyid = validatePolicyId(requireInteger(args, 'policyid'));
      const policy = await client.getFirewallPolicy(adom, pkg, policyid);
      return toJson({ status: 'success', policy });
    }

    case 'create_firewall_policy': {
      const adom = adomArg(args, ctx);
      const pkg = validatePackageName(requireString(args, 'package'));
      const policyName = validatePolicyName(requireString(args, 'name'));
      const policyid = optionalInteger(args, 'policyid');

      const policy: FmgRecord = {
        name: policyName,
        srcintf: interfaceList(args, 'srcintf'),
        dstintf: interfaceList(args, 'dstintf'),
        srcaddr: requireStringArray(args, 'srcaddr'),
        dstaddr: requireStringArray(args, 'dstaddr'),
        service: requireStringArray(args, 'service'),
        action: validatePolicyAction(optionalString(args, 'action', 'accept')),
        schedule: optionalString(args, 'schedule', 'always'),
        nat: optionalBoolean(args, 'nat', false) ? 'enable' : 'disable',
        logtraffic: validateLogTrafficMode(optionalString(args, 'logtraffic', 'utm')),
        status: validateStatus(optionalString(args, 'status', 'enable')),
      };
      const comments = optionalString(args, 'comments');
      if (comments) policy.comments = comments;
      if (policyid !== undefined) policy.policyid = validatePolicyId(policyid);

      const result = await client.createFirewallPolicy(adom, pkg, policy);
      return toJson({
        status: 'success',
        policyid: result.policyid ?? policyid,
        message: `Policy ${policyName} created successfully`,
      });
    }

    case 'update_firewall_policy': {
      const adom = adomArg(args, ctx);
      const pkg = validatePackageName(requireString(args, 'package'));
      const policyid = validatePolicyId(requireInteger(args, 'policyid'));
      const data = readPolicyFields(args);
      if (Object.keys(data).length === 0) {
        throw new ValidationError('No update parameters provided');
      }
      await client.updateFirewallPolicy(adom, pkg, policyid, data);
      return toJson({ status: 'success', policyid, message: `Policy ${policyid} updated successfully` });
    }

    case 'delete_firewall_policy': {
      const adom = adomArg(args, ctx);
      const pkg = validatePackageName(requireString(args, 'package'));
      const policyid = validatePolicyId(requireInteger(args, 'policyid'));
      await client.deleteFirewallPolicy(adom, pkg, policyid);
      return toJson({ status: 'success', message: `Policy ${policyid} deleted successfully` });
    }

    case 'delete_firewall_policies_bulk': {
      const adom = adomArg(args, ctx);
      const pkg = validatePackageName(requireString(args, 'package'));
      const policyids = requireIntegerArray(args, 'policyids').map(validatePolicyId);
      if (policyids.length === 0) {
        throw new ValidationError('No policy IDs provided');
      }
      await client.deleteFirewallPolicies(adom, pkg, policyids);
      return toJson({
        status: 'success',
        deleted_count: policyids.length,
        message: `Deleted ${policyids.length} policies`,
      });
    }

    case 'move_firewall_policy': {
      const adom = adomArg(args, ctx);
      const pkg = validatePackageName(requireString(args, 'package'));
      const policyid = validatePolicyId(requireInteger(args, 'policyid'));
      const target = validatePolicyId(requireInteger(args, 'target_policyid'));
      const position = validateMovePosition(optionalString(args, 'position', 'before'));
      await client.moveFirewallPolicy(adom, pkg, policyid, target, position);
      return toJson({ status: 'success', message: `Policy ${policyid} moved ${position} policy ${target}` });
    }

    case 'search_firewall_policies': {
      const adom = adomArg(args, ctx);
      const pkg = validatePackageName(requireString(args, 'package'));
      const filters: FmgFilter[] = [];
      const substring: Array<[string, string]> = [
        ['name', 'name_filter'],
        ['srcaddr', 'srcaddr_filter'],
        ['dstaddr', 'dstaddr_filter'],
        ['service', 'service_filter'],
      ];
      for (const [field, key] of substring) {
        const value = optionalString(args, key);
        if (value) filters.push([field, 'contain', value]);
      }
      const action = optionalString(args, 'action_filter');
      if (action) filters.push(['action', '==', action]);
      const status = optionalString(args, 'status_filter');
      if (status) filters.push(['status', '==', status]);

      const policies = await client.listFirewallPolicies(adom, pkg, {
        filter: filters.length > 0 ? filters : undefined,
      });
      return toJson({ status: 'success', count: policies.length, policies });
    }

    case 'preview_install': {
      const adom = adomArg(args, ctx);
      validatePackageName(requireString(args, 'package'));
      const scope = requireScope(args, 'devices');
      const result = await client.installPreview(adom, scope, ['json']);
      const taskId = taskIdOf(result);
      return toJson({ status: 'success', task_id: taskId, message: `Preview started, task ID: ${taskId}` });
    }

    case 'get_preview_result': {
      const adom = adomArg(args, ctx);
      const preview = await client.getPreviewResult(adom, requireScope(args, 'devices'));
      return toJson({ status: 'success', preview });
    }

    case 'export_firewall_policies': {
      const adom = adomArg(args, ctx);
      const pkg = validatePackageName(requireString(args, 'package'));
      const outputDir = validateOutputPath(
        requireString(args, 'output_dir'),
        getAllowedOutputDirs(ctx.config.allowedOutputDirs)
      );
      const filename = validateFilename(optionalString(args, 'filename', `${adom}_${pkg}_policies.json`));

      const policies = await client.listFirewallPolicies(adom, pkg);
      const path = join(outputDir, filename);
      mkdirSync(outputDir, { recursive: true });
      writeFileSync(
        path,
        JSON.stringify({ adom, package: pkg, exported_at: new Date().toISOString(), policies }, null, 2)
      );
      log.info('Exported firewall policies', { adom, package: pkg, path, count: policies.length });

      return toJson({
        status: 'success',
        path,
        count: policies.length,
        message: `Exported ${policies.length} policies to ${path}`,
      });
    }

    default:
      throw new Error(`Unknown policy tool: ${name}`);
  }
}
