/**
 * Provisioning Template Tools
 *
 * System templates (devprof), CLI template groups and template groups.
 * Assignments bind a template to device/VDOM pairs; the configuration is
 * applied on the next install.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { optionalInteger, optionalString, requireScope, requireString, type ToolArgs } from '../lib/args.js';
import type { FmgRecord, ScopeMember } from '../lib/fmg-client.js';
import { validateDeviceName } from '../lib/validation.js';
import { adomArg, taskIdOf, toJson, type ToolContext } from './context.js';

const DEFAULT_LIST_LIMIT = 100;

const adomProperty = { type: 'string', description: 'ADOM name (default: DEFAULT_ADOM)' } as const;
const nameProperty = { type: 'string', description: 'Template name' } as const;
const limitProperty = { type: 'number', description: 'Maximum entries returned (default: 100)' } as const;
const deviceProperty = { type: 'string', description: 'Device name' } as const;
const vdomProperty = { type: 'string', description: 'VDOM (default: root)' } as const;
const devicesProperty = {
  type: 'array',
  description: 'Devices, e.g. [{"name": "FGT-1", "vdom": "root"}]',
  items: {
    type: 'object',
    properties: { name: { type: 'string' }, vdom: { type: 'string' } },
    required: ['name'],
  },
} as const;

function listSchema(): Tool['inputSchema'] {
  return { type: 'object', properties: { adom: adomProperty, limit: limitProperty } };
}

function getSchema(): Tool['inputSchema'] {
  return { type: 'object', properties: { adom: adomProperty, name: nameProperty }, required: ['adom', 'name'] };
}

export const templateTools: Tool[] = [
  {
    name: 'list_templates',
    description: `List provisioning templates of every kind in an ADOM.

Related tools:
- list_system_templates, list_template_groups: One kind only`,
    inputSchema: listSchema(),
  },
  {
    name: 'get_template',
    description: `Get one provisioning template.`,
    inputSchema: getSchema(),
  },
  {
    name: 'list_system_templates',
    description: `List system templates (DNS, NTP, admin and interface settings).`,
    inputSchema: listSchema(),
  },
  {
    name: 'get_system_template',
    description: `Get one system template with its scope members.`,
    inputSchema: getSchema(),
  },
  {
    name: 'assign_system_template',
    description: `Assign a system template to a device.

Related tools:
- install_device_settings: Push the result
- unassign_system_template: Remove the binding`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, template: nameProperty, device: deviceProperty, vdom: vdomProperty },
      required: ['adom', 'template', 'device'],
    },
  },
  {
    name: 'assign_system_template_bulk',
    description: `Assign a system template to several devices at once.`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, template: nameProperty, devices: devicesProperty },
      required: ['adom', 'template', 'devices'],
    },
  },
  {
    name: 'unassign_system_template',
    description: `Remove a system template from a device.`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, template: nameProperty, device: deviceProperty, vdom: vdomProperty },
      required: ['adom', 'template', 'device'],
    },
  },
  {
    name: 'list_cli_template_groups',
    description: `List CLI template groups.`,
    inputSchema: listSchema(),
  },
  {
    name: 'get_cli_template_group',
    description: `Get one CLI template group with its member templates.`,
    inputSchema: getSchema(),
  },
  {
    name: 'create_cli_template_group',
    description: `Create an empty CLI template group.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        name: nameProperty,
        description: { type: 'string', description: 'Description' },
      },
      required: ['adom', 'name'],
    },
  },
  {
    name: 'delete_cli_template_group',
    description: `Delete a CLI template group.`,
    inputSchema: getSchema(),
  },
  {
    name: 'list_template_groups',
    description: `List template groups (bundles of system, CLI and SD-WAN templates).`,
    inputSchema: listSchema(),
  },
  {
    name: 'get_template_group',
    description: `Get one template group.`,
    inputSchema: getSchema(),
  },
  {
    name: 'assign_template_group',
    description: `Assign a template group to a device.

Related tools:
- validate_template: Check the result before installing`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        template_group: { type: 'string', description: 'Template group name' },
        device: deviceProperty,
        vdom: vdomProperty,
      },
      required: ['adom', 'template_group', 'device'],
    },
  },
  {
    name: 'validate_template',
    description: `Validate a template group against a device.

Returns a task id.

Related tools:
- wait_for_task: Wait for validation to finish`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        template_group: { type: 'string', description: 'Template group name' },
        device: deviceProperty,
        vdom: vdomProperty,
      },
      required: ['adom', 'template_group', 'device'],
    },
  },
];

/** `device` plus optional `vdom` (default root) as a one-member scope */
export function deviceScope(args: ToolArgs): [ScopeMember] {
  return [{ name: validateDeviceName(requireString(args, 'device')), vdom: optionalString(args, 'vdom', 'root') }];
}

function limited(items: FmgRecord[], args: ToolArgs): FmgRecord[] {
  return items.slice(0, optionalInteger(args, 'limit', DEFAULT_LIST_LIMIT));
}

export async function handleTemplateTool(name: string, args: ToolArgs, ctx: ToolContext): Promise<string> {
  const { client } = ctx;
  const adom = adomArg(args, ctx);

  switch (name) {
    case 'list_templates': {
      const templates = limited(await client.listTemplates(adom), args);
      return toJson({ adom, count: templates.length, templates });
    }

    case 'get_template': {
      const template = await client.getTemplate(adom, requireString(args, 'name'));
      return toJson({ template });
    }

    case 'list_system_templates': {
      const templates = limited(await client.listSystemTemplates(adom), args);
      return toJson({ adom, count: templates.length, templates });
    }

    case 'get_system_template': {
      const template = await client.getSystemTemplate(adom, requireString(args, 'name'));
      return toJson({ template });
    }

    case 'assign_system_template': {
      const template = requireString(args, 'template');
      const scope = deviceScope(args);
      const result = await client.assignSystemTemplate(adom, template, scope);
      return toJson({
        success: true,
        message: `System template '${template}' assigned to device '${scope[0].name}'`,
        result,
      });
    }

    case 'assign_system_template_bulk': {
      const template = requireString(args, 'template');
      const scope = requireScope(args, 'devices');
      const result = await client.assignSystemTemplate(adom, template, scope);
      return toJson({
        success: true,
        message: `System template '${template}' assigned to ${scope.length} devices`,
        result,
      });
    }

    case 'unassign_system_template': {
      const template = requireString(args, 'template');
      const scope = deviceScope(args);
      const result = await client.unassignSystemTemplate(adom, template, scope);
      return toJson({
        success: true,
        message: `System template '${template}' unassigned from device '${scope[0].name}'`,
        result,
      });
    }

    case 'list_cli_template_groups': {
      const groups = limited(await client.listCliTemplateGroups(adom), args);
      return toJson({ adom, count: groups.length, cli_template_groups: groups });
    }

    case 'get_cli_template_group': {
      const group = await client.getCliTemplateGroup(adom, requireString(args, 'name'));
      return toJson({ cli_template_group: group });
    }

    case 'create_cli_template_group': {
      const groupName = requireString(args, 'name');
      const group: FmgRecord = { name: groupName };
      const description = optionalString(args, 'description');
      if (description) group.description = description;
      const result = await client.createCliTemplateGroup(adom, group);
      return toJson({ success: true, message: `CLI template group '${groupName}' created`, result });
    }

    case 'delete_cli_template_group': {
      const groupName = requireString(args, 'name');
      const result = await client.deleteCliTemplateGroup(adom, groupName);
      return toJson({ success: true, message: `CLI template group '${groupName}' deleted`, result });
    }

    case 'list_template_groups': {
      const groups = limited(await client.listTemplateGroups(adom), args);
      return toJson({ adom, count: groups.length, template_groups: groups });
    }

    case 'get_template_group': {
      const group = await client.getTemplateGroup(adom, requireString(args, 'name'));
      return toJson({ template_group: group });
    }

    case 'assign_template_group': {
      const templateGroup = requireString(args, 'template_group');
      const scope = deviceScope(args);
      const result = await client.assignTemplateGroup(adom, templateGroup, scope);
      return toJson({
        success: true,
        message: `Template group '${templateGroup}' assigned to device '${scope[0].name}'`,
        result,
      });
    }

    case 'validate_template': {
      const templateGroup = requireString(args, 'template_group');
      const scope = deviceScope(args);
      const result = await client.validateTemplate(adom, `adom/${adom}/tmplgrp/${templateGroup}`, scope);
      return toJson({
        success: true,
        message: `Template validation started for '${templateGroup}' on '${scope[0].name}'`,
        task_id: taskIdOf(result),
        result,
      });
    }

    default:
      throw new Error(`Unknown template tool: ${name}`);
  }
}
