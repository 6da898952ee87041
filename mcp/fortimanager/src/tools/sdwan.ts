/**
 * SD-WAN Template Tools (wanprof)
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { optionalInteger, optionalString, requireScope, requireString, type ToolArgs } from '../lib/args.js';
import type { FmgRecord } from '../lib/fmg-client.js';
import { adomArg, toJson, type ToolContext } from './context.js';
import { deviceScope } from './templates.js';

const adomProperty = { type: 'string', description: 'ADOM name (default: DEFAULT_ADOM)' } as const;
const templateProperty = { type: 'string', description: 'SD-WAN template name' } as const;
const deviceProperties = {
  adom: adomProperty,
  template: templateProperty,
  device: { type: 'string', description: 'Device name' },
  vdom: { type: 'string', description: 'VDOM (default: root)' },
} as const;

export const sdwanTools: Tool[] = [
  {
    name: 'list_sdwan_templates',
    description: `List SD-WAN templates in an ADOM.

Related tools:
- get_sdwan_template: Members, health checks and rules of one template`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        limit: { type: 'number', description: 'Maximum entries returned (default: 100)' },
      },
    },
  },
  {
    name: 'get_sdwan_template',
    description: `Get one SD-WAN template.`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, name: templateProperty },
      required: ['adom', 'name'],
    },
  },
  {
    name: 'create_sdwan_template',
    description: `Create an empty SD-WAN template.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        name: templateProperty,
        description: { type: 'string', description: 'Description' },
      },
      required: ['adom', 'name'],
    },
  },
  {
    name: 'delete_sdwan_template',
    description: `Delete an SD-WAN template.`,
    inputSchema: {
      type: 'object',
      properties: { adom: adomProperty, name: templateProperty },
      required: ['adom', 'name'],
    },
  },
  {
    name: 'assign_sdwan_template',
    description: `Assign an SD-WAN template to a device.

Related tools:
- install_device_settings: Push the result`,
    inputSchema: { type: 'object', properties: deviceProperties, required: ['adom', 'template', 'device'] },
  },
  {
    name: 'assign_sdwan_template_bulk',
    description: `Assign an SD-WAN template to several devices at once.`,
    inputSchema: {
      type: 'object',
      properties: {
        adom: adomProperty,
        template: templateProperty,
        devices: {
          type: 'array',
          description: 'Devices, e.g. [{"name": "FGT-1", "vdom": "root"}]',
          items: {
            type: 'object',
            properties: { name: { type: 'string' }, vdom: { type: 'string' } },
            required: ['name'],
          },
        },
      },
      required: ['adom', 'template', 'devices'],
    },
  },
  {
    name: 'unassign_sdwan_template',
    description: `Remove an SD-WAN template from a device.`,
    inputSchema: { type: 'object', properties: deviceProperties, required: ['adom', 'template', 'device'] },
  },
];

export async function handleSdwanTool(name: string, args: ToolArgs, ctx: ToolContext): Promise<string> {
  const { client } = ctx;
  const adom = adomArg(args, ctx);

  switch (name) {
    case 'list_sdwan_templates': {
      const templates = (await client.listSdwanTemplates(adom)).slice(0, optionalInteger(args, 'limit', 100));
      return toJson({ adom, count: templates.length, sdwan_templates: templates });
    }

    case 'get_sdwan_template': {
      const template = await client.getSdwanTemplate(adom, requireString(args, 'name'));
      return toJson({ sdwan_template: template });
    }

    case 'create_sdwan_template': {
      const templateName = requireString(args, 'name');
      const template: FmgRecord = { name: templateName, type: 'wanprof' };
      const description = optionalString(args, 'description');
      if (description) template.description = description;
      const result = await client.createSdwanTemplate(adom, template);
      return toJson({ success: true, message: `SD-WAN template '${templateName}' created`, result });
    }

    case 'delete_sdwan_template': {
      const templateName = requireString(args, 'name');
      const result = await client.deleteSdwanTemplate(adom, templateName);
      return toJson({ success: true, message: `SD-WAN template '${templateName}' deleted`, result });
    }

    case 'assign_sdwan_template': {
      const template = requireString(args, 'template');
      const scope = deviceScope(args);
      const result = await client.assignSdwanTemplate(adom, template, scope);
      return toJson({
        success: true,
        message: `SD-WAN template '${template}' assigned to device '${scope[0].name}'`,
        result,
      });
    }

    case 'assign_sdwan_template_bulk': {
      const template = requireString(args, 'template');
      const scope = requireScope(args, 'devices');
      const result = await client.assignSdwanTemplate(adom, template, scope);
      return toJson({
        success: true,
        message: `SD-WAN template '${template}' assigned to ${scope.length} devices`,
        result,
      });
    }

    case 'unassign_sdwan_template': {
      const template = requireString(args, 'template');
      const scope = deviceScope(args);
      const result = await client.unassignSdwanTemplate(adom, template, scope);
      return toJson({
        success: true,
        message: `SD-WAN template '${template}' unassigned from device '${scope[0].name}'`,
        result,
      });
    }

    default:
      throw new Error(`Unknown SD-WAN tool: ${name}`);
  }
}
