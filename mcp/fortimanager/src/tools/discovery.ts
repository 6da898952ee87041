/**
 * Discovery Tools (dynamic tool mode)
 *
 * With FMG_TOOL_MODE=dynamic, tools/list advertises only a handful of
 * tools. The rest of the catalog is reached through find_tools,
 * describe_tool and execute_tool, so the client loads schemas on demand.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { optionalRecord, optionalString, requireString, type ToolArgs } from '../lib/args.js';
import { ValidationError } from '../lib/errors.js';
import { toJson } from './context.js';

export interface CatalogEntry {
  tool: Tool;
  category: string;
}

export type ToolExecutor = (name: string, args: ToolArgs) => Promise<string>;

export const discoveryTools: Tool[] = [
  {
    name: 'find_tools',
    description: `Search the FortiManager tool catalog.

Matches the query against tool names and descriptions. Returns each
match's name, category and one-line summary.

Use for:
- Finding the right tool before calling describe_tool / execute_tool

Categories: system, devices, policy, objects, scripts, templates, sdwan`,
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Words to look for, e.g. "address group"' },
        category: { type: 'string', description: 'Limit to one category' },
      },
    },
  },
  {
    name: 'describe_tool',
    description: `Get the full description and input schema of a catalog tool.`,
    inputSchema: {
      type: 'object',
      properties: { name: { type: 'string', description: 'Tool name from find_tools' } },
      required: ['name'],
    },
  },
  {
    name: 'execute_tool',
    description: `Run any catalog tool by name.

Related tools:
- describe_tool: Check the arguments first`,
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Tool name' },
        arguments: { type: 'object', description: 'Tool arguments' },
      },
      required: ['name'],
    },
  },
];

function summary(tool: Tool): string {
  return (tool.description ?? '').split('\n')[0].trim();
}

function matches(entry: CatalogEntry, words: string[]): boolean {
  const haystack = `${entry.tool.name.replace(/_/g, ' ')} ${entry.tool.description ?? ''}`.toLowerCase();
  return words.every((word) => haystack.includes(word));
}

function lookup(catalog: CatalogEntry[], name: string): CatalogEntry {
  const entry = catalog.find((candidate) => candidate.tool.name === name);
  if (!entry) {
    throw new ValidationError(`Unknown tool: ${name}. Use find_tools to search the catalog.`);
  }
  return entry;
}

export async function handleDiscoveryTool(
  name: string,
  args: ToolArgs,
  catalog: CatalogEntry[],
  execute: ToolExecutor
): Promise<string> {
  switch (name) {
    case 'find_tools': {
      const query = optionalString(args, 'query', '').toLowerCase();
      const category = optionalString(args, 'category')?.toLowerCase();
      const words = query.split(/\s+/).filter((word) => word !== '');
      const found = catalog
        .filter((entry) => !category || entry.category === category)
        .filter((entry) => matches(entry, words))
        .map((entry) => ({ name: entry.tool.name, category: entry.category, summary: summary(entry.tool) }));
      return toJson({ count: found.length, tools: found });
    }

    case 'describe_tool': {
      const entry = lookup(catalog, requireString(args, 'name'));
      return toJson({
        name: entry.tool.name,
        category: entry.category,
        description: entry.tool.description,
        inputSchema: entry.tool.inputSchema,
      });
    }

    case 'execute_tool': {
      const entry = lookup(catalog, requireString(args, 'name'));
      return execute(entry.tool.name, optionalRecord(args, 'arguments') ?? {});
    }

    default:
      throw new Error(`Unknown discovery tool: ${name}`);
  }
}
