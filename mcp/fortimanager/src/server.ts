/**
 * FortiManager MCP server: tool catalog, routing and MCP request handlers.
 *
 * index.ts owns process concerns (environment, transports, signals); this
 * module builds the server so it can be driven directly from tests.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema, type Tool } from '@modelcontextprotocol/sdk/types.js';
import type { TelemetryClient } from '@fmg-mcp/telemetry';

import type { ToolArgs } from './lib/args.js';
import type { ServerConfig } from './lib/config.js';
import { ConnectionError, errorMessage } from './lib/errors.js';
import type { FmgClient } from './lib/fmg-client.js';
import { log, logToolCall } from './lib/logger.js';
import { TaskProgressReporter } from './lib/progress.js';
import { redactArgs } from './lib/sanitize.js';
import type { ToolContext } from './tools/context.js';

import { connectionTools, handleConnectionTool } from './tools/connection.js';
import { discoveryTools, handleDiscoveryTool, type CatalogEntry } from './tools/discovery.js';
import { systemTools, handleSystemTool } from './tools/system.js';
import { deviceTools, handleDeviceTool } from './tools/devices.js';
import { policyTools, handlePolicyTool } from './tools/policy.js';
import { objectTools, handleObjectTool } from './tools/objects.js';
import { scriptTools, handleScriptTool } from './tools/scripts.js';
import { templateTools, handleTemplateTool } from './tools/templates.js';
import { sdwanTools, handleSdwanTool } from './tools/sdwan.js';

export const SERVER_NAME = 'fortimanager-mcp';
export const SERVER_VERSION = '0.1.0';

export type { ServerConfig } from './lib/config.js';
export { loadConfig } from './lib/config.js';
export { FmgClient } from './lib/fmg-client.js';
export { waitForTask } from './lib/task-poller.js';

type ToolHandler = (name: string, args: ToolArgs, ctx: ToolContext) => Promise<string>;

/** Catalog categories that need a live client */
const catalog: Record<string, { tools: Tool[]; handler: ToolHandler }> = {
  system: { tools: systemTools, handler: handleSystemTool },
  devices: { tools: deviceTools, handler: handleDeviceTool },
  policy: { tools: policyTools, handler: handlePolicyTool },
  objects: { tools: objectTools, handler: handleObjectTool },
  scripts: { tools: scriptTools, handler: handleScriptTool },
  templates: { tools: templateTools, handler: handleTemplateTool },
  sdwan: { tools: sdwanTools, handler: handleSdwanTool },
};

// Tool name to category mapping
const toolCategories: Record<string, string> = {};
connectionTools.forEach((t) => (toolCategories[t.name] = 'connection'));
discoveryTools.forEach((t) => (toolCategories[t.name] = 'discovery'));
for (const [category, { tools }] of Object.entries(catalog)) {
  tools.forEach((t) => (toolCategories[t.name] = category));
}

const catalogEntries: CatalogEntry[] = Object.entries(catalog).flatMap(([category, { tools }]) =>
  tools.map((tool) => ({ tool, category }))
);

/** Tools advertised by tools/list in the given mode */
export function listTools(mode: ServerConfig['toolMode']): Tool[] {
  if (mode === 'dynamic') {
    const waitForTaskTool = systemTools.filter((t) => t.name === 'wait_for_task');
    return [...connectionTools, ...discoveryTools, ...waitForTaskTool];
  }
  return [...connectionTools, ...catalogEntries.map((entry) => entry.tool)];
}

export function toolCategory(name: string): string | undefined {
  return toolCategories[name];
}

export interface ServerOptions {
  config: ServerConfig;
  client?: FmgClient | null;
  telemetry?: TelemetryClient;
}

export interface CallOptions {
  reportProgress?: TaskProgressReporter;
}

export interface FmgMcpServer {
  /** Build an MCP Server bound to this tool set (one per transport session) */
  createMcpServer(): Server;
  handleToolCall(name: string, args: ToolArgs, options?: CallOptions): Promise<string>;
  getClient(): FmgClient | null;
  setClient(client: FmgClient | null): void;
}

export function createServer(options: ServerOptions): FmgMcpServer {
  const { config, telemetry } = options;
  let fmgClient: FmgClient | null = options.client ?? null;

  function setClient(client: FmgClient | null): void {
    fmgClient = client;
  }

  function requireClient(): FmgClient {
    if (!fmgClient || !fmgClient.isConnected()) {
      throw new ConnectionError('Not connected to FortiManager. Use the connect tool or set FORTIMANAGER_HOST.');
    }
    return fmgClient;
  }

  async function handleToolCallImpl(name: string, args: ToolArgs, callOptions: CallOptions): Promise<string> {
    const category = toolCategories[name];

    // Connection tools work without an existing connection
    if (category === 'connection') {
      return handleConnectionTool(name, args, fmgClient, config, setClient);
    }

    if (category === 'discovery') {
      return handleDiscoveryTool(name, args, catalogEntries, (tool, toolArgs) =>
        handleToolCallImpl(tool, toolArgs, callOptions)
      );
    }

    const entry = category ? catalog[category] : undefined;
    if (!entry) {
      throw new Error(`Unknown tool: ${name}`);
    }

    const ctx: ToolContext = {
      client: requireClient(),
      config,
      reportProgress: callOptions.reportProgress,
      taskWaits: telemetry,
    };
    return entry.handler(name, args, ctx);
  }

  async function handleToolCall(name: string, args: ToolArgs, callOptions: CallOptions = {}): Promise<string> {
    const startTime = Date.now();
    log.info(`Tool call started: ${name}`, { tool: name, args: redactArgs(args) });

    try {
      const result = await handleToolCallImpl(name, args, callOptions);
      const durationMs = Date.now() - startTime;
      logToolCall(name, args, { success: true }, durationMs);
      telemetry?.recordToolCall({ tool: name, category: toolCategories[name], durationMs, success: true });
      return result;
    } catch (error) {
      const durationMs = Date.now() - startTime;
      logToolCall(name, args, { success: false, error: errorMessage(error) }, durationMs);
      telemetry?.recordToolCall({ tool: name, category: toolCategories[name], durationMs, success: false, error });
      throw error;
    }
  }

  function createMcpServer(): Server {
    const server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: listTools(config.toolMode),
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const { name, arguments: args } = request.params;
      const progressToken = request.params._meta?.progressToken;
      const reportProgress =
        progressToken !== undefined
          ? new TaskProgressReporter(name, progressToken, extra.sendNotification)
          : undefined;

      try {
        const result = await handleToolCall(name, args ?? {}, { reportProgress });
        return {
          content: [{ type: 'text', text: result }],
        };
      } catch (error) {
        return {
          content: [{ type: 'text', text: `Error: ${errorMessage(error)}` }],
          isError: true,
        };
      }
    });

    return server;
  }

  return {
    createMcpServer,
    handleToolCall,
    getClient: () => fmgClient,
    setClient,
  };
}
