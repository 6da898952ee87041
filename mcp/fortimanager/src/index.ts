#!/usr/bin/env node
/**
 * FortiManager MCP Server
 *
 * Exposes FortiManager's JSON-RPC API (ADOMs, devices, policy packages,
 * objects, scripts, templates, SD-WAN) as MCP tools. Configuration comes
 * from the environment; see lib/config.ts for the full list.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { TelemetryClient, setupGlobalErrorHandlers } from '@fmg-mcp/telemetry';

import { loadConfig } from './lib/config.js';
import { errorMessage } from './lib/errors.js';
import { FmgClient } from './lib/fmg-client.js';
import { configureLogger, log } from './lib/logger.js';
import { createServer, SERVER_NAME, SERVER_VERSION } from './server.js';

const config = loadConfig();
configureLogger({ level: config.logLevel, file: config.logFile });

const telemetry = new TelemetryClient(SERVER_NAME, SERVER_VERSION);
setupGlobalErrorHandlers(telemetry);

const app = createServer({ config, telemetry });

/**
 * Connect from FORTIMANAGER_* variables when a host is configured.
 * A failure leaves the server running without a client.
 */
async function initClientFromEnv(): Promise<void> {
  if (!config.host) return;

  log.info('Initializing FortiManager client from environment variables', { host: config.host });
  try {
    const client = new FmgClient({
      host: config.host,
      port: config.port,
      username: config.username || undefined,
      password: config.password || undefined,
      apiToken: config.apiToken || undefined,
      verifySsl: config.verifySsl,
      timeout: config.timeout,
      maxRetries: config.maxRetries,
    });
    await client.connect();
    app.setClient(client);
    log.info('Connected to FortiManager from environment config');
  } catch (error) {
    log.warn('Failed to connect from environment config', { error: errorMessage(error) });
    app.setClient(null);
  }
}

async function checkFortiManagerConnection(): Promise<{ reachable: boolean; host?: string; error?: string }> {
  const client = app.getClient();
  if (!client || !client.isConnected()) {
    return { reachable: false, error: 'Not connected' };
  }
  try {
    await client.getSystemStatus();
    return { reachable: true, host: client.host };
  } catch (error) {
    return { reachable: false, host: client.host, error: errorMessage(error) };
  }
}

async function shutdown(reason: string): Promise<void> {
  log.info('Shutting down', { reason });
  telemetry.lifecycle('shutdown', { reason });
  await telemetry.flush();
  const client = app.getClient();
  if (client?.isConnected()) {
    await client.disconnect();
  }
}

async function main(): Promise<void> {
  await initClientFromEnv();

  if (config.httpPort) {
    log.info('Starting HTTP transport', { port: config.httpPort });
    const { startHttpTransport } = await import('./transports/http.js');
    startHttpTransport({
      port: config.httpPort,
      serverFactory: app.createMcpServer,
      toolHandler: (name, args) => app.handleToolCall(name, args),
      connectionChecker: checkFortiManagerConnection,
      onShutdown: shutdown,
    });
    telemetry.lifecycle('startup', { transport: 'http', toolMode: config.toolMode });
  } else {
    log.debug('Initializing stdio transport');
    const server = app.createMcpServer();
    const transport = new StdioServerTransport();

    log.debug('Connecting server to transport');
    await server.connect(transport);
    log.info('FortiManager MCP server started (stdio)', { pid: process.pid, toolMode: config.toolMode });
    telemetry.lifecycle('startup', { transport: 'stdio', toolMode: config.toolMode });
  }
}

function onSignal(signal: NodeJS.Signals): void {
  shutdown(signal)
    .catch((error: unknown) => log.error('Shutdown failed', { error: errorMessage(error) }))
    .finally(() => process.exit(0));
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

main().catch((error: unknown) => {
  log.error('Fatal error', { error: errorMessage(error) });
  process.exit(1);
});
