/**
 * Connection Tools
 *
 * Tools for connecting to a FortiManager and checking reachability.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { optionalBoolean, optionalInteger, optionalString, requireString, type ToolArgs } from '../lib/args.js';
import type { ServerConfig } from '../lib/config.js';
import { errorMessage } from '../lib/errors.js';
import { FmgClient } from '../lib/fmg-client.js';
import { toJson } from './context.js';

export const connectionTools: Tool[] = [
  {
    name: 'connect',
    description: `Connect to a FortiManager and establish a JSON-RPC session.

This is the FIRST tool to use when no connection exists. It:
- Authenticates with an API token, or logs in with username/password
- Reads system status to confirm the appliance answers

If FORTIMANAGER_HOST and credentials are set in the environment the
server connects at start-up; this tool is only needed to switch
appliances or reconnect.

Returns: hostname, version, serial number, ADOM mode.

Related tools:
- check_connection: Verify connectivity and latency
- disconnect: Log out when done`,
    inputSchema: {
      type: 'object',
      properties: {
        host: { type: 'string', description: 'FortiManager hostname or IP address' },
        username: { type: 'string', description: 'Username for session login' },
        password: { type: 'string', description: 'Password for session login' },
        api_token: { type: 'string', description: 'API token (used instead of username/password)' },
        port: { type: 'number', description: 'HTTPS port (default: 443)' },
        verify_ssl: { type: 'boolean', description: 'Verify the TLS certificate (default: false)' },
      },
      required: ['host'],
    },
  },
  {
    name: 'disconnect',
    description: `Log out of the current FortiManager and drop the client.

Related tools:
- connect: Establish a new connection`,
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'check_connection',
    description: `Test connectivity to the FortiManager and measure latency.

Use for:
- Quick health check before a batch of changes
- Confirming the session is still valid

Does NOT establish a new session.

Related tools:
- connect: Establish connection if not connected
- get_system_status: Full appliance details`,
    inputSchema: { type: 'object', properties: {} },
  },
];

export async function handleConnectionTool(
  name: string,
  args: ToolArgs,
  client: FmgClient | null,
  config: ServerConfig,
  setClient: (client: FmgClient | null) => void
): Promise<string> {
  switch (name) {
    case 'connect': {
      const newClient = new FmgClient({
        host: requireString(args, 'host'),
        port: optionalInteger(args, 'port', 443),
        username: optionalString(args, 'username'),
        password: optionalString(args, 'password'),
        apiToken: optionalString(args, 'api_token'),
        verifySsl: optionalBoolean(args, 'verify_ssl', false),
        timeout: config.timeout,
        maxRetries: config.maxRetries,
      });

      const status = await newClient.connect();
      if (client?.isConnected()) {
        await client.disconnect();
      }
      setClient(newClient);

      return toJson({
        success: true,
        message: `Connected to FortiManager at ${newClient.host}`,
        auth: newClient.authMode,
        system: status,
      });
    }

    case 'disconnect': {
      if (client?.isConnected()) {
        await client.disconnect();
      }
      setClient(null);
      return toJson({ success: true, message: 'Disconnected from FortiManager' });
    }

    case 'check_connection': {
      if (!client) {
        return toJson({ status: 'disconnected', connected: false });
      }
      const startTime = Date.now();
      try {
        const status = await client.getSystemStatus();
        return toJson({
          status: 'ok',
          connected: true,
          latencyMs: Date.now() - startTime,
          host: client.host,
          hostname: status.Hostname,
          version: status.Version,
        });
      } catch (error) {
        return toJson({
          status: 'unreachable',
          connected: false,
          latencyMs: Date.now() - startTime,
          error: errorMessage(error),
        });
      }
    }

    default:
      throw new Error(`Unknown connection tool: ${name}`);
  }
}
