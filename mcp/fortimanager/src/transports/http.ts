/**
 * HTTP/SSE Transport for the FortiManager MCP Server
 *
 * Uses the MCP SDK's SSEServerTransport to expose the server over HTTP.
 * - GET /sse - Establish SSE connection (server -> client messages)
 * - POST /message?sessionId=xxx - Send messages to server
 * - POST /api/call - Synchronous tool call endpoint (for testing/CLI usage)
 */

import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'node:http';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { errorMessage } from '../lib/errors.js';
import { isRecord } from '../lib/fmg-client.js';
import { log } from '../lib/logger.js';

export type ToolHandler = (name: string, args: Record<string, unknown>) => Promise<string>;

/** Deep health check; `reachable` is true when /sys/status answers */
export type ConnectionChecker = () => Promise<{ reachable: boolean; host?: string; error?: string }>;

export type ShutdownHandler = (reason: string) => Promise<void>;

export interface HttpTransportOptions {
  port: number;
  /** Builds a fresh MCP server for each SSE session */
  serverFactory: () => Server;
  toolHandler: ToolHandler;
  connectionChecker: ConnectionChecker;
  onShutdown?: ShutdownHandler;
}

async function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk) => (body += chunk));
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

export function startHttpTransport(options: HttpTransportOptions): HttpServer {
  const { port, serverFactory, toolHandler, connectionChecker, onShutdown } = options;
  const sessions = new Map<string, SSEServerTransport>();

  const httpServer = createServer((req: IncomingMessage, res: ServerResponse) => {
    handleRequest(req, res).catch((error: unknown) => {
      log.error('HTTP request failed', { path: req.url, error: errorMessage(error) });
      if (!res.headersSent) {
        sendJson(res, 500, { error: errorMessage(error) });
      }
    });
  });

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    // CORS headers for local development
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    // GET /sse - Establish SSE connection
    if (req.method === 'GET' && url.pathname === '/sse') {
      log.info('New SSE connection', { remote: req.socket.remoteAddress });

      const transport = new SSEServerTransport('/message', res);
      sessions.set(transport.sessionId, transport);

      transport.onclose = () => {
        log.info('SSE session closed', { sessionId: transport.sessionId });
        sessions.delete(transport.sessionId);
      };

      await serverFactory().connect(transport);
      return;
    }

    // POST /message?sessionId=xxx - Handle incoming messages
    if (req.method === 'POST' && url.pathname === '/message') {
      const sessionId = url.searchParams.get('sessionId');
      if (!sessionId) {
        sendJson(res, 400, { error: 'Missing sessionId parameter' });
        return;
      }

      const transport = sessions.get(sessionId);
      if (!transport) {
        sendJson(res, 404, { error: 'Session not found' });
        return;
      }

      await transport.handlePostMessage(req, res);
      return;
    }

    // POST /api/call - Synchronous tool call (for testing/CLI without SSE)
    if (req.method === 'POST' && url.pathname === '/api/call') {
      try {
        const body: unknown = JSON.parse(await readBody(req));
        const tool = isRecord(body) ? body.tool : undefined;
        if (typeof tool !== 'string' || tool === '') {
          sendJson(res, 400, { error: 'Missing "tool" field in request body' });
          return;
        }
        const args = isRecord(body) && isRecord(body.args) ? body.args : {};

        log.info('API call', { tool });
        const result = await toolHandler(tool, args);
        sendJson(res, 200, { result });
      } catch (error) {
        log.error('API call error', { error: errorMessage(error) });
        sendJson(res, 500, { error: errorMessage(error) });
      }
      return;
    }

    // GET /health - MCP server only
    if (req.method === 'GET' && url.pathname === '/health') {
      sendJson(res, 200, { status: 'ok', sessions: sessions.size, transport: 'sse' });
      return;
    }

    // GET /check - Deep health check (tests FortiManager connectivity)
    if (req.method === 'GET' && url.pathname === '/check') {
      try {
        const connectivity = await connectionChecker();
        sendJson(res, connectivity.reachable ? 200 : 503, {
          status: connectivity.reachable ? 'ok' : 'degraded',
          fortimanager: {
            host: connectivity.host,
            jsonrpc: connectivity.reachable ? 'ok' : 'unreachable',
            error: connectivity.error,
          },
          sessions: sessions.size,
        });
      } catch (error) {
        sendJson(res, 500, { status: 'error', error: errorMessage(error) });
      }
      return;
    }

    // POST /shutdown - Graceful shutdown (for development/testing)
    if (req.method === 'POST' && url.pathname === '/shutdown') {
      sendJson(res, 200, { status: 'shutting down' });
      log.info('Shutdown requested, closing server');
      if (onShutdown) {
        await onShutdown('http_shutdown');
      }
      for (const transport of sessions.values()) {
        await transport.close();
      }
      sessions.clear();
      httpServer.close(() => {
        log.info('HTTP server closed');
        process.exit(0);
      });
      return;
    }

    // GET / - Usage info
    if (req.method === 'GET' && url.pathname === '/') {
      sendJson(res, 200, {
        name: 'fortimanager-mcp',
        transport: 'sse',
        endpoints: {
          '/sse': 'GET - Establish SSE connection',
          '/message?sessionId=xxx': 'POST - Send JSON-RPC message',
          '/api/call': 'POST - Synchronous tool call (body: {"tool": "name", "args": {...}})',
          '/health': 'GET - Quick health check (MCP server only)',
          '/check': 'GET - Deep health check (calls FortiManager /sys/status)',
          '/shutdown': 'POST - Graceful shutdown',
        },
      });
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  }

  httpServer.listen(port, () => {
    log.info('FortiManager MCP server (HTTP/SSE) listening', { port });
  });

  return httpServer;
}
