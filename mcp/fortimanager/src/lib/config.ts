/**
 * Server configuration from environment variables.
 *
 *   FORTIMANAGER_HOST         - FortiManager hostname/IP (auto-connect when set)
 *   FORTIMANAGER_PORT         - HTTPS port (default: 443)
 *   FORTIMANAGER_USERNAME     - Username for session login
 *   FORTIMANAGER_PASSWORD     - Password for session login
 *   FORTIMANAGER_API_TOKEN    - API token (preferred over username/password)
 *   FORTIMANAGER_VERIFY_SSL   - Verify TLS certificates (default: false)
 *   FORTIMANAGER_TIMEOUT      - Request timeout in seconds (default: 30)
 *   FORTIMANAGER_MAX_RETRIES  - Retries for connection failures (default: 3)
 *   FMG_TOOL_MODE             - "full" or "dynamic" (default: full)
 *   FMG_ALLOWED_OUTPUT_DIRS   - Comma-separated export directories
 *   DEFAULT_ADOM              - ADOM used when a tool omits it (default: root)
 *   LOG_LEVEL / LOG_FILE      - Logging
 *   HTTP_PORT                 - Serve HTTP/SSE instead of stdio
 */

import { log, parseLogLevel, type LogLevel } from './logger.js';

export type ToolMode = 'full' | 'dynamic';

export interface ServerConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  apiToken: string;
  verifySsl: boolean;
  timeout: number;
  maxRetries: number;
  toolMode: ToolMode;
  allowedOutputDirs: string;
  defaultAdom: string;
  logLevel: LogLevel;
  logFile?: string;
  httpPort?: number;
}

type Env = Record<string, string | undefined>;

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    log.warn(`Ignoring non-integer ${name}`, { value, fallback });
    return fallback;
  }
  return parsed;
}

function parseToolMode(value: string | undefined): ToolMode {
  const mode = (value || 'full').trim().toLowerCase();
  if (mode === 'full' || mode === 'dynamic') return mode;
  log.warn('Unknown FMG_TOOL_MODE, using full', { value });
  return 'full';
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const httpPort = env.HTTP_PORT ? parseInteger('HTTP_PORT', env.HTTP_PORT, 0) : 0;

  return {
    host: (env.FORTIMANAGER_HOST || '').trim(),
    port: parseInteger('FORTIMANAGER_PORT', env.FORTIMANAGER_PORT, 443),
    username: env.FORTIMANAGER_USERNAME || '',
    password: env.FORTIMANAGER_PASSWORD || '',
    apiToken: env.FORTIMANAGER_API_TOKEN || '',
    verifySsl: parseBoolean(env.FORTIMANAGER_VERIFY_SSL, false),
    timeout: parseInteger('FORTIMANAGER_TIMEOUT', env.FORTIMANAGER_TIMEOUT, 30),
    maxRetries: parseInteger('FORTIMANAGER_MAX_RETRIES', env.FORTIMANAGER_MAX_RETRIES, 3),
    toolMode: parseToolMode(env.FMG_TOOL_MODE),
    allowedOutputDirs: env.FMG_ALLOWED_OUTPUT_DIRS || '',
    defaultAdom: (env.DEFAULT_ADOM || 'root').trim() || 'root',
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFile: env.LOG_FILE || undefined,
    httpPort: httpPort > 0 ? httpPort : undefined,
  };
}
