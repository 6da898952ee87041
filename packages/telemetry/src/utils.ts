/**
 * Telemetry Utilities
 */

import type { EventProperties, PropertyValue } from './types.js';

// ============================================================================
// Error classification
// ============================================================================

/**
 * FortiManager JSON-RPC status codes by telemetry category.
 * Errors raised from an API response carry the code as `error.code`.
 */
const STATUS_CODE_CATEGORIES: ReadonlyMap<number, string> = new Map([
  [-2, 'AuthError'],
  [-20, 'AuthError'],
  [-21, 'AuthError'],
  [-3, 'PermissionError'],
  [-4, 'NotFoundError'],
  [-5, 'ValidationError'],
  [-6, 'ConflictError'],
  [-7, 'ConflictError'],
  [-8, 'LockError'],
  [-9, 'LockError'],
  [-11, 'TimeoutError'],
]);

/** Error class names raised by the server and by fetch */
const ERROR_NAME_CATEGORIES: ReadonlyMap<string, string> = new Map([
  ['FetchError', 'NetworkError'],
  ['AbortError', 'NetworkError'],
  ['ConnectionError', 'NetworkError'],
  ['AuthenticationError', 'AuthError'],
  ['PermissionError', 'PermissionError'],
  ['ResourceNotFoundError', 'NotFoundError'],
  ['ADOMLockError', 'LockError'],
  ['ValidationError', 'ValidationError'],
  ['TypeError', 'ValidationError'],
  ['TimeoutError', 'TimeoutError'],
]);

/** Checked in order against the lower-cased message */
const MESSAGE_CATEGORIES: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['NetworkError', ['econnrefused', 'etimedout', 'enotfound', 'enetunreach', 'socket hang up']],
  ['AuthError', ['401', '403', 'authentication', 'unauthorized', 'invalid credentials']],
  ['ValidationError', ['invalid', 'required', 'must be']],
  ['ApiError', ['400', '404', '422']],
  ['ServerError', ['500', '502', '503', '504']],
  ['TimeoutError', ['timeout', 'timed out']],
];

function statusCodeOf(error: Error): number | undefined {
  const code: unknown = 'code' in error ? error.code : undefined;
  return typeof code === 'number' ? code : undefined;
}

/**
 * Classify an error into a category for telemetry.
 * Returns a generic category, never the message.
 */
export function classifyError(error: unknown): string {
  if (!(error instanceof Error)) {
    return 'UnknownError';
  }

  const code = statusCodeOf(error);
  const byCode = code === undefined ? undefined : STATUS_CODE_CATEGORIES.get(code);
  if (byCode) return byCode;

  const byName = ERROR_NAME_CATEGORIES.get(error.name);
  if (byName) return byName;

  const msg = error.message.toLowerCase();
  for (const [category, needles] of MESSAGE_CATEGORIES) {
    if (needles.some((needle) => msg.includes(needle))) {
      return category;
    }
  }

  return error.name || 'Error';
}

// ============================================================================
// Event properties
// ============================================================================

/**
 * Keys that may be sent with lifecycle events. Hosts, ports, ADOMs,
 * device names and anything else about the managed estate are dropped.
 */
export const SAFE_PROPERTY_KEYS: ReadonlySet<string> = new Set([
  'transport',
  'toolMode',
  'authMode',
  'reason',
  'context',
  'error_type',
]);

const SAFE_STRING = /^[A-Za-z0-9_.-]{1,40}$/;

function safeValue(value: unknown): PropertyValue | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string') return SAFE_STRING.test(value) ? value : undefined;
  return undefined;
}

/** Keep allow-listed keys whose values are short identifiers, numbers or booleans */
export function scrubProperties(properties: Record<string, unknown> = {}): EventProperties {
  const scrubbed: EventProperties = {};
  for (const [key, value] of Object.entries(properties)) {
    if (!SAFE_PROPERTY_KEYS.has(key)) continue;
    const safe = safeValue(value);
    if (safe !== undefined) scrubbed[key] = safe;
  }
  return scrubbed;
}

// ============================================================================
// Process hooks and environment
// ============================================================================

interface ErrorCapture {
  captureError(error: unknown, context?: string): void;
}

/**
 * Report uncaughtException and unhandledRejection. An uncaught exception
 * still ends the process, one second later so the error can be sent.
 */
export function setupGlobalErrorHandlers(telemetry: ErrorCapture): void {
  process.on('uncaughtException', (error) => {
    console.error('[telemetry] Uncaught exception:', error.name, error.message);
    telemetry.captureError(error, 'uncaughtException');
    setTimeout(() => process.exit(1), 1000);
  });

  process.on('unhandledRejection', (reason) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    console.error('[telemetry] Unhandled rejection:', error.name, error.message);
    telemetry.captureError(error, 'unhandledRejection');
  });
}

/** FMG_TELEMETRY_ENABLED=false, DO_NOT_TRACK=1 and CI=true each turn telemetry off */
export function isTelemetryEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.FMG_TELEMETRY_ENABLED === 'false') return false;
  if (env.DO_NOT_TRACK === '1') return false;
  if (env.CI === 'true') return false;
  return true;
}

export function isDebugEnabled(): boolean {
  return process.env.FMG_DEBUG_TELEMETRY === 'true';
}

/**
 * Debug log helper. Writes to stderr; stdout carries MCP frames.
 */
export function debugLog(message: string, data?: unknown): void {
  if (!isDebugEnabled()) return;
  if (data !== undefined) {
    console.error(`[telemetry] ${message}`, data);
  } else {
    console.error(`[telemetry] ${message}`);
  }
}
