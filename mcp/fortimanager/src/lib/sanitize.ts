/**
 * Credential masking for anything that ends up in a log line.
 */

const SENSITIVE_FIELDS = [
  'password',
  'passwd',
  'pass',
  'adm_pass',
  'adm_passwd',
  'api_token',
  'apikey',
  'token',
  'session',
  'sid',
  'authorization',
  'auth',
  'secret',
  'key',
  'credential',
];

export const MASK_VALUE = '***REDACTED***';

const MAX_DEPTH = 10;
const HEX_TOKEN = /^[a-fA-F0-9]+$/;

function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase().replace(/[- ]/g, '_');
  return SENSITIVE_FIELDS.some((field) => normalized.includes(field));
}

/**
 * Return a copy of `data` with credential-looking keys masked.
 *
 * Long hex strings are masked wherever they appear; they are almost always
 * session ids or tokens.
 */
export function sanitizeForLogging(data: unknown, depth = 0): unknown {
  if (depth > MAX_DEPTH) {
    return '<MAX_DEPTH>';
  }

  if (Array.isArray(data)) {
    return data.map((item) => sanitizeForLogging(item, depth + 1));
  }

  if (data !== null && typeof data === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      result[key] = isSensitiveKey(key) ? MASK_VALUE : sanitizeForLogging(value, depth + 1);
    }
    return result;
  }

  if (typeof data === 'string' && data.length > 20 && HEX_TOKEN.test(data)) {
    return MASK_VALUE;
  }

  return data;
}

/**
 * Tool arguments as they appear in the audit log: masked, with script
 * bodies shortened to their length.
 */
export function redactArgs(args: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args)) {
    if (key === 'content' && typeof value === 'string') {
      redacted[key] = `[${value.length} chars]`;
    } else if (isSensitiveKey(key)) {
      redacted[key] = MASK_VALUE;
    } else {
      redacted[key] = sanitizeForLogging(value, 1);
    }
  }
  return redacted;
}
