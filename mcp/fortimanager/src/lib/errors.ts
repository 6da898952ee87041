/**
 * FortiManager Error Types
 *
 * Every failure raised by the client or the tool handlers is an FmgError
 * subclass. API status codes are mapped to a subclass by parseFmgError().
 */

export class FmgError extends Error {
  readonly code?: number;

  constructor(message: string, code?: number) {
    super(message);
    this.name = 'FmgError';
    this.code = code;
  }
}

/** Bad credentials, expired session or token */
export class AuthenticationError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'AuthenticationError';
  }
}

/** Appliance unreachable, TLS failure, or no client configured */
export class ConnectionError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'ConnectionError';
  }
}

export class APIError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'APIError';
  }
}

export class ValidationError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'ValidationError';
  }
}

export class ResourceNotFoundError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'ResourceNotFoundError';
  }
}

export class PermissionError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'PermissionError';
  }
}

export class FmgTimeoutError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'TimeoutError';
  }
}

/** Workspace lock held elsewhere, or uncommitted changes pending */
export class ADOMLockError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'ADOMLockError';
  }
}

export class TaskError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'TaskError';
  }
}

export class PolicyError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'PolicyError';
  }
}

export class PackageError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'PackageError';
  }
}

/** Address/service objects: duplicates, in-use deletes, bad definitions */
export class ObjectError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'ObjectError';
  }
}

export class TemplateError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'TemplateError';
  }
}

export class ScriptError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'ScriptError';
  }
}

export class DeviceError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'DeviceError';
  }
}

export class InstallError extends FmgError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'InstallError';
  }
}

type FmgErrorClass = new (message: string, code?: number) => FmgError;

interface ErrorCodeEntry {
  errorClass: FmgErrorClass;
  message: string;
}

export const ERROR_CODE_MAP: ReadonlyMap<number, ErrorCodeEntry> = new Map([
  [-1, { errorClass: APIError, message: 'Internal server error occurred' }],
  [-2, { errorClass: AuthenticationError, message: 'Session is invalid or expired' }],
  [-3, { errorClass: PermissionError, message: 'Permission denied for this operation' }],
  [-4, { errorClass: ResourceNotFoundError, message: 'Requested resource not found' }],
  [-5, { errorClass: ValidationError, message: 'Invalid parameter value' }],
  [-6, { errorClass: ObjectError, message: 'Object already exists' }],
  [-7, { errorClass: ObjectError, message: 'Cannot delete object - it is still in use' }],
  [-8, { errorClass: ADOMLockError, message: 'ADOM is locked by another user' }],
  [-9, { errorClass: ADOMLockError, message: 'ADOM has uncommitted changes' }],
  [-10, { errorClass: APIError, message: 'API version mismatch' }],
  [-11, { errorClass: FmgTimeoutError, message: 'Operation timed out' }],
  [-20, { errorClass: AuthenticationError, message: 'Invalid username or password' }],
  [-21, { errorClass: AuthenticationError, message: 'Authentication token has expired' }],
]);

/**
 * Build the error for a non-zero JSON-RPC status code.
 *
 * The table message leads; the appliance's own message is appended when it
 * adds something. The endpoint URL, when known, closes the message.
 */
export function parseFmgError(code: number, message: string, url?: string): FmgError {
  const entry = ERROR_CODE_MAP.get(code);
  const ErrorClass = entry?.errorClass ?? APIError;
  const baseMsg = entry?.message ?? message;

  let errorMsg = message && message !== baseMsg ? `${baseMsg}: ${message}` : baseMsg;
  if (url) {
    errorMsg = `${errorMsg} (endpoint: ${url})`;
  }
  return new ErrorClass(errorMsg, code);
}

export function isObjectInUseError(error: unknown): boolean {
  if (error instanceof FmgError && error.code === -7) return true;
  if (error instanceof ObjectError) {
    const msg = error.message.toLowerCase();
    return msg.includes('in use') || msg.includes('referenced');
  }
  return false;
}

export function isDuplicateError(error: unknown): boolean {
  if (error instanceof FmgError && error.code === -6) return true;
  if (error instanceof ObjectError) {
    const msg = error.message.toLowerCase();
    return msg.includes('already exists') || msg.includes('duplicate');
  }
  return false;
}

export function isPermissionError(error: unknown): boolean {
  if (error instanceof FmgError && error.code === -3) return true;
  return error instanceof PermissionError;
}

export function isAuthError(error: unknown): boolean {
  if (error instanceof FmgError && error.code !== undefined && [-2, -20, -21].includes(error.code)) {
    return true;
  }
  return error instanceof AuthenticationError;
}

/** Message text for any thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
