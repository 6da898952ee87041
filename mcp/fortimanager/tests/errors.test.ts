import { describe, it, expect } from 'vitest';
import {
  ADOMLockError,
  APIError,
  AuthenticationError,
  FmgError,
  FmgTimeoutError,
  ObjectError,
  PermissionError,
  ResourceNotFoundError,
  ValidationError,
  errorMessage,
  isAuthError,
  isDuplicateError,
  isObjectInUseError,
  isPermissionError,
  parseFmgError,
} from '../src/lib/errors.js';

describe('parseFmgError', () => {
  it('maps known codes to error classes', () => {
    expect(parseFmgError(-2, '')).toBeInstanceOf(AuthenticationError);
    expect(parseFmgError(-3, '')).toBeInstanceOf(PermissionError);
    expect(parseFmgError(-4, '')).toBeInstanceOf(ResourceNotFoundError);
    expect(parseFmgError(-5, '')).toBeInstanceOf(ValidationError);
    expect(parseFmgError(-6, '')).toBeInstanceOf(ObjectError);
    expect(parseFmgError(-8, '')).toBeInstanceOf(ADOMLockError);
    expect(parseFmgError(-11, '')).toBeInstanceOf(FmgTimeoutError);
    expect(parseFmgError(-20, '')).toBeInstanceOf(AuthenticationError);
  });

  it('uses the table message when the appliance adds nothing', () => {
    const error = parseFmgError(-4, '');
    expect(error.message).toBe('Requested resource not found');
    expect(error.code).toBe(-4);
  });

  it('appends the appliance message and endpoint', () => {
    const error = parseFmgError(-4, 'Object does not exist', '/pm/config/adom/root/obj/firewall/address/web');
    expect(error.message).toBe(
      'Requested resource not found: Object does not exist (endpoint: /pm/config/adom/root/obj/firewall/address/web)'
    );
  });

  it('does not repeat a message identical to the table entry', () => {
    expect(parseFmgError(-6, 'Object already exists').message).toBe('Object already exists');
  });

  it('falls back to APIError with the raw message for unknown codes', () => {
    const error = parseFmgError(-10147, 'datasrc invalid');
    expect(error).toBeInstanceOf(APIError);
    expect(error.message).toBe('datasrc invalid');
    expect(error.code).toBe(-10147);
  });

  it('names timeout errors TimeoutError', () => {
    expect(parseFmgError(-11, '').name).toBe('TimeoutError');
  });
});

describe('error predicates', () => {
  it('detects in-use deletes by code or message', () => {
    expect(isObjectInUseError(new FmgError('x', -7))).toBe(true);
    expect(isObjectInUseError(new ObjectError('address is referenced by policy 3'))).toBe(true);
    expect(isObjectInUseError(new ObjectError('Object already exists', -6))).toBe(false);
    expect(isObjectInUseError(new Error('in use'))).toBe(false);
  });

  it('detects duplicates by code or message', () => {
    expect(isDuplicateError(new FmgError('x', -6))).toBe(true);
    expect(isDuplicateError(new ObjectError('duplicate entry'))).toBe(true);
    expect(isDuplicateError(new APIError('duplicate entry'))).toBe(false);
  });

  it('detects permission and auth failures', () => {
    expect(isPermissionError(new APIError('x', -3))).toBe(true);
    expect(isPermissionError(new PermissionError('denied'))).toBe(true);
    expect(isAuthError(new APIError('x', -21))).toBe(true);
    expect(isAuthError(new AuthenticationError('bad login'))).toBe(true);
    expect(isAuthError(new APIError('x', -3))).toBe(false);
  });

  it('errorMessage handles non-Error values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
