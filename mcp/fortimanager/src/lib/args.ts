/**
 * Typed readers for MCP tool arguments.
 *
 * Tool arguments arrive as untyped JSON. Each reader narrows one field and
 * throws ValidationError naming the argument when it is missing or has the
 * wrong shape.
 */

import { ValidationError } from './errors.js';
import { isRecord, type FmgRecord, type ScopeMember } from './fmg-client.js';

export type ToolArgs = Record<string, unknown>;

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

export function requireString(args: ToolArgs, key: string): string {
  const value = args[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`Missing required argument: ${key}`);
  }
  return value;
}

export function optionalString(args: ToolArgs, key: string): string | undefined;
export function optionalString(args: ToolArgs, key: string, fallback: string): string;
export function optionalString(args: ToolArgs, key: string, fallback?: string): string | undefined {
  const value = args[key];
  if (isBlank(value)) return fallback;
  if (typeof value !== 'string') {
    throw new ValidationError(`Argument ${key} must be a string`);
  }
  return value;
}

function toNumber(key: string, value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  // Some MCP clients send numbers as strings
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  throw new ValidationError(`Argument ${key} must be a number`);
}

export function optionalNumber(args: ToolArgs, key: string): number | undefined;
export function optionalNumber(args: ToolArgs, key: string, fallback: number): number;
export function optionalNumber(args: ToolArgs, key: string, fallback?: number): number | undefined {
  const value = args[key];
  if (isBlank(value)) return fallback;
  return toNumber(key, value);
}

export function requireInteger(args: ToolArgs, key: string): number {
  const value = args[key];
  if (isBlank(value)) {
    throw new ValidationError(`Missing required argument: ${key}`);
  }
  const parsed = toNumber(key, value);
  if (!Number.isInteger(parsed)) {
    throw new ValidationError(`Argument ${key} must be an integer`);
  }
  return parsed;
}

export function optionalInteger(args: ToolArgs, key: string): number | undefined;
export function optionalInteger(args: ToolArgs, key: string, fallback: number): number;
export function optionalInteger(args: ToolArgs, key: string, fallback?: number): number | undefined {
  if (isBlank(args[key])) return fallback;
  return requireInteger(args, key);
}

export function optionalBoolean(args: ToolArgs, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (isBlank(value)) return fallback;
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new ValidationError(`Argument ${key} must be a boolean`);
}

export function optionalStringArray(args: ToolArgs, key: string): string[] | undefined {
  const value = args[key];
  if (isBlank(value)) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError(`Argument ${key} must be an array of strings`);
  }
  return value;
}

export function requireStringArray(args: ToolArgs, key: string): string[] {
  const value = optionalStringArray(args, key);
  if (value === undefined) {
    throw new ValidationError(`Missing required argument: ${key}`);
  }
  return value;
}

export function requireIntegerArray(args: ToolArgs, key: string): number[] {
  const value = args[key];
  if (!Array.isArray(value)) {
    throw new ValidationError(`Argument ${key} must be an array of integers`);
  }
  return value.map((item, index) => requireInteger({ [`${key}[${index}]`]: item }, `${key}[${index}]`));
}

/**
 * Install / script / template scopes: `[{ name, vdom? }]`.
 * A plain string entry is shorthand for `{ name }`.
 */
export function requireScope(args: ToolArgs, key: string): ScopeMember[] {
  const value = args[key];
  if (!Array.isArray(value)) {
    throw new ValidationError(`Argument ${key} must be an array of devices`);
  }
  return value.map((item, index) => {
    if (typeof item === 'string' && item.trim() !== '') {
      return { name: item };
    }
    if (isRecord(item) && typeof item.name === 'string' && item.name.trim() !== '') {
      const member: ScopeMember = { name: item.name };
      if (typeof item.vdom === 'string' && item.vdom !== '') member.vdom = item.vdom;
      return member;
    }
    throw new ValidationError(`Argument ${key}[${index}] must have a name`);
  });
}

export function requireRecordArray(args: ToolArgs, key: string): FmgRecord[] {
  const value = args[key];
  if (!Array.isArray(value) || !value.every(isRecord)) {
    throw new ValidationError(`Argument ${key} must be an array of objects`);
  }
  return value;
}

export function optionalRecord(args: ToolArgs, key: string): FmgRecord | undefined {
  const value = args[key];
  if (isBlank(value)) return undefined;
  if (!isRecord(value)) {
    throw new ValidationError(`Argument ${key} must be an object`);
  }
  return value;
}
