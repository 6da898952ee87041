/**
 * Input validation for names, addresses and enumerated values sent to
 * FortiManager. Each validator returns the normalized value or throws
 * ValidationError.
 */

import { existsSync, lstatSync, realpathSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { ValidationError } from './errors.js';

const ADOM_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;
const DEVICE_NAME_PATTERN = /^[a-zA-Z0-9_.-]{1,64}$/;
const DEVICE_SERIAL_PATTERN = /^(FG|FM|FW|FA|FS|FD|FP|FC|FV)[A-Z0-9]{10,20}$/;
const OBJECT_NAME_PATTERN = /^[a-zA-Z0-9_. -]{1,79}$/;
const PACKAGE_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,35}$/;
const POLICY_NAME_PATTERN = /^[a-zA-Z0-9_. -]{1,35}$/;
const INTERFACE_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,35}$/;
const FQDN_PATTERN = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/;
const OCTET = '(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)';
const IPV4_PATTERN = new RegExp(`^(?:${OCTET}\\.){3}${OCTET}$`);
const IPV4_CIDR_PATTERN = new RegExp(`^(?:${OCTET}\\.){3}${OCTET}/(?:[0-9]|[1-2][0-9]|3[0-2])$`);
const PORT_RANGE_PATTERN = /^(\d{1,5}(-\d{1,5})?(\s+\d{1,5}(-\d{1,5})?)*)$/;
const FILENAME_PATTERN = /^[\w\-. ]+$/;

export const VALID_POLICY_ACTIONS = ['accept', 'deny', 'ipsec', 'ssl-vpn'] as const;
export const VALID_LOG_TRAFFIC_MODES = ['all', 'utm', 'disable'] as const;
export const VALID_STATUSES = ['enable', 'disable'] as const;
export const VALID_NGFW_MODES = ['profile-based', 'policy-based'] as const;
export const VALID_ADDRESS_TYPES = ['ipmask', 'fqdn', 'iprange', 'wildcard', 'geography', 'mac'] as const;
export const VALID_MOVE_POSITIONS = ['before', 'after'] as const;

export type PolicyAction = (typeof VALID_POLICY_ACTIONS)[number];
export type LogTrafficMode = (typeof VALID_LOG_TRAFFIC_MODES)[number];
export type EnableStatus = (typeof VALID_STATUSES)[number];
export type NgfwMode = (typeof VALID_NGFW_MODES)[number];
export type AddressType = (typeof VALID_ADDRESS_TYPES)[number];
export type MovePosition = (typeof VALID_MOVE_POSITIONS)[number];

function requireValue(value: string, label: string): string {
  if (!value || !value.trim()) {
    throw new ValidationError(`${label} cannot be empty`);
  }
  return value.trim();
}

function oneOf<T extends string>(
  value: string,
  allowed: readonly T[],
  label: string,
  plural: string
): T {
  const normalized = requireValue(value, label).toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (match === undefined) {
    throw new ValidationError(
      `Invalid ${label.toLowerCase()} '${normalized}'. Valid ${plural}: ${[...allowed].sort().join(', ')}`
    );
  }
  return match;
}

export function validateAdom(adom: string): string {
  const value = requireValue(adom, 'ADOM name');
  if (!ADOM_PATTERN.test(value)) {
    throw new ValidationError(
      `Invalid ADOM name '${value}'. Must be 1-64 characters, alphanumeric, underscore, or hyphen only.`
    );
  }
  return value;
}

/** Accepts plain names and the `device[vdom]` form */
export function validateDeviceName(device: string): string {
  const value = requireValue(device, 'Device name');

  const bracket = value.indexOf('[');
  if (bracket !== -1) {
    const baseName = value.slice(0, bracket);
    const vdom = value.slice(bracket + 1).replace(/\]+$/, '');
    if (!DEVICE_NAME_PATTERN.test(baseName)) {
      throw new ValidationError(`Invalid device name '${baseName}'`);
    }
    if (!ADOM_PATTERN.test(vdom)) {
      throw new ValidationError(`Invalid VDOM name '${vdom}'`);
    }
    return value;
  }

  if (!DEVICE_NAME_PATTERN.test(value)) {
    throw new ValidationError(
      `Invalid device name '${value}'. Must be 1-64 characters, alphanumeric, underscore, hyphen, or dot.`
    );
  }
  return value;
}

export function validateDeviceSerial(serial: string): string {
  const value = requireValue(serial, 'Serial number').toUpperCase();
  if (!DEVICE_SERIAL_PATTERN.test(value)) {
    throw new ValidationError(
      `Invalid serial number '${value}'. Must start with device type prefix (FG, FM, etc.) followed by 10-20 alphanumeric characters.`
    );
  }
  return value;
}

export function validatePackageName(name: string): string {
  const value = requireValue(name, 'Package name');
  if (!PACKAGE_NAME_PATTERN.test(value)) {
    throw new ValidationError(
      `Invalid package name '${value}'. Must be 1-35 characters, alphanumeric, underscore, or hyphen only.`
    );
  }
  return value;
}

export function validatePolicyName(name: string): string {
  const value = requireValue(name, 'Policy name');
  if (!POLICY_NAME_PATTERN.test(value)) {
    throw new ValidationError(
      `Invalid policy name '${value}'. Must be 1-35 characters, alphanumeric, underscore, hyphen, dot, or space.`
    );
  }
  return value;
}

export function validateObjectName(name: string, objectType = 'object'): string {
  const label = objectType.charAt(0).toUpperCase() + objectType.slice(1);
  const value = requireValue(name, `${label} name`);
  if (!OBJECT_NAME_PATTERN.test(value)) {
    throw new ValidationError(
      `Invalid ${objectType} name '${value}'. Must be 1-79 characters, alphanumeric, underscore, hyphen, dot, or space.`
    );
  }
  return value;
}

export function validateInterfaceName(name: string): string {
  const value = requireValue(name, 'Interface name');
  if (!INTERFACE_NAME_PATTERN.test(value)) {
    throw new ValidationError(
      `Invalid interface name '${value}'. Must be 1-35 characters, alphanumeric, underscore, or hyphen.`
    );
  }
  return value;
}

export function validateIpv4Address(ip: string): string {
  const value = requireValue(ip, 'IP address');
  if (!IPV4_PATTERN.test(value)) {
    throw new ValidationError(`Invalid IPv4 address '${value}'`);
  }
  return value;
}

/** CIDR (`10.0.0.0/24`) or `ip netmask` */
export function validateIpv4Subnet(subnet: string): string {
  const value = requireValue(subnet, 'Subnet');

  if (value.includes(' ')) {
    const parts = value.split(/\s+/);
    if (parts.length !== 2) {
      throw new ValidationError(`Invalid subnet format '${value}'`);
    }
    if (!IPV4_PATTERN.test(parts[0]) || !IPV4_PATTERN.test(parts[1])) {
      throw new ValidationError(`Invalid subnet '${value}'`);
    }
    return value;
  }

  if (!IPV4_CIDR_PATTERN.test(value)) {
    throw new ValidationError(
      `Invalid subnet '${value}'. Use CIDR format (e.g., '10.0.0.0/24') or 'IP netmask' format.`
    );
  }
  return value;
}

export function validateFqdn(fqdn: string): string {
  const value = requireValue(fqdn, 'FQDN').toLowerCase();
  if (!FQDN_PATTERN.test(value)) {
    throw new ValidationError(`Invalid FQDN '${value}'`);
  }
  return value;
}

/** `80`, `8080-8090` or `80 443 8080` */
export function validatePortRange(portRange: string): string {
  const value = requireValue(portRange, 'Port range');
  if (!PORT_RANGE_PATTERN.test(value)) {
    throw new ValidationError(
      `Invalid port range '${value}'. Use formats like '80', '8080-8090', or '80 443 8080'.`
    );
  }

  const inRange = (port: number) => port >= 1 && port <= 65535;
  for (const part of value.split(/\s+/)) {
    if (part.includes('-')) {
      const [start, end] = part.split('-').map(Number);
      if (!inRange(start) || !inRange(end)) {
        throw new ValidationError('Port values must be between 1 and 65535');
      }
      if (start > end) {
        throw new ValidationError('Start port must be less than end port');
      }
    } else if (!inRange(Number(part))) {
      throw new ValidationError('Port value must be between 1 and 65535');
    }
  }
  return value;
}

export function validatePolicyAction(action: string): PolicyAction {
  return oneOf(action, VALID_POLICY_ACTIONS, 'Policy action', 'actions');
}

export function validateLogTrafficMode(mode: string): LogTrafficMode {
  return oneOf(mode, VALID_LOG_TRAFFIC_MODES, 'Log traffic mode', 'modes');
}

export function validateStatus(status: string): EnableStatus {
  return oneOf(status, VALID_STATUSES, 'Status', 'statuses');
}

export function validateNgfwMode(mode: string): NgfwMode {
  return oneOf(mode, VALID_NGFW_MODES, 'NGFW mode', 'modes');
}

export function validateAddressType(addrType: string): AddressType {
  return oneOf(addrType, VALID_ADDRESS_TYPES, 'Address type', 'types');
}

export function validateMovePosition(position: string): MovePosition {
  return oneOf(position, VALID_MOVE_POSITIONS, 'Move position', 'positions');
}

export function validatePolicyId(policyid: unknown): number {
  if (policyid === undefined || policyid === null) {
    throw new ValidationError('Policy ID cannot be empty');
  }
  if (typeof policyid !== 'number' || !Number.isInteger(policyid)) {
    throw new ValidationError('Policy ID must be an integer');
  }
  if (policyid < 0) {
    throw new ValidationError('Policy ID must be non-negative');
  }
  return policyid;
}

// ============================================================================
// Subnet helpers
// ============================================================================

export function cidrToNetmask(prefix: number): string {
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > 32) {
    throw new ValidationError(`Invalid prefix length '${prefix}'`);
  }
  const mask = prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
  return [24, 16, 8, 0].map((shift) => (mask >>> shift) & 0xff).join('.');
}

/**
 * Subnet string to the [ip, netmask] pair FortiManager stores.
 * A bare address is treated as a /32 host.
 */
export function parseSubnet(subnet: string): [string, string] {
  const value = subnet.trim();
  if (value.includes('/')) {
    validateIpv4Subnet(value);
    const [ip, prefix] = value.split('/');
    return [ip, cidrToNetmask(Number(prefix))];
  }
  if (value.includes(' ')) {
    validateIpv4Subnet(value);
    const [ip, mask] = value.split(/\s+/);
    return [ip, mask];
  }
  return [validateIpv4Address(value), '255.255.255.255'];
}

// ============================================================================
// Path validation
// ============================================================================

function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Directories exports may be written to. FMG_ALLOWED_OUTPUT_DIRS entries
 * that do not exist are skipped; with none left, home subdirectories apply.
 */
export function getAllowedOutputDirs(setting: string = process.env.FMG_ALLOWED_OUTPUT_DIRS || ''): string[] {
  const dirs = setting
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => resolve(expandHome(entry)))
    .filter((dir) => existsSync(dir) && statSync(dir).isDirectory());

  if (dirs.length > 0) {
    return dirs;
  }

  const home = homedir();
  return [home, join(home, 'Downloads'), join(home, 'Documents'), join(home, 'Desktop'), join(home, 'Reports')];
}

/**
 * Absolute path with symlinks followed. The deepest existing ancestor is
 * resolved on disk and the missing remainder joined back on, so links
 * anywhere along the path count.
 */
export function resolveRealPath(path: string): string {
  const missing: string[] = [];
  let current = resolve(path);
  while (!lstatSync(current, { throwIfNoEntry: false })) {
    const parent = dirname(current);
    if (parent === current) break;
    missing.unshift(basename(current));
    current = parent;
  }

  let real: string;
  try {
    real = realpathSync(current);
  } catch (error) {
    // A dangling link has no target to check against the allowed roots
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Cannot resolve output directory '${current}': ${reason}`);
  }
  return join(real, ...missing);
}

function isWithin(root: string, path: string): boolean {
  const rel = relative(root, path);
  if (rel === '') return true;
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

export function validateOutputPath(outputDir: string, allowedDirs: string[] = getAllowedOutputDirs()): string {
  if (!outputDir || !outputDir.trim()) {
    throw new ValidationError('Output directory cannot be empty');
  }

  const path = resolveRealPath(expandHome(outputDir.trim()));
  for (const allowed of allowedDirs) {
    if (isWithin(resolveRealPath(allowed), path)) {
      return path;
    }
  }

  throw new ValidationError(
    `Output directory '${path}' is not within allowed directories. ` +
      `Allowed: ${allowedDirs.join(', ')}. ` +
      'Set FMG_ALLOWED_OUTPUT_DIRS environment variable to customize.'
  );
}

export function validateFilename(filename: string): string {
  if (!filename) {
    throw new ValidationError('Filename cannot be empty');
  }

  const name = basename(filename);
  if (name.startsWith('.')) {
    throw new ValidationError(`Hidden files not allowed: ${name}`);
  }

  for (const char of ['~', '*', '?', '|', '<', '>', ':', '"', '\\', '/']) {
    if (name.includes(char)) {
      throw new ValidationError(`Invalid character '${char}' in filename`);
    }
  }

  if (!FILENAME_PATTERN.test(name)) {
    throw new ValidationError(`Invalid filename: ${name}`);
  }
  return name;
}
