/**
 * FortiManager JSON-RPC Client
 *
 * Session or API-token authentication, status-code mapping and
 * connection-level retries over a single `/jsonrpc` endpoint. Only reads
 * and the login are retried; a write or exec that failed in transit may
 * already have been applied.
 */

import { log } from './logger.js';
import { sanitizeForLogging } from './sanitize.js';
import {
  APIError,
  AuthenticationError,
  ConnectionError,
  FmgError,
  FmgTimeoutError,
  parseFmgError,
} from './errors.js';

export interface FmgClientConfig {
  host: string;
  port?: number;
  apiToken?: string;
  username?: string;
  password?: string;
  verifySsl?: boolean;
  /** Request timeout in seconds */
  timeout?: number;
  maxRetries?: number;
  /** Base back-off between retries; multiplied by the attempt number */
  retryDelayMs?: number;
}

export type JsonRpcMethod = 'get' | 'add' | 'set' | 'update' | 'delete' | 'exec';

export type FmgRecord = Record<string, unknown>;

/** Device (or device group) reference used by install, script and template scopes */
export interface ScopeMember {
  name: string;
  vdom?: string;
}

/** JSON-RPC filter expression, e.g. ["name", "contain", "fw"] */
export type FmgFilter = unknown[];

interface ListOptions {
  fields?: string[];
  filter?: FmgFilter;
}

export function isRecord(value: unknown): value is FmgRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Arrays pass through; a non-empty scalar is wrapped; anything else is empty */
export function normalizeList(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return value ? [value] : [];
}

function recordList(value: unknown): FmgRecord[] {
  return normalizeList(value).filter(isRecord);
}

function toRecord(value: unknown): FmgRecord {
  return isRecord(value) ? value : {};
}

function listParams(options: ListOptions, base: FmgRecord = {}): FmgRecord {
  const params: FmgRecord = { ...base };
  if (options.fields && options.fields.length > 0) params.fields = options.fields;
  if (options.filter && options.filter.length > 0) params.filter = options.filter;
  return params;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class FmgClient {
  private readonly config: Required<Omit<FmgClientConfig, 'apiToken' | 'username' | 'password'>> &
    Pick<FmgClientConfig, 'apiToken' | 'username' | 'password'>;
  private readonly baseUrl: string;
  private session: string | null = null;
  private connected = false;
  private requestId = 0;

  constructor(config: FmgClientConfig) {
    const host = config.host.replace(/^https?:\/\//, '').replace(/\/+$/, '');
    if (!host) {
      throw new ConnectionError('FortiManager host is required');
    }

    this.config = {
      host,
      port: config.port ?? 443,
      apiToken: config.apiToken,
      username: config.username,
      password: config.password,
      verifySsl: config.verifySsl ?? false,
      timeout: config.timeout ?? 30,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 500,
    };

    const portSuffix = this.config.port === 443 ? '' : `:${this.config.port}`;
    this.baseUrl = `https://${host}${portSuffix}/jsonrpc`;

    if (!this.config.verifySsl) {
      process.env.NODE_TLS_REJECT_UNAUTHORIZED = '0';
    }
  }

  get host(): string {
    return this.config.host;
  }

  get authMode(): 'token' | 'session' {
    return this.config.apiToken ? 'token' : 'session';
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Authenticate (session mode) and read system status.
   * Token mode has no login call; the status read proves the token.
   */
  async connect(): Promise<FmgRecord> {
    if (!this.config.apiToken) {
      if (!this.config.username || !this.config.password) {
        throw new AuthenticationError('No authentication provided. Set API token or username/password.');
      }
      await this.login();
    }

    this.connected = true;
    try {
      const status = await this.getSystemStatus();
      log.info('Connected to FortiManager', { host: this.config.host, auth: this.authMode });
      return status;
    } catch (error) {
      this.connected = false;
      this.session = null;
      throw error;
    }
  }

  /**
   * Log out and clear the session. The session is cleared even when the
   * logout call fails.
   */
  async disconnect(): Promise<void> {
    try {
      if (this.session) {
        await this.call('exec', '/sys/logout');
      }
    } catch (error) {
      log.warn('Logout failed', { error: error instanceof Error ? error.message : String(error) });
    } finally {
      this.session = null;
      this.connected = false;
      log.info('Disconnected from FortiManager', { host: this.config.host });
    }
  }

  private async login(): Promise<void> {
    const request: FmgRecord = {
      id: ++this.requestId,
      method: 'exec',
      params: [{ url: '/sys/login/user', data: { user: this.config.username, passwd: this.config.password } }],
      verbose: 1,
    };
    const body = await this.post(request, true);

    const first = this.firstResult(body);
    const status = toRecord(first.status);
    const code = typeof status.code === 'number' ? status.code : -1;
    const session = isRecord(body) && typeof body.session === 'string' ? body.session : '';

    if (code !== 0 || !session) {
      const message = typeof status.message === 'string' ? status.message : 'Login failed';
      throw new AuthenticationError(`FortiManager login failed: ${message}`, code !== 0 ? code : undefined);
    }

    this.session = session;
    log.debug('FortiManager session established', { host: this.config.host });
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  /**
   * POST one JSON-RPC body. With `retryable`, network errors and HTTP 5xx
   * are retried with linear back-off; status codes inside a 2xx body are
   * never retried.
   */
  private async post(body: FmgRecord, retryable: boolean): Promise<unknown> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiToken) {
      headers.Authorization = `Bearer ${this.config.apiToken}`;
    }

    let lastError: FmgError = new ConnectionError('Request not attempted');

    const attempts = retryable ? this.config.maxRetries + 1 : 1;
    for (let attempt = 0; attempt < attempts; attempt++) {
      if (attempt > 0) {
        log.debug('Retrying FortiManager request', { attempt, error: lastError.message });
        await sleep(this.config.retryDelayMs * attempt);
      }

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.config.timeout * 1000);

      let response: Response;
      try {
        response = await fetch(this.baseUrl, {
          method: 'POST',
          headers,
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        clearTimeout(timer);
        if (controller.signal.aborted) {
          throw new FmgTimeoutError(`Request timed out after ${this.config.timeout}s`);
        }
        const reason = error instanceof Error ? error.message : String(error);
        lastError = new ConnectionError(`Failed to reach FortiManager at ${this.config.host}: ${reason}`);
        continue;
      }
      clearTimeout(timer);

      if (response.status >= 500) {
        lastError = new APIError(`HTTP ${response.status} ${response.statusText}`.trim());
        continue;
      }
      if (!response.ok) {
        throw new APIError(`HTTP ${response.status} ${response.statusText}`.trim());
      }

      try {
        const parsed: unknown = await response.json();
        return parsed;
      } catch {
        throw new APIError('Invalid JSON in FortiManager response');
      }
    }

    throw lastError;
  }

  private firstResult(body: unknown): FmgRecord {
    if (!isRecord(body) || !Array.isArray(body.result) || body.result.length === 0) {
      throw new APIError('Malformed JSON-RPC response: missing result');
    }
    return toRecord(body.result[0]);
  }

  /**
   * Issue one call. For `get` the params sit beside `url`; every other
   * verb carries them under `data`.
   */
  async call(method: JsonRpcMethod, url: string, params?: unknown, retried = false): Promise<unknown> {
    if (!this.connected && url !== '/sys/logout') {
      throw new ConnectionError('Not connected. Call connect() first.');
    }

    let entry: FmgRecord = { url };
    if (method === 'get') {
      if (isRecord(params)) entry = { url, ...params };
    } else if (params !== undefined) {
      entry = { url, data: params };
    }

    const body: FmgRecord = { id: ++this.requestId, method, params: [entry], verbose: 1 };
    if (this.session) body.session = this.session;

    log.debug('FortiManager request', { method, url, params: sanitizeForLogging(params) });

    const first = this.firstResult(await this.post(body, method === 'get'));
    const status = toRecord(first.status);
    const code = typeof status.code === 'number' ? status.code : 0;

    if (code === 0) {
      return 'data' in first ? first.data : first;
    }

    if (code === -2 && this.session && !retried) {
      log.info('FortiManager session expired, logging in again');
      this.session = null;
      await this.login();
      return this.call(method, url, params, true);
    }

    const message = typeof status.message === 'string' ? status.message : '';
    throw parseFmgError(code, message, url);
  }

  async get(url: string, params: FmgRecord = {}): Promise<unknown> {
    return this.call('get', url, params);
  }

  async add(url: string, data: unknown): Promise<unknown> {
    return this.call('add', url, data);
  }

  async set(url: string, data: unknown): Promise<unknown> {
    return this.call('set', url, data);
  }

  async update(url: string, data: unknown): Promise<unknown> {
    return this.call('update', url, data);
  }

  async delete(url: string, data?: unknown): Promise<unknown> {
    return this.call('delete', url, data);
  }

  async exec(url: string, data?: unknown): Promise<unknown> {
    return this.call('exec', url, data);
  }

  // ==========================================================================
  // System
  // ==========================================================================

  async getSystemStatus(): Promise<FmgRecord> {
    return toRecord(await this.get('/sys/status'));
  }

  async getHaStatus(): Promise<FmgRecord> {
    return toRecord(await this.get('/sys/ha/status'));
  }

  // ==========================================================================
  // Device manager database
  // ==========================================================================

  async listAdoms(options: ListOptions = {}, loadsub = 0): Promise<FmgRecord[]> {
    return recordList(await this.get('/dvmdb/adom', listParams(options, { loadsub })));
  }

  async getAdom(name: string, loadsub = 0): Promise<FmgRecord> {
    return toRecord(await this.get(`/dvmdb/adom/${name}`, { loadsub }));
  }

  async listDevices(adom: string, options: ListOptions = {}, loadsub = 0): Promise<FmgRecord[]> {
    return recordList(await this.get(`/dvmdb/adom/${adom}/device`, listParams(options, { loadsub })));
  }

  async getDevice(adom: string, device: string, loadsub = 0): Promise<FmgRecord> {
    return toRecord(await this.get(`/dvmdb/adom/${adom}/device/${device}`, { loadsub }));
  }

  async listDeviceVdoms(adom: string, device: string): Promise<FmgRecord[]> {
    return recordList(await this.get(`/dvmdb/adom/${adom}/device/${device}/vdom`));
  }

  async listDeviceGroups(adom: string): Promise<FmgRecord[]> {
    return recordList(await this.get(`/dvmdb/adom/${adom}/group`));
  }

  async getDeviceStatus(adom: string, device?: string): Promise<FmgRecord[]> {
    return this.listDevices(adom, {
      fields: ['name', 'ip', 'sn', 'conn_status', 'conf_status', 'db_status', 'dev_status', 'os_ver', 'platform_str'],
      filter: device ? [['name', '==', device]] : undefined,
    });
  }

  // ==========================================================================
  // DVM commands
  // ==========================================================================

  async addDevice(adom: string, device: FmgRecord, flags?: string[]): Promise<FmgRecord> {
    const data: FmgRecord = { adom, device };
    if (flags && flags.length > 0) data.flags = flags;
    return toRecord(await this.exec('/dvm/cmd/add/device', data));
  }

  async deleteDevice(adom: string, device: string, flags?: string[]): Promise<FmgRecord> {
    const data: FmgRecord = { adom, device };
    if (flags && flags.length > 0) data.flags = flags;
    return toRecord(await this.exec('/dvm/cmd/del/device', data));
  }

  async reloadDeviceList(adom: string): Promise<FmgRecord> {
    return toRecord(await this.exec('/dvm/cmd/reload/dev-list', { adom }));
  }

  async addDeviceList(adom: string, devices: FmgRecord[], flags?: string[]): Promise<FmgRecord> {
    const data: FmgRecord = { adom, 'add-dev-list': devices };
    if (flags && flags.length > 0) data.flags = flags;
    return toRecord(await this.exec('/dvm/cmd/add/dev-list', data));
  }

  async deleteDeviceList(adom: string, devices: FmgRecord[], flags?: string[]): Promise<FmgRecord> {
    const data: FmgRecord = { adom, 'del-dev-member-list': devices };
    if (flags && flags.length > 0) data.flags = flags;
    return toRecord(await this.exec('/dvm/cmd/del/dev-list', data));
  }

  async updateDevice(adom: string, device: string, data: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.update(`/dvmdb/adom/${adom}/device/${device}`, data));
  }

  // ==========================================================================
  // Tasks
  // ==========================================================================

  async listTasks(filter?: FmgFilter): Promise<FmgRecord[]> {
    return recordList(await this.get('/task/task', listParams({ filter })));
  }

  async getTask(taskId: number): Promise<FmgRecord> {
    return toRecord(await this.get(`/task/task/${taskId}`));
  }

  async getTaskLine(taskId: number): Promise<FmgRecord[]> {
    return recordList(await this.get(`/task/task/${taskId}/line`));
  }

  // ==========================================================================
  // Security console (install)
  // ==========================================================================

  async installPackage(adom: string, pkg: string, scope: ScopeMember[], flags?: string[]): Promise<FmgRecord> {
    const data: FmgRecord = { adom, pkg, scope };
    if (flags && flags.length > 0) data.flags = flags;
    return toRecord(await this.exec('/securityconsole/install/package', data));
  }

  async installDevice(adom: string, scope: ScopeMember[], flags?: string[]): Promise<FmgRecord> {
    const data: FmgRecord = { adom, scope };
    if (flags && flags.length > 0) data.flags = flags;
    return toRecord(await this.exec('/securityconsole/install/device', data));
  }

  async installPreview(adom: string, scope: ScopeMember[], flags?: string[]): Promise<FmgRecord> {
    const data: FmgRecord = { adom, scope };
    if (flags && flags.length > 0) data.flags = flags;
    return toRecord(await this.exec('/securityconsole/install/preview', data));
  }

  async getPreviewResult(adom: string, scope: ScopeMember[]): Promise<FmgRecord> {
    return toRecord(await this.exec('/securityconsole/preview/result', { adom, scope }));
  }

  // ==========================================================================
  // Policy packages
  // ==========================================================================

  async listPackages(adom: string, fields?: string[]): Promise<FmgRecord[]> {
    return recordList(await this.get(`/pm/pkg/adom/${adom}`, listParams({ fields })));
  }

  async getPackage(adom: string, pkg: string, loadsub = 0): Promise<FmgRecord> {
    return toRecord(await this.get(`/pm/pkg/adom/${adom}/${pkg}`, { loadsub }));
  }

  async createPackage(adom: string, name: string, packageSettings?: FmgRecord): Promise<FmgRecord> {
    const data: FmgRecord = { name, type: 'pkg' };
    if (packageSettings && Object.keys(packageSettings).length > 0) {
      data['package settings'] = packageSettings;
    }
    return toRecord(await this.add(`/pm/pkg/adom/${adom}`, data));
  }

  async deletePackage(adom: string, pkg: string): Promise<FmgRecord> {
    return toRecord(await this.delete(`/pm/pkg/adom/${adom}/${pkg}`));
  }

  async clonePackage(adom: string, pkg: string, newName: string): Promise<FmgRecord> {
    return toRecord(await this.exec('/securityconsole/package/clone', { adom, pkg, new_name: newName }));
  }

  async assignPackage(adom: string, pkg: string, scope: ScopeMember[]): Promise<FmgRecord> {
    return toRecord(await this.update(`/pm/pkg/adom/${adom}/${pkg}`, { 'scope member': scope }));
  }

  // ==========================================================================
  // Firewall policies
  // ==========================================================================

  private policyUrl(adom: string, pkg: string): string {
    return `/pm/config/adom/${adom}/pkg/${pkg}/firewall/policy`;
  }

  async listFirewallPolicies(
    adom: string,
    pkg: string,
    options: ListOptions & { range?: [number, number] } = {},
    loadsub = 0
  ): Promise<FmgRecord[]> {
    const params = listParams(options, { loadsub });
    if (options.range) params.range = options.range;
    return recordList(await this.get(this.policyUrl(adom, pkg), params));
  }

  async getFirewallPolicy(adom: string, pkg: string, policyid: number, loadsub = 0): Promise<FmgRecord> {
    return toRecord(await this.get(`${this.policyUrl(adom, pkg)}/${policyid}`, { loadsub }));
  }

  async getFirewallPolicyCount(adom: string, pkg: string): Promise<number> {
    const result = await this.get(this.policyUrl(adom, pkg), { option: ['count'] });
    return typeof result === 'number' ? result : 0;
  }

  async createFirewallPolicy(adom: string, pkg: string, policy: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.add(this.policyUrl(adom, pkg), policy));
  }

  async updateFirewallPolicy(adom: string, pkg: string, policyid: number, data: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.update(`${this.policyUrl(adom, pkg)}/${policyid}`, data));
  }

  async deleteFirewallPolicy(adom: string, pkg: string, policyid: number): Promise<FmgRecord> {
    return toRecord(await this.delete(`${this.policyUrl(adom, pkg)}/${policyid}`));
  }

  async deleteFirewallPolicies(adom: string, pkg: string, policyids: number[]): Promise<FmgRecord> {
    return toRecord(
      await this.delete(this.policyUrl(adom, pkg), { confirm: 1, filter: ['policyid', 'in', ...policyids] })
    );
  }

  async moveFirewallPolicy(
    adom: string,
    pkg: string,
    policyid: number,
    target: number,
    option: 'before' | 'after' = 'before'
  ): Promise<FmgRecord> {
    return toRecord(await this.exec('/securityconsole/move', { adom, pkg, policyid, target, option }));
  }

  // ==========================================================================
  // Firewall objects
  // ==========================================================================

  private objectUrl(adom: string, path: string): string {
    return `/pm/config/adom/${adom}/obj/firewall/${path}`;
  }

  async listAddresses(adom: string, options: ListOptions = {}): Promise<FmgRecord[]> {
    return recordList(await this.get(this.objectUrl(adom, 'address'), listParams(options)));
  }

  async getAddress(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.get(this.objectUrl(adom, `address/${name}`)));
  }

  async createAddress(adom: string, address: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.add(this.objectUrl(adom, 'address'), address));
  }

  async updateAddress(adom: string, name: string, data: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.update(this.objectUrl(adom, `address/${name}`), data));
  }

  async deleteAddress(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.delete(this.objectUrl(adom, `address/${name}`)));
  }

  async listAddressGroups(adom: string, options: ListOptions = {}): Promise<FmgRecord[]> {
    return recordList(await this.get(this.objectUrl(adom, 'addrgrp'), listParams(options)));
  }

  async getAddressGroup(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.get(this.objectUrl(adom, `addrgrp/${name}`)));
  }

  async createAddressGroup(adom: string, group: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.add(this.objectUrl(adom, 'addrgrp'), group));
  }

  async updateAddressGroup(adom: string, name: string, data: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.update(this.objectUrl(adom, `addrgrp/${name}`), data));
  }

  async deleteAddressGroup(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.delete(this.objectUrl(adom, `addrgrp/${name}`)));
  }

  async listServices(adom: string, options: ListOptions = {}): Promise<FmgRecord[]> {
    return recordList(await this.get(this.objectUrl(adom, 'service/custom'), listParams(options)));
  }

  async getService(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.get(this.objectUrl(adom, `service/custom/${name}`)));
  }

  async createService(adom: string, service: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.add(this.objectUrl(adom, 'service/custom'), service));
  }

  async updateService(adom: string, name: string, data: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.update(this.objectUrl(adom, `service/custom/${name}`), data));
  }

  async deleteService(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.delete(this.objectUrl(adom, `service/custom/${name}`)));
  }

  async listServiceGroups(adom: string, options: ListOptions = {}): Promise<FmgRecord[]> {
    return recordList(await this.get(this.objectUrl(adom, 'service/group'), listParams(options)));
  }

  async getServiceGroup(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.get(this.objectUrl(adom, `service/group/${name}`)));
  }

  async createServiceGroup(adom: string, group: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.add(this.objectUrl(adom, 'service/group'), group));
  }

  async deleteServiceGroup(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.delete(this.objectUrl(adom, `service/group/${name}`)));
  }

  // ==========================================================================
  // Workspace (ADOM locking)
  // ==========================================================================

  async lockAdom(adom: string): Promise<FmgRecord> {
    return toRecord(await this.exec(`/dvmdb/adom/${adom}/workspace/lock`));
  }

  async unlockAdom(adom: string): Promise<FmgRecord> {
    return toRecord(await this.exec(`/dvmdb/adom/${adom}/workspace/unlock`));
  }

  async commitAdom(adom: string): Promise<FmgRecord> {
    return toRecord(await this.exec(`/dvmdb/adom/${adom}/workspace/commit`));
  }

  // ==========================================================================
  // Device proxy
  // ==========================================================================

  /**
   * Forward a REST call to managed devices.
   * `target` entries look like `/adom/root/device/FGT1`.
   */
  async proxyCall(
    action: 'get' | 'post' | 'put' | 'delete',
    resource: string,
    target: string[],
    payload?: FmgRecord
  ): Promise<unknown> {
    const data: FmgRecord = { action, resource, target };
    if (payload && Object.keys(payload).length > 0) data.payload = payload;
    return this.exec('/sys/proxy/json', data);
  }

  // ==========================================================================
  // CLI scripts
  // ==========================================================================

  async listScripts(adom: string, options: ListOptions = {}): Promise<FmgRecord[]> {
    return recordList(await this.get(`/dvmdb/adom/${adom}/script`, listParams(options)));
  }

  async getScript(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.get(`/dvmdb/adom/${adom}/script/${name}`));
  }

  async createScript(adom: string, script: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.add(`/dvmdb/adom/${adom}/script`, script));
  }

  async updateScript(adom: string, name: string, data: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.update(`/dvmdb/adom/${adom}/script/${name}`, data));
  }

  async deleteScript(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.delete(`/dvmdb/adom/${adom}/script/${name}`));
  }

  /**
   * Run a script. A scope member with a vdom targets a device; without
   * one it names a device group. `pkg` is for adom_database scripts.
   */
  async executeScript(adom: string, script: string, scope?: ScopeMember[], pkg?: string): Promise<FmgRecord> {
    const data: FmgRecord = { adom, script };
    if (scope && scope.length > 0) data.scope = scope;
    if (pkg) data.package = pkg;
    return toRecord(await this.exec(`/dvmdb/adom/${adom}/script/execute`, data));
  }

  async getScriptLogLatest(adom: string, device?: string): Promise<FmgRecord> {
    const suffix = device ? `/device/${device}` : '';
    return toRecord(await this.get(`/dvmdb/adom/${adom}/script/log/latest${suffix}`));
  }

  async getScriptLogSummary(adom: string, device?: string): Promise<FmgRecord[]> {
    const suffix = device ? `/device/${device}` : '';
    return recordList(await this.get(`/dvmdb/adom/${adom}/script/log/summary${suffix}`));
  }

  async getScriptLogOutput(adom: string, logId: number, device?: string): Promise<FmgRecord> {
    const url = device
      ? `/dvmdb/adom/${adom}/script/log/output/device/${device}/logid/${logId}`
      : `/dvmdb/adom/${adom}/script/log/output/logid/${logId}`;
    return toRecord(await this.get(url));
  }

  // ==========================================================================
  // Provisioning templates
  // ==========================================================================

  async listTemplates(adom: string, fields?: string[]): Promise<FmgRecord[]> {
    return recordList(await this.get(`/pm/template/adom/${adom}`, listParams({ fields })));
  }

  async getTemplate(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.get(`/pm/template/adom/${adom}/${name}`));
  }

  async listSystemTemplates(adom: string, fields?: string[]): Promise<FmgRecord[]> {
    return recordList(await this.get(`/pm/devprof/adom/${adom}`, listParams({ fields })));
  }

  async getSystemTemplate(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.get(`/pm/devprof/adom/${adom}/${name}`));
  }

  async assignSystemTemplate(adom: string, template: string, scope: ScopeMember[]): Promise<FmgRecord> {
    return toRecord(await this.add(`/pm/devprof/adom/${adom}/${template}/scope member`, scope));
  }

  async unassignSystemTemplate(adom: string, template: string, scope: ScopeMember[]): Promise<FmgRecord> {
    return toRecord(await this.delete(`/pm/devprof/adom/${adom}/${template}/scope member`, scope));
  }

  async listCliTemplateGroups(adom: string, fields?: string[]): Promise<FmgRecord[]> {
    return recordList(await this.get(`/pm/config/adom/${adom}/obj/cli/template-group`, listParams({ fields })));
  }

  async getCliTemplateGroup(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.get(`/pm/config/adom/${adom}/obj/cli/template-group/${name}`));
  }

  async createCliTemplateGroup(adom: string, group: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.add(`/pm/config/adom/${adom}/obj/cli/template-group`, group));
  }

  async deleteCliTemplateGroup(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.delete(`/pm/config/adom/${adom}/obj/cli/template-group/${name}`));
  }

  async listTemplateGroups(adom: string, fields?: string[]): Promise<FmgRecord[]> {
    return recordList(await this.get(`/pm/tmplgrp/adom/${adom}`, listParams({ fields })));
  }

  async getTemplateGroup(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.get(`/pm/tmplgrp/adom/${adom}/${name}`));
  }

  async createTemplateGroup(adom: string, group: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.add(`/pm/tmplgrp/adom/${adom}`, group));
  }

  async assignTemplateGroup(adom: string, templateGroup: string, scope: ScopeMember[]): Promise<FmgRecord> {
    return toRecord(await this.add(`/pm/tmplgrp/adom/${adom}/${templateGroup}/scope member`, scope));
  }

  /** `pkg` is the template path, e.g. `adom/root/tmplgrp/branch` */
  async validateTemplate(adom: string, pkg: string, scope: ScopeMember[]): Promise<FmgRecord> {
    return toRecord(await this.exec('/securityconsole/template/validate', { adom, pkg, scope, flag: 'json' }));
  }

  // ==========================================================================
  // SD-WAN templates
  // ==========================================================================

  async listSdwanTemplates(adom: string, fields?: string[]): Promise<FmgRecord[]> {
    return recordList(await this.get(`/pm/wanprof/adom/${adom}`, listParams({ fields })));
  }

  async getSdwanTemplate(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.get(`/pm/wanprof/adom/${adom}/${name}`));
  }

  async createSdwanTemplate(adom: string, template: FmgRecord): Promise<FmgRecord> {
    return toRecord(await this.add(`/pm/wanprof/adom/${adom}`, template));
  }

  async deleteSdwanTemplate(adom: string, name: string): Promise<FmgRecord> {
    return toRecord(await this.delete(`/pm/wanprof/adom/${adom}/${name}`));
  }

  async assignSdwanTemplate(adom: string, template: string, scope: ScopeMember[]): Promise<FmgRecord> {
    return toRecord(await this.add(`/pm/wanprof/adom/${adom}/${template}/scope member`, scope));
  }

  async unassignSdwanTemplate(adom: string, template: string, scope: ScopeMember[]): Promise<FmgRecord> {
    return toRecord(await this.delete(`/pm/wanprof/adom/${adom}/${template}/scope member`, scope));
  }
}
