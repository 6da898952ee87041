/**
 * Tests for TelemetryClient
 */

import { describe, it, expect } from 'vitest';
import { TelemetryClient } from '../index.js';
import type { TelemetryEvent, TelemetryTransport } from '../types.js';

class RecordingTransport implements TelemetryTransport {
  batches: TelemetryEvent[][] = [];
  failWith?: Error;

  async send(events: TelemetryEvent[]): Promise<void> {
    this.batches.push(events);
    if (this.failWith) throw this.failWith;
  }
}

const ENABLED = { FMG_TELEMETRY_ENABLED: 'true' };

function enabledClient(transport = new RecordingTransport()) {
  const client = new TelemetryClient('fortimanager-mcp', '1.0.0', { transport, env: ENABLED, autoFlush: false });
  return { client, transport };
}

function eventsNamed(batch: TelemetryEvent[], name: string) {
  return batch.filter((e) => e.event === name).map((e) => e.properties);
}

describe('TelemetryClient', () => {
  describe('constructor', () => {
    it('should capture server and runtime context', () => {
      const { client } = enabledClient();
      expect(client.getContext()).toMatchObject({
        packageName: 'fortimanager-mcp',
        packageVersion: '1.0.0',
        nodeVersion: process.version,
      });
    });

    it('should give each instance its own id', () => {
      expect(enabledClient().client.getInstanceId()).not.toBe(enabledClient().client.getInstanceId());
    });

    it.each([
      [{ FMG_TELEMETRY_ENABLED: 'false' }],
      [{ DO_NOT_TRACK: '1' }],
      [{ CI: 'true' }],
    ])('should be disabled by %o', (env) => {
      const client = new TelemetryClient('fortimanager-mcp', '1.0.0', { env, autoFlush: false });
      expect(client.isEnabled()).toBe(false);
    });
  });

  describe('recordToolCall', () => {
    it('should total calls per tool', () => {
      const { client } = enabledClient();

      client.recordToolCall({ tool: 'list_adoms', category: 'system', durationMs: 120.4, success: true });
      client.recordToolCall({ tool: 'list_adoms', category: 'system', durationMs: 80, success: true });
      client.recordToolCall({
        tool: 'list_adoms',
        category: 'system',
        durationMs: 300,
        success: false,
        error: Object.assign(new Error('No permission for the resource'), { code: -3 }),
      });

      expect(client.snapshot().tools).toEqual([
        {
          tool: 'list_adoms',
          category: 'system',
          calls: 3,
          failures: 1,
          totalMs: 500,
          maxMs: 300,
          errors: { PermissionError: 1 },
        },
      ]);
    });

    it('should fold names outside the catalog into unknown_tool', () => {
      const { client } = enabledClient();

      client.recordToolCall({ tool: 'show_me_fmg.corp.test', durationMs: 1, success: false, error: new Error('x') });
      client.recordToolCall({ tool: 'another_guess', durationMs: 2, success: false, error: new Error('y') });

      expect(client.snapshot().tools).toEqual([
        { tool: 'unknown_tool', category: 'unknown', calls: 2, failures: 2, totalMs: 3, maxMs: 2, errors: { Error: 2 } },
      ]);
    });

    it('should record nothing when disabled', () => {
      const client = new TelemetryClient('fortimanager-mcp', '1.0.0', {
        env: { FMG_TELEMETRY_ENABLED: 'false' },
        autoFlush: false,
      });

      client.recordToolCall({ tool: 'list_adoms', category: 'system', durationMs: 5, success: true });
      client.recordTaskWait({ state: 'done', attempts: 1, waitedMs: 10 });

      expect(client.snapshot()).toEqual({ tools: [], taskWaits: [], pendingEvents: 0 });
    });
  });

  describe('recordTaskWait', () => {
    it('should total waits per final state', () => {
      const { client } = enabledClient();

      client.recordTaskWait({ state: 'done', attempts: 3, waitedMs: 10_000 });
      client.recordTaskWait({ state: 'done', attempts: 1, waitedMs: 20 });
      client.recordTaskWait({ state: 'timeout', attempts: 61, waitedMs: 300_004.6 });

      expect(client.snapshot().taskWaits).toEqual([
        { state: 'done', waits: 2, attempts: 4, waitedMs: 10_020 },
        { state: 'timeout', waits: 1, attempts: 61, waitedMs: 300_005 },
      ]);
    });
  });

  describe('lifecycle', () => {
    it('should drop properties that describe the managed estate', async () => {
      const { client, transport } = enabledClient();

      client.lifecycle('startup', { transport: 'http', port: 8080, host: 'fmg.corp.test', adom: 'branches', toolMode: 'full' });
      await client.flush();

      expect(transport.batches[0]).toEqual([
        {
          event: 'mcp_startup',
          timestamp: expect.any(String),
          properties: { transport: 'http', toolMode: 'full', success: true },
        },
      ]);
    });

    it('should mark error lifecycle events as failures', async () => {
      const { client, transport } = enabledClient();

      client.lifecycle('error', { reason: 'crash' });
      await client.flush();

      expect(eventsNamed(transport.batches[0], 'mcp_error')).toEqual([{ reason: 'crash', success: false }]);
    });
  });

  describe('captureError', () => {
    it('should send the classification straight away', async () => {
      const { client, transport } = enabledClient();

      client.captureError(new Error('connect ECONNREFUSED 10.0.0.1:443'), 'uncaughtException');
      await client.flush();

      expect(transport.batches).toHaveLength(1);
      expect(eventsNamed(transport.batches[0], 'mcp_error')).toEqual([
        { context: 'uncaughtException', error_type: 'NetworkError' },
      ]);
    });
  });

  describe('flush', () => {
    it('should send nothing when nothing was recorded', async () => {
      const { client, transport } = enabledClient();
      await client.flush();
      expect(transport.batches).toEqual([]);
    });

    it('should turn totals into tool, category and task rows', async () => {
      const { client, transport } = enabledClient();
      client.recordToolCall({ tool: 'install_package', category: 'system', durationMs: 900, success: true });
      client.recordToolCall({
        tool: 'install_package',
        category: 'system',
        durationMs: 100,
        success: false,
        error: Object.assign(new Error('Workspace locked'), { code: -8 }),
      });
      client.recordToolCall({ tool: 'list_adoms', category: 'system', durationMs: 50, success: true });
      client.recordToolCall({ tool: 'create_address_subnet', category: 'objects', durationMs: 40, success: true });
      client.recordTaskWait({ state: 'error', attempts: 2, waitedMs: 5_000 });

      await client.flush();

      const [batch] = transport.batches;
      expect(eventsNamed(batch, 'tool_usage')).toEqual([
        {
          tool: 'install_package',
          category: 'system',
          calls: 2,
          failures: 1,
          total_ms: 1000,
          max_ms: 900,
          avg_ms: 500,
          errors_LockError: 1,
        },
        { tool: 'list_adoms', category: 'system', calls: 1, failures: 0, total_ms: 50, max_ms: 50, avg_ms: 50 },
        {
          tool: 'create_address_subnet',
          category: 'objects',
          calls: 1,
          failures: 0,
          total_ms: 40,
          max_ms: 40,
          avg_ms: 40,
        },
      ]);
      expect(eventsNamed(batch, 'category_usage')).toEqual([
        { category: 'system', calls: 3, failures: 1, total_ms: 1050 },
        { category: 'objects', calls: 1, failures: 0, total_ms: 40 },
      ]);
      expect(eventsNamed(batch, 'task_wait')).toEqual([{ state: 'error', waits: 1, attempts: 2, waited_ms: 5000 }]);
    });

    it('should start from zero after a flush', async () => {
      const { client, transport } = enabledClient();
      client.recordToolCall({ tool: 'list_adoms', category: 'system', durationMs: 10, success: true });

      await client.flush();
      await client.flush();

      expect(transport.batches).toHaveLength(1);
      expect(client.snapshot()).toEqual({ tools: [], taskWaits: [], pendingEvents: 0 });
    });

    it('should share a flush that is already running', async () => {
      const { client, transport } = enabledClient();
      client.recordToolCall({ tool: 'list_adoms', category: 'system', durationMs: 10, success: true });

      await Promise.all([client.flush(), client.flush()]);

      expect(transport.batches).toHaveLength(1);
    });

    it('should swallow transport failures', async () => {
      const transport = new RecordingTransport();
      transport.failWith = new Error('offline');
      const { client } = enabledClient(transport);
      client.lifecycle('shutdown', { reason: 'SIGTERM' });

      await expect(client.flush()).resolves.toBeUndefined();
      expect(transport.batches).toHaveLength(1);
    });

    it('should keep only the newest 50 lifecycle events', async () => {
      const { client, transport } = enabledClient();
      for (let i = 0; i < 55; i++) {
        client.lifecycle('startup', { reason: `r${i}` });
      }

      await client.flush();

      const reasons = transport.batches[0].map((e) => e.properties.reason);
      expect(reasons).toHaveLength(50);
      expect(reasons[0]).toBe('r5');
      expect(reasons[49]).toBe('r54');
    });
  });
});
