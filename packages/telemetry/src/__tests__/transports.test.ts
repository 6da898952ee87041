/**
 * Tests for the PostHog transport
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { PostHogTransport } from '../posthog.js';
import type { TelemetryContext, TelemetryEvent } from '../types.js';

const context: TelemetryContext = {
  packageName: 'fortimanager-mcp',
  packageVersion: '1.0.0',
  nodeVersion: 'v20.11.0',
  platform: 'linux',
  arch: 'x64',
  instanceId: 'instance-1',
};

const events: TelemetryEvent[] = [
  {
    event: 'tool_usage',
    timestamp: '2024-01-15T10:00:00.000Z',
    properties: { tool: 'wait_for_task', category: 'system', calls: 2, failures: 0 },
  },
  {
    event: 'mcp_startup',
    timestamp: '2024-01-15T10:00:01.000Z',
    properties: { transport: 'stdio', success: true },
  },
];

function sentPayload(fetchMock: Mock<typeof fetch>): unknown {
  return JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
}

describe('PostHogTransport', () => {
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should skip sending without an API key', async () => {
    const transport = new PostHogTransport(context, { env: {} });

    await transport.send(events);

    expect(transport.isConfigured()).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should skip empty batches', async () => {
    const transport = new PostHogTransport(context, { apiKey: 'test-key' });
    await transport.send([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should post the batch with runtime properties merged in', async () => {
    const transport = new PostHogTransport(context, { env: { POSTHOG_API_KEY: 'test-key' } });

    await transport.send(events);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe('https://app.posthog.com/batch');
    expect(sentPayload(fetchMock)).toEqual({
      api_key: 'test-key',
      batch: [
        {
          event: 'tool_usage',
          distinct_id: 'instance-1',
          timestamp: '2024-01-15T10:00:00.000Z',
          properties: {
            $lib: 'fortimanager-mcp',
            $lib_version: '1.0.0',
            node_version: 'v20.11.0',
            platform: 'linux',
            arch: 'x64',
            tool: 'wait_for_task',
            category: 'system',
            calls: 2,
            failures: 0,
          },
        },
        {
          event: 'mcp_startup',
          distinct_id: 'instance-1',
          timestamp: '2024-01-15T10:00:01.000Z',
          properties: {
            $lib: 'fortimanager-mcp',
            $lib_version: '1.0.0',
            node_version: 'v20.11.0',
            platform: 'linux',
            arch: 'x64',
            transport: 'stdio',
            success: true,
          },
        },
      ],
    });
  });

  it('should use POSTHOG_HOST without its trailing slash', () => {
    const transport = new PostHogTransport(context, {
      env: { POSTHOG_API_KEY: 'test-key', POSTHOG_HOST: 'https://posthog.example.test/' },
    });
    expect(transport.batchUrl()).toBe('https://posthog.example.test/batch');
  });

  it('should prefer explicit options over the environment', () => {
    const transport = new PostHogTransport(context, {
      host: 'https://eu.posthog.example.test',
      env: { POSTHOG_HOST: 'https://ignored.example.test' },
    });
    expect(transport.batchUrl()).toBe('https://eu.posthog.example.test/batch');
  });

  it('should not throw on network errors', async () => {
    fetchMock.mockRejectedValue(new Error('Network error'));
    const transport = new PostHogTransport(context, { apiKey: 'test-key' });

    await expect(transport.send(events)).resolves.toBeUndefined();
  });

  it('should not throw on rejected batches', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 400 }));
    const transport = new PostHogTransport(context, { apiKey: 'test-key' });

    await expect(transport.send(events)).resolves.toBeUndefined();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
