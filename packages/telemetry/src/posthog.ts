/**
 * PostHog Transport
 *
 * Sends a flush as one request to the PostHog batch capture API. The API
 * key and host are read from the environment on every send unless given
 * explicitly.
 */

import type { TelemetryEvent, TelemetryContext, TelemetryTransport } from './types.js';
import { debugLog } from './utils.js';

const DEFAULT_HOST = 'https://app.posthog.com';
const SEND_TIMEOUT_MS = 5_000;

export interface PostHogOptions {
  apiKey?: string;
  host?: string;
  env?: NodeJS.ProcessEnv;
}

interface PostHogEvent {
  event: string;
  distinct_id: string;
  timestamp: string;
  properties: Record<string, unknown>;
}

export class PostHogTransport implements TelemetryTransport {
  private readonly runtime: Record<string, string>;

  constructor(
    private readonly context: TelemetryContext,
    private readonly options: PostHogOptions = {}
  ) {
    this.runtime = {
      $lib: context.packageName,
      $lib_version: context.packageVersion,
      node_version: context.nodeVersion,
      platform: context.platform,
      arch: context.arch,
    };
  }

  private apiKey(): string {
    return this.options.apiKey ?? (this.options.env ?? process.env).POSTHOG_API_KEY ?? '';
  }

  batchUrl(): string {
    const host = this.options.host || (this.options.env ?? process.env).POSTHOG_HOST || DEFAULT_HOST;
    return `${host.replace(/\/+$/, '')}/batch`;
  }

  isConfigured(): boolean {
    return this.apiKey() !== '';
  }

  /** Never throws; failures are only visible with FMG_DEBUG_TELEMETRY=true */
  async send(events: TelemetryEvent[]): Promise<void> {
    const apiKey = this.apiKey();
    if (events.length === 0 || !apiKey) {
      if (!apiKey) debugLog('PostHog not configured (no API key), skipping');
      return;
    }

    const batch: PostHogEvent[] = events.map((e) => ({
      event: e.event,
      distinct_id: this.context.instanceId,
      timestamp: e.timestamp,
      properties: { ...this.runtime, ...e.properties },
    }));

    try {
      const response = await fetch(this.batchUrl(), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ api_key: apiKey, batch }),
        signal: AbortSignal.timeout(SEND_TIMEOUT_MS),
      });
      debugLog(
        response.ok
          ? `PostHog accepted ${events.length} events`
          : `PostHog rejected batch: ${response.status} ${response.statusText}`
      );
    } catch (error) {
      debugLog('PostHog send failed', error instanceof Error ? error.message : error);
    }
  }
}
