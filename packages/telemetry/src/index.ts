/**
 * @fmg-mcp/telemetry
 *
 * Anonymous usage telemetry for the FortiManager MCP server.
 *
 * Tool calls are not sent one by one. They are totalled per tool between
 * flushes, together with per-category totals and wait_for_task outcomes,
 * and each flush becomes a single PostHog batch.
 *
 * Usage:
 *   import { TelemetryClient, setupGlobalErrorHandlers } from '@fmg-mcp/telemetry';
 *
 *   const telemetry = new TelemetryClient('fortimanager-mcp', '0.1.0');
 *   setupGlobalErrorHandlers(telemetry);
 *
 *   telemetry.recordToolCall({ tool: 'list_adoms', category: 'system', durationMs: 245, success: true });
 *   telemetry.recordTaskWait({ state: 'done', attempts: 4, waitedMs: 15_020 });
 *   telemetry.lifecycle('startup', { transport: 'stdio' });
 *
 * Privacy:
 *   - Tool names outside the catalog are reported as unknown_tool
 *   - Errors are reduced to a category; messages never leave the process
 *   - Lifecycle properties pass through scrubProperties(), which drops
 *     hosts, ADOMs and device names
 *
 * Opt-out:
 *   Set FMG_TELEMETRY_ENABLED=false or DO_NOT_TRACK=1
 */

import { randomUUID } from 'node:crypto';
import os from 'node:os';
import type {
  EventProperties,
  LifecycleEvent,
  TaskWaitRecord,
  TaskWaitRecorder,
  TaskWaitState,
  TaskWaitUsage,
  TelemetryContext,
  TelemetryEvent,
  TelemetryTransport,
  ToolCallRecord,
  ToolUsage,
} from './types.js';
import { PostHogTransport } from './posthog.js';
import { classifyError, debugLog, isTelemetryEnabled, scrubProperties } from './utils.js';

export type {
  EventProperties,
  LifecycleEvent,
  PropertyValue,
  TaskWaitRecord,
  TaskWaitRecorder,
  TaskWaitState,
  TaskWaitUsage,
  TelemetryContext,
  TelemetryEvent,
  TelemetryTransport,
  ToolCallRecord,
  ToolUsage,
} from './types.js';
export { PostHogTransport, type PostHogOptions } from './posthog.js';
export { classifyError, scrubProperties, setupGlobalErrorHandlers } from './utils.js';

export interface TelemetryOptions {
  /** Defaults to PostHog */
  transport?: TelemetryTransport;
  env?: NodeJS.ProcessEnv;
  /** Periodic and beforeExit flushing (default: true) */
  autoFlush?: boolean;
  flushIntervalMs?: number;
}

export interface UsageSnapshot {
  tools: ToolUsage[];
  taskWaits: TaskWaitUsage[];
  pendingEvents: number;
}

const UNKNOWN_TOOL = 'unknown_tool';
const UNKNOWN_CATEGORY = 'unknown';
const MAX_PENDING_EVENTS = 50;
const DEFAULT_FLUSH_INTERVAL_MS = 60_000;

export class TelemetryClient implements TaskWaitRecorder {
  private readonly enabled: boolean;
  private readonly context: TelemetryContext;
  private readonly transport: TelemetryTransport;

  private tools = new Map<string, ToolUsage>();
  private taskWaits = new Map<TaskWaitState, TaskWaitUsage>();
  private pending: TelemetryEvent[] = [];
  private inFlight: Promise<void> | null = null;
  private flushTimer: NodeJS.Timeout | null = null;

  constructor(serverName: string, serverVersion: string, options: TelemetryOptions = {}) {
    const env = options.env ?? process.env;
    this.enabled = isTelemetryEnabled(env);

    this.context = {
      packageName: serverName,
      packageVersion: serverVersion,
      nodeVersion: process.version,
      platform: os.platform(),
      arch: os.arch(),
      instanceId: randomUUID(),
    };
    this.transport = options.transport ?? new PostHogTransport(this.context, { env });

    if (!this.enabled) {
      debugLog('Telemetry disabled');
      return;
    }

    debugLog(`Telemetry enabled for ${serverName}@${serverVersion}`, { instanceId: this.context.instanceId });
    if (options.autoFlush ?? true) {
      this.startAutoFlush(options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS);
    }
  }

  /** Add one finished tool call to its tool's totals */
  recordToolCall(call: ToolCallRecord): void {
    if (!this.enabled) return;

    const known = call.category !== undefined;
    const tool = known ? call.tool : UNKNOWN_TOOL;
    let usage = this.tools.get(tool);
    if (!usage) {
      usage = {
        tool,
        category: call.category ?? UNKNOWN_CATEGORY,
        calls: 0,
        failures: 0,
        totalMs: 0,
        maxMs: 0,
        errors: {},
      };
      this.tools.set(tool, usage);
    }

    const durationMs = Math.max(0, Math.round(call.durationMs));
    usage.calls++;
    usage.totalMs += durationMs;
    usage.maxMs = Math.max(usage.maxMs, durationMs);

    if (!call.success) {
      usage.failures++;
      const type = classifyError(call.error);
      usage.errors[type] = (usage.errors[type] ?? 0) + 1;
    }
  }

  recordTaskWait(record: TaskWaitRecord): void {
    if (!this.enabled) return;

    const usage = this.taskWaits.get(record.state) ?? { state: record.state, waits: 0, attempts: 0, waitedMs: 0 };
    usage.waits++;
    usage.attempts += record.attempts;
    usage.waitedMs += Math.max(0, Math.round(record.waitedMs));
    this.taskWaits.set(record.state, usage);
  }

  lifecycle(event: LifecycleEvent, properties?: Record<string, unknown>): void {
    this.push(`mcp_${event}`, { ...scrubProperties(properties), success: event !== 'error' });
  }

  /** Record a process-level error and send it straight away */
  captureError(error: unknown, context?: string): void {
    if (!this.enabled) return;
    this.push('mcp_error', scrubProperties({ context: context || 'uncaught_error', error_type: classifyError(error) }));
    void this.flush();
  }

  /**
   * Send everything recorded since the last flush. Concurrent callers
   * share the flush already in progress.
   */
  async flush(): Promise<void> {
    if (!this.enabled) return;
    if (this.inFlight) return this.inFlight;

    const batch = this.drain();
    if (batch.length === 0) return;

    debugLog(`Flushing ${batch.length} events`);
    this.inFlight = this.transport
      .send(batch)
      .catch((error: unknown) => debugLog('Flush error', error))
      .finally(() => {
        this.inFlight = null;
      });
    return this.inFlight;
  }

  /** Totals not yet flushed */
  snapshot(): UsageSnapshot {
    return {
      tools: [...this.tools.values()].map((usage) => ({ ...usage, errors: { ...usage.errors } })),
      taskWaits: [...this.taskWaits.values()].map((usage) => ({ ...usage })),
      pendingEvents: this.pending.length,
    };
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  getInstanceId(): string {
    return this.context.instanceId;
  }

  getContext(): Readonly<TelemetryContext> {
    return this.context;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private push(event: string, properties: EventProperties): void {
    if (!this.enabled) return;
    this.pending.push({ event, timestamp: new Date().toISOString(), properties });
    // Oldest lifecycle events go first
    if (this.pending.length > MAX_PENDING_EVENTS) {
      this.pending.shift();
    }
  }

  /** Turn totals into batch rows and reset them */
  private drain(): TelemetryEvent[] {
    const timestamp = new Date().toISOString();
    const batch: TelemetryEvent[] = [...this.pending];

    const categories = new Map<string, { calls: number; failures: number; totalMs: number }>();
    for (const usage of this.tools.values()) {
      const errorCounts: EventProperties = {};
      for (const [type, count] of Object.entries(usage.errors)) {
        errorCounts[`errors_${type}`] = count;
      }
      batch.push({
        event: 'tool_usage',
        timestamp,
        properties: {
          tool: usage.tool,
          category: usage.category,
          calls: usage.calls,
          failures: usage.failures,
          total_ms: usage.totalMs,
          max_ms: usage.maxMs,
          avg_ms: Math.round(usage.totalMs / usage.calls),
          ...errorCounts,
        },
      });

      const category = categories.get(usage.category) ?? { calls: 0, failures: 0, totalMs: 0 };
      category.calls += usage.calls;
      category.failures += usage.failures;
      category.totalMs += usage.totalMs;
      categories.set(usage.category, category);
    }

    for (const [category, totals] of categories) {
      batch.push({
        event: 'category_usage',
        timestamp,
        properties: { category, calls: totals.calls, failures: totals.failures, total_ms: totals.totalMs },
      });
    }

    for (const usage of this.taskWaits.values()) {
      batch.push({
        event: 'task_wait',
        timestamp,
        properties: { state: usage.state, waits: usage.waits, attempts: usage.attempts, waited_ms: usage.waitedMs },
      });
    }

    this.pending = [];
    this.tools = new Map();
    this.taskWaits = new Map();
    return batch;
  }

  private startAutoFlush(intervalMs: number): void {
    this.flushTimer = setInterval(() => {
      void this.flush();
    }, intervalMs);
    this.flushTimer.unref();

    process.once('beforeExit', () => {
      this.stopAutoFlush();
      void this.flush();
    });
  }

  private stopAutoFlush(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
  }
}
