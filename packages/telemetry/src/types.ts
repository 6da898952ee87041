/**
 * Telemetry Types
 */

/** Property values that may leave the process; nested data never does */
export type PropertyValue = string | number | boolean;

export type EventProperties = Record<string, PropertyValue>;

/** One row of a PostHog batch */
export interface TelemetryEvent {
  event: string;
  /** ISO timestamp */
  timestamp: string;
  properties: EventProperties;
}

/**
 * Context about the running instance
 */
export interface TelemetryContext {
  /** Server name, e.g. fortimanager-mcp */
  packageName: string;
  packageVersion: string;
  nodeVersion: string;
  platform: string;
  arch: string;
  /** Random UUID per process */
  instanceId: string;
}

export interface TelemetryTransport {
  send(events: TelemetryEvent[]): Promise<void>;
}

export type LifecycleEvent = 'startup' | 'shutdown' | 'error';

/** A finished tool call. Only the catalog category and tool name are kept. */
export interface ToolCallRecord {
  tool: string;
  /** Absent for names outside the catalog */
  category?: string;
  durationMs: number;
  success: boolean;
  /** The thrown value of a failed call; only its classification is kept */
  error?: unknown;
}

/** Per-tool totals between two flushes */
export interface ToolUsage {
  tool: string;
  category: string;
  calls: number;
  failures: number;
  totalMs: number;
  maxMs: number;
  /** classifyError() category to count */
  errors: Record<string, number>;
}

export type TaskWaitState = 'done' | 'error' | 'cancelled' | 'timeout';

/** How a wait_for_task call ended */
export interface TaskWaitRecord {
  state: TaskWaitState;
  attempts: number;
  waitedMs: number;
}

export interface TaskWaitUsage {
  state: TaskWaitState;
  waits: number;
  attempts: number;
  waitedMs: number;
}

export interface TaskWaitRecorder {
  recordTaskWait(record: TaskWaitRecord): void;
}
