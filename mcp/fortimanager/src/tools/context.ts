/**
 * Shared plumbing for tool handlers
 */

import type { TaskWaitRecorder } from '@fmg-mcp/telemetry';
import type { FmgClient } from '../lib/fmg-client.js';
import type { ServerConfig } from '../lib/config.js';
import type { TaskProgressReporter } from '../lib/progress.js';
import { optionalString, type ToolArgs } from '../lib/args.js';
import { validateAdom } from '../lib/validation.js';

export interface ToolContext {
  client: FmgClient;
  config: ServerConfig;
  /** Present when the MCP request carried a progressToken */
  reportProgress?: TaskProgressReporter;
  /** Usage totals for wait_for_task outcomes */
  taskWaits?: TaskWaitRecorder;
}

/** Validated `adom` argument, falling back to DEFAULT_ADOM */
export function adomArg(args: ToolArgs, ctx: ToolContext): string {
  return validateAdom(optionalString(args, 'adom', ctx.config.defaultAdom));
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/** Task id from an exec response (`{ task: N }` or `{ taskid: N }`) */
export function taskIdOf(result: Record<string, unknown>): unknown {
  return result.task ?? result.taskid;
}
