/**
 * Progress Reporting Utilities
 *
 * Relays FortiManager task progress to the MCP client through the standard
 * notifications/progress mechanism. Only active when the caller supplied a
 * progressToken in the request's _meta.
 */

import type { ProgressToken, ServerNotification } from '@modelcontextprotocol/sdk/types.js';
import { log } from './logger.js';
import type { PollCallback, TaskPayload, TaskState } from './task-poller.js';

export type NotificationSender = (notification: ServerNotification) => Promise<void>;

export interface ProgressUpdate {
  percent: number;
  message: string;
}

/** Task `percent` as a number in 0..100, or undefined when absent */
export function readTaskPercent(task: TaskPayload): number | undefined {
  const raw = task.percent;
  const value = typeof raw === 'string' ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isFinite(value)) return undefined;
  return Math.min(Math.max(value, 0), 100);
}

export class TaskProgressReporter {
  private readonly token: ProgressToken;
  private readonly send: NotificationSender;
  private readonly tool: string;
  private lastPercent = -1;
  private readonly startTime = Date.now();

  constructor(tool: string, token: ProgressToken, send: NotificationSender) {
    this.tool = tool;
    this.token = token;
    this.send = send;
  }

  /**
   * Send one update. Repeats of the last percentage are skipped so a long
   * wait on a stalled task does not flood the client.
   */
  async update(percent: number, message: string): Promise<void> {
    if (percent === this.lastPercent) return;
    this.lastPercent = percent;

    log.debug('Progress update', {
      tool: this.tool,
      percent,
      message,
      elapsed: Date.now() - this.startTime,
    });

    try {
      await this.send({
        method: 'notifications/progress',
        params: {
          progressToken: this.token,
          progress: percent,
          total: 100,
          message,
        },
      });
    } catch (error) {
      // Best-effort; a dropped notification must not fail the tool call
      log.debug('Could not send MCP progress notification', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /** Poll hook for waitForTask */
  asPollCallback(taskId: number): PollCallback {
    return async (task: TaskPayload, state: TaskState, attempt: number) => {
      const percent = readTaskPercent(task) ?? (state === 'done' ? 100 : 0);
      await this.update(percent, `Task ${taskId} ${state} (poll ${attempt})`);
    };
  }
}
