import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MASK_VALUE, redactArgs, sanitizeForLogging } from '../src/lib/sanitize.js';
import { configureLogger, formatLog, log, logToolCall, parseLogLevel } from '../src/lib/logger.js';

describe('sanitizeForLogging', () => {
  it('masks credential keys in any spelling', () => {
    expect(
      sanitizeForLogging({
        user: 'admin',
        passwd: 'test-secret',
        'Api-Token': 'test-token',
        adm_pass: 'test-secret',
        session: 'abc',
      })
    ).toEqual({
      user: 'admin',
      passwd: MASK_VALUE,
      'Api-Token': MASK_VALUE,
      adm_pass: MASK_VALUE,
      session: MASK_VALUE,
    });
  });

  it('masks nested values inside arrays', () => {
    expect(sanitizeForLogging({ params: [{ url: '/sys/login/user', data: { passwd: 'x' } }] })).toEqual({
      params: [{ url: '/sys/login/user', data: { passwd: MASK_VALUE } }],
    });
  });

  it('masks long hex strings wherever they appear', () => {
    expect(sanitizeForLogging(['0123456789abcdef0123456789', 'deadbeef'])).toEqual([MASK_VALUE, 'deadbeef']);
  });

  it('stops at the maximum depth', () => {
    expect(sanitizeForLogging('deep', 11)).toBe('<MAX_DEPTH>');
  });
});

describe('redactArgs', () => {
  it('shortens script bodies and masks secrets', () => {
    expect(redactArgs({ name: 'set-dns', content: 'config system dns\nend', admin_pass: 'test-secret' })).toEqual({
      name: 'set-dns',
      content: '[21 chars]',
      admin_pass: MASK_VALUE,
    });
  });
});

describe('logger', () => {
  let dir: string | undefined;

  afterEach(() => {
    configureLogger({ level: 'INFO', file: undefined });
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('parses level names', () => {
    expect(parseLogLevel('debug')).toBe('DEBUG');
    expect(parseLogLevel('warning')).toBe('WARN');
    expect(parseLogLevel('verbose')).toBe('INFO');
    expect(parseLogLevel(undefined)).toBe('INFO');
  });

  it('formats lines with and without data', () => {
    const timestamp = '2026-01-01T00:00:00.000Z';
    expect(formatLog({ timestamp, level: 'INFO', message: 'hello' })).toBe('[2026-01-01T00:00:00.000Z] [INFO] hello');
    expect(formatLog({ timestamp, level: 'WARN', message: 'slow', data: { ms: 5 } })).toBe(
      '[2026-01-01T00:00:00.000Z] [WARN] slow {"ms":5}'
    );
  });

  it('writes to stderr above the threshold only', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    configureLogger({ level: 'WARN' });

    log.info('quiet');
    log.warn('loud');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toMatch(/\[WARN\] loud$/);
  });

  it('appends JSON lines to LOG_FILE with masked arguments', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    dir = mkdtempSync(join(tmpdir(), 'fmg-log-'));
    const file = join(dir, 'audit.log');
    configureLogger({ level: 'INFO', file });

    logToolCall('connect', { host: 'fmg.test', password: 'test-secret' }, { success: true }, 12);

    const entry = JSON.parse(readFileSync(file, 'utf8').trim());
    expect(entry.level).toBe('INFO');
    expect(entry.message).toBe('Tool call: connect');
    expect(entry.data).toEqual({
      tool: 'connect',
      args: { host: 'fmg.test', password: MASK_VALUE },
      success: true,
      durationMs: 12,
    });
  });

  it('logs failed tool calls at WARN', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    logToolCall('get_task', { task_id: 7 }, { success: false, error: 'boom' }, 3);
    expect(String(stderr.mock.calls[0][0])).toContain('[WARN] Tool call failed: get_task');
  });
});
