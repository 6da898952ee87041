/**
 * Device status enumerations from the device manager database.
 * These are independent of the task-state codes in task-poller.ts.
 */

const CONN_STATUS: Readonly<Record<number, string>> = { 0: 'unknown', 1: 'up', 2: 'down' };
const CONF_STATUS: Readonly<Record<number, string>> = { 0: 'unknown', 1: 'in_sync', 2: 'out_of_sync' };
const DB_STATUS: Readonly<Record<number, string>> = { 0: 'unknown', 1: 'no_changes', 2: 'modified' };
const DEV_STATUS: Readonly<Record<number, string>> = {
  0: 'none',
  1: 'unknown',
  2: 'checkedin',
  3: 'in_progress',
  4: 'installed',
  5: 'aborted',
};

const STATUS_FIELDS: ReadonlyArray<[string, Readonly<Record<number, string>>]> = [
  ['conn_status', CONN_STATUS],
  ['conf_status', CONF_STATUS],
  ['db_status', DB_STATUS],
  ['dev_status', DEV_STATUS],
];

function lookup(table: Readonly<Record<number, string>>, value: unknown): string {
  if (typeof value !== 'number') return 'unknown';
  return table[value] ?? 'unknown';
}

/** Copy of `device` with a `<field>_str` label beside each status field present */
export function decodeDeviceStatus(device: Record<string, unknown>): Record<string, unknown> {
  const decoded: Record<string, unknown> = { ...device };
  for (const [field, table] of STATUS_FIELDS) {
    if (field in device) {
      decoded[`${field}_str`] = lookup(table, device[field]);
    }
  }
  return decoded;
}
