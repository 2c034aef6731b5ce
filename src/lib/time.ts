/**
 * Timestamp and billing-period helpers.
 */

const PERIOD_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function isValidPeriod(value: string): boolean {
  return PERIOD_PATTERN.test(value);
}

/** Current year-month as YYYY-MM (local time). */
export function currentPeriod(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}`;
}

/** YYYY-MM-DD HH:mm:ss in local time, as used by audit entries. */
export function formatAuditTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** YYYYMMDD, used in invoice numbers. */
export function compactDate(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}
