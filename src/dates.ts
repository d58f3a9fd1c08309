export type DateAdjustment = 'first-day-of-year' | 'first-day-of-month';

function pad(n: number, width: number): string { return String(n).padStart(width, '0'); }

/** Local calendar date as `YYYY-MM-DD`. */
export function formatIsoDate(d: Date): string {
  return `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1, 2)}-${pad(d.getDate(), 2)}`;
}

export function daysAgo(n: number, today: Date = new Date()): string {
  if (!Number.isInteger(n) || n < 0) throw new RangeError(`daysAgo expects a non-negative integer, got ${n}`);
  // Date rolls a zero or negative day back into the previous month.
  return formatIsoDate(new Date(today.getFullYear(), today.getMonth(), today.getDate() - n));
}

export function adjustedDate(which: DateAdjustment, today: Date = new Date()): string {
  switch (which) {
    case 'first-day-of-year': return formatIsoDate(new Date(today.getFullYear(), 0, 1));
    case 'first-day-of-month': return formatIsoDate(new Date(today.getFullYear(), today.getMonth(), 1));
    default: {
      const unknown: never = which;
      throw new RangeError(`Unsupported date adjustment: ${String(unknown)}`);
    }
  }
}
