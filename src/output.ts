import type { HappinessReport } from './happiness';

export function formatReport(report: HappinessReport): string {
  return JSON.stringify(report, null, 2);
}

/** One line per repository, for the stderr summary under --verbose. */
export function summaryLines(report: HappinessReport): string[] {
  return Object.entries(report).map(([repo, r]) => {
    const avg = r.average === null ? 'n/a' : r.average.toFixed(2);
    return `${repo}: ${avg} over ${r.count} commit(s) since ${r.since}`;
  });
}
