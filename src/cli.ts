import { since30DaysAgo, sinceAWeekAgo, sinceAYearAgo, thisMonth, thisYear, type HappinessOptions, type HappinessReport } from './happiness';

export type Args = { action: string; verbose: boolean };

export type Action = (opts: HappinessOptions) => Promise<HappinessReport>;

export const ACTIONS: Readonly<Record<string, Action>> = {
  'past-month': since30DaysAgo,
  'past-week': sinceAWeekAgo,
  'past-year': sinceAYearAgo,
  'this-year': thisYear,
  'this-month': thisMonth,
};

export const USAGE = `Usage: commit-happiness <action> [--verbose]\nActions: ${Object.keys(ACTIONS).join(', ')}`;

export function parseArgs(argv: string[] = process.argv.slice(2)): Args {
  const positional: string[] = [];
  let verbose = false;
  for (const t of argv) {
    if (t === '--verbose') verbose = true;
    else if (t.startsWith('--')) { console.error(`Unknown arg: ${t}`); process.exit(2); }
    else positional.push(t);
  }
  // Anything after the action is accepted and ignored.
  const action = positional[0];
  if (!action) {
    console.error(USAGE);
    process.exit(2);
  }
  return { action, verbose };
}

export function resolveAction(name: string): Action | null {
  return Object.prototype.hasOwnProperty.call(ACTIONS, name) ? ACTIONS[name] ?? null : null;
}
