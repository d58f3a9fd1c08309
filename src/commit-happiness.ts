import 'dotenv/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs, resolveAction, type Args } from './cli';
import { loadConfig, type Config } from './config';
import type { FetchLike } from './github';
import { formatReport, summaryLines } from './output';

export { parseArgs, resolveAction, ACTIONS, USAGE } from './cli';
export { loadConfig } from './config';
export { daysAgo, adjustedDate, formatIsoDate } from './dates';
export { happiness, scoreCommit } from './score';
export { nextPageLink, queryPage, paginate } from './github';
export { REPOSITORIES, happinessSince, happinessSinceForAll, sinceAYearAgo, sinceAWeekAgo, since30DaysAgo, thisYear, thisMonth } from './happiness';
export { formatReport } from './output';

export type RunDeps = {
  config: Config;
  fetch?: FetchLike;
  today?: Date;
  out?: (line: string) => void;
};

/** Dispatches one action and returns the exit status. */
export async function run(args: Args, deps: RunDeps): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line));
  function log(...s: unknown[]) { if (args.verbose) console.error(...s.map(String)); }
  const action = resolveAction(args.action);
  if (!action) {
    out(`Unknown action: ${args.action}`);
    return 0;
  }
  process.stderr.write(`Fetching commits for ${deps.config.org} (${args.action}) ...\n`);
  const report = await action({ config: deps.config, fetch: deps.fetch, today: deps.today, log });
  for (const line of summaryLines(report)) log(line);
  out(formatReport(report));
  return 0;
}

export async function main() {
  const args = parseArgs();
  const config = loadConfig();
  process.exit(await run(args, { config }));
}

const __filename = fileURLToPath(import.meta.url);
if (process.argv[1] && path.resolve(process.argv[1]) === path.resolve(__filename)) {
  main().catch((err: unknown) => {
    const verbose = process.argv.includes('--verbose');
    if (verbose) console.error(err);
    else console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
