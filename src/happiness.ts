import type { Config } from './config';
import { adjustedDate, daysAgo } from './dates';
import { RepositoryError } from './errors';
import { paginate, type FetchLike } from './github';
import { scoreCommit } from './score';

export const REPOSITORIES = ['loanarranger', 'bankbucl', 'laalaaland', 'leadzeppelin', 'audit', 'hammurabi'] as const;

export type RepoName = (typeof REPOSITORIES)[number];

/** `average` is null when no commit in the window carried a score. */
export type AggregateResult = { average: number | null; count: number; since: string };

/** Keyed by repository name, in REPOSITORIES order. */
export type HappinessReport = Record<string, AggregateResult>;

export type HappinessOptions = {
  config: Config;
  fetch?: FetchLike;
  log?: (msg: string) => void;
  today?: Date;
};

export function commitsUrl(config: Config, repo: string, since: string): string {
  return `${config.apiUrl}/repos/${encodeURIComponent(config.org)}/${encodeURIComponent(repo)}/commits?since=${encodeURIComponent(since)}`;
}

export function authHeaders(config: Config): Record<string, string> {
  return {
    Authorization: `token ${config.token}`,
    Accept: 'application/vnd.github+json',
    'User-Agent': 'commit-happiness',
  };
}

export async function happinessSince(repo: string, since: string, opts: HappinessOptions): Promise<AggregateResult> {
  const url = commitsUrl(opts.config, repo, since);
  let sum = 0, count = 0, malformed = 0;
  for await (const commit of paginate(url, { headers: authHeaders(opts.config), fetch: opts.fetch, log: opts.log })) {
    const r = scoreCommit(commit);
    if (r.kind === 'score') { sum += r.value; count++; }
    else if (r.reason === 'not-a-digit') malformed++;
  }
  if (malformed > 0) opts.log?.(`${repo}: ignored ${malformed} commit(s) with a non-digit happiness marker`);
  return { average: count === 0 ? null : sum / count, count, since };
}

/**
 * Aggregates every repository in REPOSITORIES concurrently. The batch fails
 * as soon as one repository fails, with a RepositoryError naming it.
 */
export async function happinessSinceForAll(since: string, opts: HappinessOptions): Promise<HappinessReport> {
  const entries = await Promise.all(REPOSITORIES.map(async (repo): Promise<[RepoName, AggregateResult]> => {
    try {
      return [repo, await happinessSince(repo, since, opts)];
    } catch (err) {
      throw new RepositoryError(repo, err);
    }
  }));
  return Object.fromEntries(entries);
}

export const sinceAYearAgo = (opts: HappinessOptions) => happinessSinceForAll(daysAgo(365, opts.today), opts);
export const sinceAWeekAgo = (opts: HappinessOptions) => happinessSinceForAll(daysAgo(7, opts.today), opts);
export const since30DaysAgo = (opts: HappinessOptions) => happinessSinceForAll(daysAgo(30, opts.today), opts);
export const thisYear = (opts: HappinessOptions) => happinessSinceForAll(adjustedDate('first-day-of-year', opts.today), opts);
export const thisMonth = (opts: HappinessOptions) => happinessSinceForAll(adjustedDate('first-day-of-month', opts.today), opts);
