export type NoScoreReason = 'no-message' | 'no-marker' | 'not-a-digit';

export type ScoreResult =
  | { kind: 'score'; value: number }
  | { kind: 'none'; reason: NoScoreReason };

// `.` stops at line breaks, so the greedy prefix lands on the last marker of the first line that has one.
const HAPPINESS_RE = /.*h:(.)/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function commitMessage(commit: unknown): string | null {
  if (!isRecord(commit)) return null;
  const inner = commit.commit;
  if (!isRecord(inner)) return null;
  return typeof inner.message === 'string' ? inner.message : null;
}

export function scoreCommit(commit: unknown): ScoreResult {
  const message = commitMessage(commit);
  if (!message) return { kind: 'none', reason: 'no-message' };
  const m = HAPPINESS_RE.exec(message);
  if (!m) return { kind: 'none', reason: message.includes('h:') ? 'not-a-digit' : 'no-marker' };
  const ch = m[1] ?? '';
  if (!/^[0-9]$/.test(ch)) return { kind: 'none', reason: 'not-a-digit' };
  return { kind: 'score', value: Number(ch) };
}

/** Happiness score of a commit, or null when it has none. Never throws. */
export function happiness(commit: unknown): number | null {
  const r = scoreCommit(commit);
  return r.kind === 'score' ? r.value : null;
}
