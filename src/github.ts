import { HttpError, ResponseFormatError, TransportError } from './errors';

export type FetchLike = (url: string, init: { method: 'GET'; headers: Record<string, string> }) => Promise<Response>;

export type RequestParams = {
  headers?: Record<string, string>;
  fetch?: FetchLike;
  log?: (msg: string) => void;
};

export type Page = { records: unknown[]; nextUrl: string | null };

const LINK_ENTRY_RE = /^\s*<([^>]*)>\s*;(.*)$/s;
const REL_RE = /\brel\s*=\s*(?:"([^"]*)"|([^\s;]+))/i;

/**
 * Picks the `rel="next"` target out of a `Link` header value such as
 * `<https://api.github.com/...&page=2>; rel="next", <...&page=9>; rel="last"`.
 * A rel list (`rel="next last"`) counts when one of its tokens is `next`.
 */
export function nextPageLink(linkHeader: string | null | undefined): string | null {
  if (!linkHeader) return null;
  for (const entry of linkHeader.split(',')) {
    const m = LINK_ENTRY_RE.exec(entry);
    if (!m) continue;
    const rel = REL_RE.exec(m[2] ?? '');
    const rels = (rel?.[1] ?? rel?.[2] ?? '').toLowerCase().split(/\s+/);
    if (rels.includes('next') && m[1]) return m[1];
  }
  return null;
}

function describeJson(v: unknown): string {
  if (v === null) return 'null';
  return Array.isArray(v) ? 'array' : typeof v;
}

export async function queryPage(url: string, params: RequestParams = {}): Promise<Page> {
  const doFetch: FetchLike = params.fetch ?? fetch;
  let res: Response;
  try {
    res = await doFetch(url, { method: 'GET', headers: params.headers ?? {} });
  } catch (err) {
    throw new TransportError(url, err);
  }
  if (!res.ok) {
    await res.body?.cancel();
    throw new HttpError(url, res.status, res.statusText);
  }
  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    throw new ResponseFormatError(url, 'body is not valid JSON', err);
  }
  if (!Array.isArray(body)) throw new ResponseFormatError(url, `expected a JSON array, got ${describeJson(body)}`);
  const nextUrl = nextPageLink(res.headers.get('link'));
  params.log?.(`GET ${url} -> ${body.length} records${nextUrl ? '' : ' (last page)'}`);
  return { records: body, nextUrl };
}

/**
 * Every record behind a paginated GitHub listing, one page at a time.
 * Nothing is requested until the first `next()`; the following page is
 * requested only once the current one has been drained. Like any generator
 * the sequence is single-use, and an error on any page ends it.
 */
export async function* paginate(url: string, params: RequestParams = {}): AsyncGenerator<unknown, void, undefined> {
  let next: string | null = url;
  while (next !== null) {
    const page: Page = await queryPage(next, params);
    yield* page.records;
    next = page.nextUrl;
  }
}
