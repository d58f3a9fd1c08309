import { describe, it, expect, vi } from 'vitest';
import { HttpError, ResponseFormatError, TransportError } from '../src/errors';
import { nextPageLink, paginate, queryPage, type FetchLike } from '../src/github';
import { fakeFetch } from './fake-github';

const P1 = 'https://api.test/repos/acme/widgets/commits?since=2024-01-01';
const P2 = 'https://api.test/repositories/1/commits?since=2024-01-01&page=2';
const P3 = 'https://api.test/repositories/1/commits?since=2024-01-01&page=3';

function threePages() {
  return fakeFetch({
    [P1]: { body: [{ id: 1 }, { id: 2 }], link: `<${P2}>; rel="next", <${P3}>; rel="last"` },
    [P2]: { body: [{ id: 3 }, { id: 4 }], link: `<${P1}>; rel="prev", <${P3}>; rel="next", <${P3}>; rel="last"` },
    [P3]: { body: [{ id: 5 }] },
  });
}

async function collect(it: AsyncIterable<unknown>): Promise<unknown[]> {
  const out: unknown[] = [];
  for await (const r of it) out.push(r);
  return out;
}

describe('nextPageLink', () => {
  it('finds the next relation wherever it sits', () => {
    expect(nextPageLink(`<${P2}>; rel="next", <${P3}>; rel="last"`)).toBe(P2);
    expect(nextPageLink(`<${P3}>; rel="last", <${P2}>; rel="next"`)).toBe(P2);
  });

  it('accepts a rel list containing next', () => {
    expect(nextPageLink(`<${P3}>; rel="next last"`)).toBe(P3);
  });

  it('returns null when there is no next page', () => {
    expect(nextPageLink(`<${P1}>; rel="prev", <${P1}>; rel="first"`)).toBeNull();
    expect(nextPageLink('')).toBeNull();
    expect(nextPageLink(null)).toBeNull();
    expect(nextPageLink(undefined)).toBeNull();
  });

  it('does not mistake similar rel names for next', () => {
    expect(nextPageLink(`<${P2}>; rel="nextish"`)).toBeNull();
  });
});

describe('queryPage', () => {
  it('sends one GET with the given headers and returns records plus next link', async () => {
    const fetch = threePages();
    const page = await queryPage(P1, { headers: { Authorization: 'token test-secret' }, fetch });
    expect(page).toEqual({ records: [{ id: 1 }, { id: 2 }], nextUrl: P2 });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch).toHaveBeenCalledWith(P1, { method: 'GET', headers: { Authorization: 'token test-secret' } });
  });

  it('reads a lower-case link header', async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response('[]', { headers: { link: `<${P2}>; rel="next"` } }));
    expect(await queryPage(P1, { fetch })).toEqual({ records: [], nextUrl: P2 });
  });

  it('returns a null next link on the last page', async () => {
    expect((await queryPage(P3, { fetch: threePages() })).nextUrl).toBeNull();
  });

  it('raises HttpError on a non-2xx status', async () => {
    const fetch = fakeFetch({});
    await expect(queryPage(P1, { fetch })).rejects.toBeInstanceOf(HttpError);
    await expect(queryPage(P1, { fetch })).rejects.toMatchObject({ status: 404, url: P1 });
  });

  it('cancels the unread body of a failed response', async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({ cancel() { cancelled = true; } });
    const fetch = vi.fn<FetchLike>(async () => new Response(body, { status: 502, statusText: 'Bad Gateway' }));
    await expect(queryPage(P1, { fetch })).rejects.toMatchObject({ status: 502 });
    expect(cancelled).toBe(true);
  });

  it('raises ResponseFormatError on a body that is not JSON', async () => {
    const fetch = fakeFetch({ [P1]: { body: '<html>oops</html>' } });
    await expect(queryPage(P1, { fetch })).rejects.toBeInstanceOf(ResponseFormatError);
  });

  it('raises ResponseFormatError on a JSON body that is not an array', async () => {
    const fetch = fakeFetch({ [P1]: { body: { message: 'Git Repository is empty.' } } });
    await expect(queryPage(P1, { fetch })).rejects.toThrow(`Unexpected response body from ${P1}: expected a JSON array, got object`);
  });

  it('wraps network failures in TransportError', async () => {
    const fetch = vi.fn<FetchLike>(async () => { throw new TypeError('fetch failed'); });
    await expect(queryPage(P1, { fetch })).rejects.toBeInstanceOf(TransportError);
    await expect(queryPage(P1, { fetch })).rejects.toThrow(`Request to ${P1} failed: fetch failed`);
  });
});

describe('paginate', () => {
  it('yields every record from every page in order with one request per page', async () => {
    const fetch = threePages();
    expect(await collect(paginate(P1, { fetch }))).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }, { id: 4 }, { id: 5 }]);
    expect(fetch.mock.calls.map(c => c[0])).toEqual([P1, P2, P3]);
  });

  it('fetches each page only when the consumer reaches it', async () => {
    const fetch = threePages();
    const seq = paginate(P1, { fetch });
    expect(fetch).toHaveBeenCalledTimes(0);

    expect(await seq.next()).toEqual({ done: false, value: { id: 1 } });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(await seq.next()).toEqual({ done: false, value: { id: 2 } });
    expect(fetch).toHaveBeenCalledTimes(1);

    expect(await seq.next()).toEqual({ done: false, value: { id: 3 } });
    expect(fetch).toHaveBeenCalledTimes(2);
    await seq.next();
    expect(await seq.next()).toEqual({ done: false, value: { id: 5 } });
    expect(fetch).toHaveBeenCalledTimes(3);

    expect(await seq.next()).toEqual({ done: true, value: undefined });
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it('cannot be traversed twice', async () => {
    const fetch = threePages();
    const seq = paginate(P1, { fetch });
    expect(await collect(seq)).toHaveLength(5);
    expect(await collect(seq)).toEqual([]);
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it('stops fetching when the consumer stops early', async () => {
    const fetch = threePages();
    const seq = paginate(P1, { fetch });
    for await (const r of seq) { if (r) break; }
    expect(await seq.next()).toEqual({ done: true, value: undefined });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('aborts on a failing page after yielding the earlier ones', async () => {
    const fetch = fakeFetch({
      [P1]: { body: [{ id: 1 }], link: `<${P2}>; rel="next"` },
      [P2]: { body: { message: 'Server Error' }, status: 500 },
    });
    const seen: unknown[] = [];
    await expect((async () => { for await (const r of paginate(P1, { fetch })) seen.push(r); })()).rejects.toMatchObject({ status: 500, url: P2 });
    expect(seen).toEqual([{ id: 1 }]);
  });

  it('passes page diagnostics to the log sink', async () => {
    const log = vi.fn();
    await collect(paginate(P1, { fetch: threePages(), log }));
    expect(log.mock.calls.map(c => c[0])).toEqual([
      `GET ${P1} -> 2 records`,
      `GET ${P2} -> 2 records`,
      `GET ${P3} -> 1 records (last page)`,
    ]);
  });
});
