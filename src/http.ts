export type FetchLike = typeof fetch;

export interface JsonRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  /** Retries for transient errors (default: 3). */
  retries?: number;
  /** Base delay for exponential backoff in ms (default: 200). */
  backoffMs?: number;
  /** Per-attempt timeout in ms (default: 30s). */
  timeoutMs?: number;
  /** Optional request-per-second cap for this origin (best-effort). */
  rps?: number;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string,
    public readonly responseText?: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

function withQuery(url: string, query?: JsonRequestOptions['query']) {
  if (!query) return url;
  const u = new URL(url);
  for (const [k, v] of Object.entries(query)) {
    if (v === undefined) continue;
    u.searchParams.set(k, String(v));
  }
  return u.toString();
}

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

// Simple global limiter keyed by origin.
const lastRequestAt = new Map<string, number>();

function originOf(url: string) {
  try {
    return new URL(url).origin;
  } catch {
    return 'unknown';
  }
}

async function throttle(url: string, rps?: number) {
  if (!rps || rps <= 0) return;
  const minGap = 1000 / rps;
  const key = originOf(url);
  const last = lastRequestAt.get(key) ?? 0;
  const now = Date.now();
  const wait = last + minGap - now;
  if (wait > 0) await sleep(wait);
  lastRequestAt.set(key, Date.now());
}

function parseRetryAfterMs(v: string | null): number | undefined {
  if (!v) return undefined;
  const sec = Number(v);
  if (Number.isFinite(sec) && sec >= 0) return sec * 1000;
  const at = Date.parse(v);
  if (Number.isFinite(at)) return Math.max(0, at - Date.now());
  return undefined;
}

function isTransientStatus(status: number) {
  return status === 429 || status >= 500;
}

/**
 * JSON request with bounded retries. Non-transient HTTP errors are thrown
 * immediately as `HttpError`; 429/5xx and network failures are retried with
 * exponential backoff (or `Retry-After` when the server sends one).
 *
 * Callers own the response type; validate anything they do not trust.
 */
export async function requestJson(
  url: string,
  opts: JsonRequestOptions = {},
  fetcher: FetchLike = fetch,
): Promise<unknown> {
  const finalUrl = withQuery(url, opts.query);
  const retries = opts.retries ?? 3;
  const backoffMs = opts.backoffMs ?? 200;
  const timeoutMs = opts.timeoutMs ?? 30_000;

  let attempt = 0;
  while (true) {
    attempt++;
    let res: Response;
    try {
      await throttle(finalUrl, opts.rps);
      res = await fetcher(finalUrl, {
        method: opts.method ?? 'GET',
        headers: {
          accept: 'application/json',
          ...(opts.body !== undefined ? { 'content-type': 'application/json' } : {}),
          ...(opts.headers ?? {}),
        },
        body: opts.body !== undefined ? JSON.stringify(opts.body) : undefined,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (e) {
      // network errors and timeouts
      if (attempt <= retries) {
        await sleep(backoffMs * 2 ** (attempt - 1));
        continue;
      }
      throw e;
    }

    if (!res.ok) {
      const txt = await res.text().catch(() => undefined);
      const retryAfterMs = parseRetryAfterMs(res.headers.get('retry-after'));
      if (attempt <= retries && isTransientStatus(res.status)) {
        await sleep(retryAfterMs ?? backoffMs * 2 ** (attempt - 1));
        continue;
      }
      throw new HttpError(`HTTP ${res.status} for ${finalUrl}`, res.status, finalUrl, txt, retryAfterMs);
    }

    // empty body
    if (res.status === 204) return undefined;

    const text = await res.text();
    if (!text) return undefined;
    return JSON.parse(text);
  }
}
