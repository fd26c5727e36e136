export type FetchLike = typeof fetch;

export interface JsonRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | undefined>;
  /** JSON body, or form fields when `form` is set. */
  body?: unknown;
  /** Send `body` as application/x-www-form-urlencoded. */
  form?: boolean;
  /** Retries for transient errors (default: 3). */
  retries?: number;
  /** Base delay for exponential backoff in ms (default: 200). */
  backoffMs?: number;
  /** Optional request-per-second cap for this call (best-effort). */
  rps?: number;
  signal?: AbortSignal;
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

  private body(): unknown {
    if (!this.responseText) return undefined;
    try {
      return JSON.parse(this.responseText);
    } catch {
      return undefined;
    }
  }

  /** `error` field of an OAuth/JSON error body, if any. */
  errorCode(): string | undefined {
    const parsed = this.body();
    if (parsed && typeof parsed === 'object' && 'error' in parsed) {
      const err = parsed.error;
      if (typeof err === 'string') return err;
      if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') return err.code;
    }
    return undefined;
  }

  /** `reason` of each entry in a Google-style `error.errors` list. */
  errorReasons(): string[] {
    const parsed = this.body();
    if (!parsed || typeof parsed !== 'object' || !('error' in parsed)) return [];
    const err = parsed.error;
    if (!err || typeof err !== 'object' || !('errors' in err) || !Array.isArray(err.errors)) return [];
    const reasons: string[] = [];
    for (const entry of err.errors) {
      if (entry && typeof entry === 'object' && 'reason' in entry && typeof entry.reason === 'string') {
        reasons.push(entry.reason);
      }
    }
    return reasons;
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

const sleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });

// Simple global limiter keyed by origin.
const lastRequestAt = new Map<string, number>();

function originOf(url: string) {
  try {
    return new URL(url).origin;
  } catch {
    return 'unknown';
  }
}

async function throttle(url: string, rps?: number, signal?: AbortSignal) {
  if (!rps || rps <= 0) return;
  const minGap = 1000 / rps;
  const key = originOf(url);
  const last = lastRequestAt.get(key) ?? 0;
  const now = Date.now();
  const wait = last + minGap - now;
  if (wait > 0) await sleep(wait, signal);
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

export function isTransientStatus(status: number) {
  return status === 429 || status >= 500;
}

function encodeBody(opts: JsonRequestOptions): { body?: string; contentType?: string } {
  if (opts.body === undefined) return {};
  if (opts.form) {
    const params = new URLSearchParams();
    if (opts.body && typeof opts.body === 'object') {
      for (const [k, v] of Object.entries(opts.body)) {
        if (v === undefined || v === null) continue;
        params.set(k, String(v));
      }
    }
    return { body: params.toString(), contentType: 'application/x-www-form-urlencoded' };
  }
  return { body: JSON.stringify(opts.body), contentType: 'application/json' };
}

export async function requestJson<T>(
  url: string,
  opts: JsonRequestOptions = {},
  fetcher: FetchLike = fetch,
): Promise<T> {
  const finalUrl = withQuery(url, opts.query);
  const retries = opts.retries ?? 3;
  const backoffMs = opts.backoffMs ?? 200;
  const { body, contentType } = encodeBody(opts);

  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    attempt++;
    let res: Response;
    try {
      const envRps = process.env.DAYPLAN_HTTP_RPS ? Number(process.env.DAYPLAN_HTTP_RPS) : undefined;
      await throttle(finalUrl, opts.rps ?? envRps, opts.signal);

      res = await fetcher(finalUrl, {
        method: opts.method ?? 'GET',
        headers: {
          accept: 'application/json',
          ...(contentType ? { 'content-type': contentType } : {}),
          ...(opts.headers ?? {}),
        },
        body,
        signal: opts.signal,
      });
    } catch (e) {
      // network errors; an abort is final
      if (opts.signal?.aborted) throw e;
      if (attempt <= retries) {
        await sleep(backoffMs * 2 ** (attempt - 1), opts.signal);
        continue;
      }
      throw e;
    }

    if (!res.ok) {
      const txt = await res.text().catch(() => undefined);
      const retryAfterMs = parseRetryAfterMs(res.headers.get('retry-after'));
      const err = new HttpError(`HTTP ${res.status} for ${finalUrl}`, res.status, finalUrl, txt, retryAfterMs);
      if (attempt <= retries && isTransientStatus(res.status)) {
        await sleep(retryAfterMs ?? backoffMs * 2 ** (attempt - 1), opts.signal);
        continue;
      }
      throw err;
    }

    // empty body
    if (res.status === 204) return undefined as T;

    const text = await res.text();
    if (!text) return undefined as T;
    return JSON.parse(text) as T;
  }
}
