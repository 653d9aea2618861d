export type HttpFetch = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<Response>;

export const DEFAULT_TIMEOUT_MS = 30_000;

const USER_AGENT = "pystyle-crawler (+https://pypi.org/rss/)";

export interface CachedResponse<T> {
  data: T;
  etag?: string;
  lastModified?: string;
}

export interface ConditionalFetchResult<T> extends CachedResponse<T> {
  source: "network" | "cache";
}

export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(url: string, status: number) {
    super(`GET ${url} returned HTTP ${status}`);
    this.name = "HttpStatusError";
    this.status = status;
    this.url = url;
  }
}

export interface FetchOptions {
  timeoutMs?: number;
  fetch?: HttpFetch;
}

const globalFetch: HttpFetch = (url, init) => fetch(url, init);

export async function fetchWithConditional<T>(
  url: string,
  parse: (body: string) => T,
  cached: CachedResponse<T> | null,
  options: FetchOptions = {}
): Promise<ConditionalFetchResult<T>> {
  const headers: Record<string, string> = { "User-Agent": USER_AGENT };
  if (cached?.etag) {
    headers["If-None-Match"] = cached.etag;
  }
  if (cached?.lastModified) {
    headers["If-Modified-Since"] = cached.lastModified;
  }

  const request = options.fetch ?? globalFetch;
  const response = await request(url, {
    headers,
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
  });

  if (response.status === 304 && cached) {
    return { ...cached, source: "cache" };
  }
  if (!response.ok) {
    throw new HttpStatusError(url, response.status);
  }

  const body = await response.text();
  return {
    data: parse(body),
    etag: response.headers.get("etag") ?? undefined,
    lastModified: response.headers.get("last-modified") ?? undefined,
    source: "network",
  };
}

export async function fetchJson(url: string, options: FetchOptions = {}): Promise<unknown> {
  const request = options.fetch ?? globalFetch;
  const response = await request(url, {
    headers: { "User-Agent": USER_AGENT, Accept: "application/json" },
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
  });
  if (!response.ok) {
    throw new HttpStatusError(url, response.status);
  }
  const payload: unknown = await response.json();
  return payload;
}
