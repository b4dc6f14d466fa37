import { PACKAGE_VERSION } from '../server/runtime.js';

export const DEFAULT_FETCH_HEADERS: Readonly<Record<string, string>> = { 'User-Agent': `wxline/${PACKAGE_VERSION}` };

export type FetchImpl = (url: string, init?: RequestInit) => Promise<Response>;

export type FetchWithTimeout = (url: string, options?: RequestInit, timeoutMs?: number) => Promise<Response>;

interface CreateFetchWithTimeoutOptions {
  timeoutMs: number;
  /** Sent with every request; per-request headers of the same name win. */
  headers?: Readonly<Record<string, string>>;
  fetchImpl?: FetchImpl;
}

const mergeHeaders = (base: Readonly<Record<string, string>>, extra: RequestInit['headers']): Headers => {
  const merged = new Headers(base);
  new Headers(extra).forEach((value, name) => merged.set(name, value));
  return merged;
};

export const createFetchWithTimeout = ({
  timeoutMs: defaultTimeoutMs,
  headers = DEFAULT_FETCH_HEADERS,
  fetchImpl = globalThis.fetch.bind(globalThis),
}: CreateFetchWithTimeoutOptions): FetchWithTimeout =>
  async (url, options = {}, timeoutMs = defaultTimeoutMs) => {
    const controller = new AbortController();
    const upstreamSignal = options.signal;
    const followUpstream = () => controller.abort(upstreamSignal?.reason);
    if (upstreamSignal?.aborted) {
      followUpstream();
    } else {
      upstreamSignal?.addEventListener('abort', followUpstream, { once: true });
    }
    const timer = setTimeout(() => controller.abort(new Error(`Request to ${url} timed out after ${timeoutMs}ms`)), timeoutMs);

    try {
      return await fetchImpl(url, { ...options, headers: mergeHeaders(headers, options.headers), signal: controller.signal });
    } finally {
      clearTimeout(timer);
      upstreamSignal?.removeEventListener('abort', followUpstream);
    }
  };
