import { setTimeout as sleep } from "node:timers/promises";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type FetchJsonOptions = {
  headers: Readonly<Record<string, string>>;
  timeoutMs: number;
  retries: number;
  baseDelayMs: number;
  fetchImpl?: FetchLike;
};

const parseRetryAfterMs = (value: string | null): number | null => {
  if (value === null) {
    return null;
  }

  const seconds = Number.parseInt(value, 10);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return null;
  }

  return seconds * 1000;
};

const shouldRetryStatus = (status: number): boolean => status === 429 || status >= 500;

// Resolves to null for non-2xx responses; network errors and timeouts reject.
export const fetchJson = async (url: string, options: FetchJsonOptions): Promise<unknown> => {
  const fetchImpl = options.fetchImpl ?? fetch;

  for (let attempt = 0; attempt <= options.retries; attempt += 1) {
    const response = await fetchImpl(url, {
      headers: { ...options.headers },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    if (response.ok) {
      return await response.json();
    }

    await response.body?.cancel();
    if (!shouldRetryStatus(response.status) || attempt === options.retries) {
      return null;
    }

    const retryAfterMs = parseRetryAfterMs(response.headers.get("retry-after"));
    await sleep(retryAfterMs ?? options.baseDelayMs * 2 ** attempt);
  }

  return null;
};
