/**
 * doFetch - fetch wrapper with a per-call timeout and retry with exponential backoff.
 *
 * Signature:
 *   doFetch(target: string, opts?: FetchOptions)
 *
 * Behavior:
 * - Uses the global fetch of the runtime.
 * - Bounds each attempt, body included, with AbortSignal.timeout.
 * - Retries network failures, timeouts and the statuses in RETRY_STATUSES,
 *   sleeping baseDelayMs * 2^n before retry n+1.
 * - Any other non-2xx response, or a retryable one after the last retry,
 *   raises HttpError.
 */

import { HttpError, getErrorMessage } from "./errors";
import { getLogger, Subsystem } from "./logger";

const log = getLogger(Subsystem.Transport);

export const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_RETRIES = 5;
export const DEFAULT_BASE_DELAY_MS = 1_000;

export interface FetchOptions {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
  retries?: number;
  baseDelayMs?: number;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Appends query parameters to `base`; undefined values are left out. */
export function withQuery(base: string, params: Record<string, string | number | boolean | undefined>): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/** The timeout signal stays armed after the headers arrive, so reading the body is bounded too. */
function attempt(target: string, opts: FetchOptions, timeoutMs: number): Promise<Response> {
  return fetch(target, {
    method: opts.method ?? "GET",
    headers: opts.headers,
    body: opts.body,
    signal: AbortSignal.timeout(timeoutMs),
    redirect: "follow",
  });
}

export async function doFetch(target: string, opts: FetchOptions = {}): Promise<Response> {
  if (!target) throw new Error("doFetch requires a target URL");

  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const retries = opts.retries ?? DEFAULT_RETRIES;
  const baseDelayMs = opts.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;

  for (let n = 0; ; n++) {
    const canRetry = n < retries;
    const delay = baseDelayMs * 2 ** n;
    let res: Response;
    try {
      log.debug({ url: target, attempt: n + 1 }, "Sending request");
      res = await attempt(target, opts, timeoutMs);
    } catch (err) {
      if (!canRetry) {
        log.error({ url: target, err }, "Request failed");
        throw err;
      }
      log.warn({ url: target, attempt: n + 1, delay, reason: getErrorMessage(err) }, "Request failed, retrying");
      await sleep(delay);
      continue;
    }

    if (res.ok) return res;
    if (RETRY_STATUSES.has(res.status) && canRetry) {
      log.warn({ url: target, status: res.status, attempt: n + 1, delay }, "Retryable status, retrying");
      await sleep(delay);
      continue;
    }
    throw new HttpError({ message: `${opts.method ?? "GET"} failed`, status: res.status, url: target });
  }
}

export async function fetchJson(target: string, opts: FetchOptions = {}): Promise<unknown> {
  const res = await doFetch(target, opts);
  const parsed: unknown = await res.json();
  return parsed;
}
