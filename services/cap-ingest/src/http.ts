import { setTimeout as delay } from 'node:timers/promises';
import { Headers, type RequestInit, fetch } from 'undici';
import { FetchError } from './errors.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_1_0) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36';
const DEFAULT_MIN_REQUEST_GAP_MS = 1_000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_TIMEOUT_MS = 15_000;

let lastRequestTimestamp = 0;

async function enforceRequestGap(minGapMs: number): Promise<void> {
  const now = Date.now();
  const elapsed = now - lastRequestTimestamp;
  if (elapsed < minGapMs) {
    await delay(minGapMs - elapsed);
  }
  lastRequestTimestamp = Date.now();
}

export interface FetchWithRetryOptions extends Omit<RequestInit, 'signal'> {
  maxAttempts?: number;
  backoffMs?: number;
  timeoutMs?: number;
  minGapMs?: number;
}

export interface FetchWithRetryResult {
  body: string;
  status: number;
  headers: Headers;
}

export async function fetchWithRetry(
  url: string,
  options: FetchWithRetryOptions = {},
): Promise<FetchWithRetryResult> {
  const {
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    backoffMs = 750,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    minGapMs = DEFAULT_MIN_REQUEST_GAP_MS,
    ...requestOptions
  } = options;
  let lastError: unknown;
  let lastStatus: number | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    lastStatus = null;
    try {
      await enforceRequestGap(minGapMs);

      const headers = new Headers(requestOptions.headers ?? {});
      if (!headers.has('user-agent')) {
        headers.set('user-agent', DEFAULT_USER_AGENT);
      }
      if (!headers.has('accept')) {
        headers.set('accept', 'text/html,application/xhtml+xml');
      }
      if (!headers.has('accept-language')) {
        headers.set('accept-language', 'en-US,en;q=0.9');
      }

      const response = await fetch(url, {
        ...requestOptions,
        headers,
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!response.ok) {
        lastStatus = response.status;
        // Drain so the connection can be reused.
        await response.text();
        throw new Error(`Request failed with status ${response.status} ${response.statusText}`);
      }

      const body = await response.text();
      return {
        body,
        status: response.status,
        headers: new Headers(response.headers),
      };
    } catch (error) {
      lastError = error;
      console.warn(`[http] GET ${url} attempt ${attempt}/${maxAttempts} failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
      if (attempt === maxAttempts) {
        break;
      }

      const waitTime = backoffMs * attempt;
      await delay(waitTime);
    }
  }

  throw new FetchError(url, lastStatus, { cause: lastError });
}
