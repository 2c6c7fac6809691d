import { AcquisitionError, errorMessage } from "../errors";

export type FetchResponse = {
  ok: boolean;
  status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
};

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<FetchResponse>;

export type DownloadOptions = {
  attempts?: number;
  baseDelayMs?: number;
  timeoutMs?: number;
  /** Bodies shorter than this are treated as a failed attempt. */
  minBytes?: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, reason: string, delayMs: number) => void;
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

function isHttpUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

async function attemptDownload(url: string, fetchImpl: FetchLike, timeoutMs: number, minBytes: number): Promise<Buffer> {
  const ctl = new AbortController();
  const timeout = setTimeout(() => ctl.abort(), timeoutMs);
  try {
    const res = await fetchImpl(url, { signal: ctl.signal });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status}`);
    }
    const body = Buffer.from(await res.arrayBuffer());
    if (body.length < minBytes) {
      throw new Error(`response too small (${body.length} bytes, expected at least ${minBytes})`);
    }
    return body;
  } catch (error) {
    if (ctl.signal.aborted) {
      throw new Error(`timed out after ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Downloads `url` with a per-attempt timeout and bounded exponential backoff
 * between attempts. Throws AcquisitionError once every attempt has failed.
 */
export async function downloadWithRetry(url: string, options: DownloadOptions = {}): Promise<Buffer> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const timeoutMs = options.timeoutMs ?? 30000;
  const minBytes = options.minBytes ?? 1;
  const fetchImpl = options.fetchImpl ?? fetch;
  const sleep = options.sleep ?? defaultSleep;

  if (!isHttpUrl(url)) {
    throw new AcquisitionError(`Not a downloadable URL: ${url}`, url, 0);
  }

  let lastReason = "";
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await attemptDownload(url, fetchImpl, timeoutMs, minBytes);
    } catch (error) {
      lastReason = errorMessage(error);
      if (attempt < attempts) {
        const delay = backoffDelay(baseDelayMs, attempt);
        options.onRetry?.(attempt, lastReason, delay);
        await sleep(delay);
      }
    }
  }
  throw new AcquisitionError(`Download failed after ${attempts} attempts: ${lastReason}`, url, attempts);
}
