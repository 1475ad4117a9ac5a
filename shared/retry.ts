// shared/retry.ts
import type { Logger } from "@azure/functions";

export interface RetryOptions {
  /** Total attempts, including the first. */
  maxRetries: number;
  baseBackoffMs: number;
  maxBackoffMs?: number;
}

export function sleep(ms: number) { return new Promise(r => setTimeout(r, ms)); }

function field(err: unknown, key: string): unknown {
  return typeof err === "object" && err !== null ? Reflect.get(err, key) : undefined;
}

export function isRetryable(err: unknown): boolean {
  const response = field(err, "response");
  const status = field(err, "statusCode") ?? field(err, "status") ?? field(response, "status");
  const code = field(err, "code");
  if (status === 429 || status === 408) return true;
  if (typeof status === "number" && status >= 500 && status < 600) return true;
  if (code === "ETIMEDOUT" || code === "ECONNRESET" || code === "ECONNABORTED") return true;
  const msg = String(field(err, "message") ?? "").toLowerCase();
  if (msg.includes("rate limit") || msg.includes("temporarily unavailable")) return true;
  return false;
}

export async function callWithRetry<T>(fn: () => Promise<T>, label: string, opts: RetryOptions, log?: Logger): Promise<T> {
  let delay = opts.baseBackoffMs;
  const cap = opts.maxBackoffMs ?? 8000;
  for (let attempt = 0; attempt < opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (!isRetryable(err) || attempt === opts.maxRetries - 1) throw err;
      log?.warn(`${label} attempt ${attempt + 1} failed, retrying: ${String(field(err, "message") ?? err)}`);
      const jitter = Math.floor(Math.random() * delay * 0.2);
      await sleep(delay + jitter);
      delay = Math.min(delay * 2, cap);
    }
  }
  throw new Error(`Retries exhausted for ${label}`);
}
