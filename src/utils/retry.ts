import { RequestError } from '../errors';

export type RetryOptions = {
  tries?: number;
  baseMs?: number;
  maxMs?: number;
  jitterMs?: number;
  onRetry?: (err: RequestError, attempt: number, delayMs: number) => void;
};

function isRetryable(e: unknown): e is RequestError {
  return e instanceof RequestError && e.transient;
}

export async function withRetry<T>(fn: () => Promise<T>, opts?: RetryOptions): Promise<T> {
  const tries = opts?.tries ?? 3;
  const baseMs = opts?.baseMs ?? 500;
  const maxMs = opts?.maxMs ?? 8000;
  const jitterMs = opts?.jitterMs ?? 250;
  let lastErr: unknown;

  for (let i = 0; i < tries; i++) {
    try {
      return await fn();
    } catch (e) {
      lastErr = e;
      if (!isRetryable(e) || i === tries - 1) {
        throw e;
      }
      const jitter = Math.floor(Math.random() * jitterMs);
      const delay = Math.min(maxMs, baseMs * Math.pow(2, i)) + jitter;
      opts?.onRetry?.(e, i + 1, delay);
      await new Promise((r) => setTimeout(r, delay));
    }
  }
  throw lastErr;
}
