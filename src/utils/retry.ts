import { logger } from './logger.js';

export class NonRetryableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NonRetryableError';
  }
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  backoffFactor?: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
  /** Stops retrying (and waiting) once aborted. */
  signal?: AbortSignal;
  label?: string;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason ?? new Error('aborted'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason ?? new Error('aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs = 1_000, backoffFactor = 2,
    isRetryable = (e) => !(e instanceof NonRetryableError), onRetry, signal, label = 'call' } = opts;
  let lastErr: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try { return await fn(attempt); }
    catch (err) {
      lastErr = err;
      if (signal?.aborted || !isRetryable(err) || attempt === maxAttempts) throw err;
      const delay = baseDelayMs * Math.pow(backoffFactor, attempt - 1);
      logger.warn(`Retry ${label} ${attempt}/${maxAttempts} in ${delay}ms`, { error: String(err) });
      onRetry?.(attempt, err);
      await sleep(delay, signal);
    }
  }
  throw lastErr;
}
