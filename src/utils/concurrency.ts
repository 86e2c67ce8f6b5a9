/**
 * Bounded fan-out and per-call timeouts for external collaborator calls.
 */
import { TimeoutError } from './errors.js';

export type Settled<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

/**
 * Run `fn` over every item with at most `limit` calls in flight.
 * Every item settles; results keep input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<Settled<R>[]> {
  const results = new Array<Settled<R>>(items.length);
  // One shared iterator: each worker pulls the next unclaimed item
  const queue = items.entries();

  const worker = async (): Promise<void> => {
    for (const [index, item] of queue) {
      try {
        results[index] = { ok: true, value: await fn(item, index) };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

/**
 * Reject with TimeoutError when `promise` has not settled within `timeoutMs`.
 * The underlying work is not cancelled; pair with an AbortSignal where the callee supports one.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    promise.then(
      (value) => { clearTimeout(timer); resolve(value); },
      (err: unknown) => { clearTimeout(timer); reject(err); },
    );
  });
}
