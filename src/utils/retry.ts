// ============================================================
// Bounded retry with exponential backoff
// ============================================================
// Only transient exchange failures (timeout, rate limit, network)
// are retried. Everything else surfaces on the first attempt.
// ============================================================

import { ExchangeError, errorMessage, isTransient } from '../errors/index.js';
import { createModuleLogger } from '../monitoring/logger.js';
import { systemClock } from './clock.js';
import type { Clock } from './clock.js';

const log = createModuleLogger('Retry');

export interface RetryOptions {
  /** Total attempts including the first */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Per-attempt timeout; 0 disables it */
  timeoutMs: number;
}

/** Delay before retry number `retry` (1-based): base × 2^(retry-1), capped. */
export function backoffDelay(retry: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * 2 ** Math.max(0, retry - 1), maxMs);
}

/** Reject with a TIMEOUT ExchangeError if `fn` has not settled within `ms`. */
export function withTimeout<T>(fn: () => Promise<T>, ms: number, clock: Clock, label: string): Promise<T> {
  if (ms <= 0) return fn();
  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const cancel = clock.schedule(ms, () => {
      if (settled) return;
      settled = true;
      reject(new ExchangeError('TIMEOUT', `${label} timed out after ${ms}ms`));
    });
    fn().then(
      (value) => {
        if (settled) return;
        settled = true;
        cancel();
        resolve(value);
      },
      (err: unknown) => {
        if (settled) return;
        settled = true;
        cancel();
        reject(err);
      },
    );
  });
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions,
  clock: Clock = systemClock,
  label = 'request',
): Promise<T> {
  const attempts = Math.max(1, opts.attempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return await withTimeout(fn, opts.timeoutMs, clock, label);
    } catch (err) {
      if (!isTransient(err) || attempt >= attempts) throw err;
      const delay = backoffDelay(attempt, opts.baseDelayMs, opts.maxDelayMs);
      log.warn(`${label} failed (attempt ${attempt}/${attempts}): ${errorMessage(err)}. Retrying in ${delay}ms`);
      await clock.sleep(delay);
    }
  }
}
