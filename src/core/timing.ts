import type { DelayRange } from "../config";

export type RandomSource = () => number;

/** Resolves after `ms`, or early once `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function jitter(range: DelayRange, random: RandomSource = Math.random): number {
  return Math.round(range.baseMs + random() * range.jitterMs);
}

export function backoffDelay(attempt: number, baseMs: number, maxMs: number, random: RandomSource = Math.random): number {
  return Math.min(baseMs * 2 ** (attempt - 1), maxMs) + Math.round(random() * baseMs);
}
