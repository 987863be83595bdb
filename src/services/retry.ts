import { SYNC_TIMEOUT_SENTINEL } from './syncErrors.js';

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const nextBackoffMs = (attempt: number) => Math.min(500 * 2 ** attempt, 8000);

/**
 * Exponential delay `base * 2^failures`, capped, plus up to `jitterRatio` of random jitter.
 */
export const computeBackoffDelay = (
  failures: number,
  options: { baseMs: number; maxMs: number; jitterRatio: number },
  random: () => number = Math.random,
) => {
  const exponent = Math.max(0, failures);
  const capped = Math.min(options.baseMs * 2 ** exponent, options.maxMs);
  const jitter = Math.floor(capped * options.jitterRatio * random());
  return capped + jitter;
};

const clampConcurrency = (value: number, fallback: number) => {
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.max(1, Math.floor(value));
};

/** Maps `items` with at most `concurrency` calls in flight; results keep the input order. */
export const mapWithConcurrency = async <T, R>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<R>,
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  if (items.length === 0) {
    return results;
  }

  const size = clampConcurrency(concurrency, 1);
  let cursor = 0;
  const runners = Array.from({ length: Math.min(size, items.length) }, async () => {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      results[index] = await worker(items[index]);
    }
  });
  await Promise.all(runners);
  return results;
};

export const runWithTimeout = async <T>(
  label: string,
  timeoutMs: number,
  fn: () => Promise<T>,
): Promise<T> => {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return fn();
  }

  let timeoutHandle: NodeJS.Timeout | null = null;
  try {
    return await Promise.race<T>([
      fn(),
      new Promise<T>((_, reject) => {
        timeoutHandle = setTimeout(() => {
          reject(new Error(`${SYNC_TIMEOUT_SENTINEL}: ${label} timed out after ${timeoutMs}ms`));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
};
