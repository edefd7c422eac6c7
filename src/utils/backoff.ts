import { setTimeout as sleepTimer } from 'node:timers/promises';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  await sleepTimer(ms);
};

/**
 * Exponential delay for the Nth attempt (1-based): base, 2x base, 4x base, ... capped at `maxMs`.
 */
export function computeBackoffDelay(attempt: number, baseMs: number, maxMs: number = Number.POSITIVE_INFINITY): number {
  const normalizedAttempt = Math.max(1, Math.floor(attempt));
  const delay = baseMs * 2 ** (normalizedAttempt - 1);
  return Math.min(delay, maxMs);
}

export class TimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export async function withTimeout<T>(operation: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      fn(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
