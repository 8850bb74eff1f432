import type { RawLog } from '../types/index.js';

export type FetchErrorKind = 'Timeout' | 'RateLimited' | 'Invalid';

export class FetchError extends Error {
  constructor(
    public readonly kind: FetchErrorKind,
    message: string,
    public readonly detail?: unknown
  ) {
    super(message);
    this.name = 'FetchError';
  }

  get retryable(): boolean {
    return this.kind !== 'Invalid';
  }
}

export interface ChainLogSource {
  /** Logs for the inclusive range, ordered by (blockNumber, logIndex). */
  fetchLogs(fromBlock: number, toBlock: number): Promise<RawLog[]>;
  headBlock(): Promise<number>;
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new FetchError('Timeout', `${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

export function compareLogs(a: RawLog, b: RawLog): number {
  return a.blockNumber - b.blockNumber || a.logIndex - b.logIndex;
}
