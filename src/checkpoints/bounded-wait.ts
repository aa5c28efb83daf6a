/**
 * Polling wait with a hard deadline and a cancellation check on every iteration
 */

export type WaitResult<T> =
  | { kind: 'ready'; value: T }
  | { kind: 'timeout' }
  | { kind: 'cancelled' };

export interface BoundedWaitOptions {
  timeoutMs: number;
  intervalMs: number;
  isCancelled: () => boolean;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * Calls `probe` until it yields a non-null value, the deadline passes, or the run is cancelled.
 * The probe always runs at least once.
 */
export async function boundedWait<T>(
  probe: () => Promise<T | null>,
  options: BoundedWaitOptions
): Promise<WaitResult<T>> {
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const deadline = now() + options.timeoutMs;

  for (;;) {
    if (options.isCancelled()) {
      return { kind: 'cancelled' };
    }

    const value = await probe();
    if (value !== null) {
      return { kind: 'ready', value };
    }

    const remaining = deadline - now();
    if (remaining <= 0) {
      return { kind: 'timeout' };
    }

    await sleep(Math.min(options.intervalMs, remaining));
  }
}

export default {
  boundedWait,
  defaultSleep,
};
