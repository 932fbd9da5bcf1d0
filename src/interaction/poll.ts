export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type PollOutcome = "satisfied" | "timeout" | "aborted";

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  /** Checked before every probe; a true result ends polling at once. */
  shouldAbort?: () => boolean;
}

/**
 * Probes `predicate` until it holds or the wall-clock deadline passes. The
 * deadline is measured from the call, and a probe always runs once at the
 * deadline before giving up.
 */
export async function pollUntil(predicate: () => Promise<boolean>, options: PollOptions): Promise<PollOutcome> {
  const startedAt = Date.now();

  for (;;) {
    if (options.shouldAbort?.()) {
      return "aborted";
    }

    if (await predicate()) {
      return "satisfied";
    }

    const remainingMs = options.timeoutMs - (Date.now() - startedAt);
    if (remainingMs <= 0) {
      return "timeout";
    }

    await sleep(Math.min(options.intervalMs, remainingMs));
  }
}

export interface RetryOptions {
  attempts: number;
  intervalMs: number;
}

/** Runs `task` up to `attempts` times, pausing between tries, until `accept` takes its value. */
export async function retryWithInterval<T>(
  task: () => Promise<T>,
  accept: (value: T) => boolean,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  let value = await task();

  for (let attempt = 1; attempt < attempts && !accept(value); attempt += 1) {
    await sleep(options.intervalMs);
    value = await task();
  }

  return value;
}
