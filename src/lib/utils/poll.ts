/**
 * Time source and polling helpers.
 *
 * Everything that waits goes through a Clock so tests can advance time
 * without real delays.
 */

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface PollOptions {
  /** Delay between checks. */
  intervalMs: number;
  /** Total budget measured from the first check. */
  timeoutMs: number;
  clock?: Clock;
  /** Invoked after every failed check. */
  onPending?: (progress: PollProgress) => void;
}

export interface PollProgress {
  attempts: number;
  elapsedMs: number;
  remainingMs: number;
}

export interface PollResult {
  satisfied: boolean;
  attempts: number;
  elapsedMs: number;
}

/**
 * Evaluate `predicate` until it returns true or the budget runs out.
 *
 * The predicate is always evaluated at least once. A check is never started
 * once the budget is spent, and the final sleep is shortened so the total
 * wait does not overrun `timeoutMs`.
 */
export async function pollUntil(
  predicate: () => Promise<boolean>,
  options: PollOptions
): Promise<PollResult> {
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();
  let attempts = 0;

  for (;;) {
    attempts++;
    if (await predicate()) {
      return { satisfied: true, attempts, elapsedMs: clock.now() - startedAt };
    }

    const elapsedMs = clock.now() - startedAt;
    const remainingMs = options.timeoutMs - elapsedMs;
    if (remainingMs <= 0) {
      return { satisfied: false, attempts, elapsedMs };
    }

    options.onPending?.({ attempts, elapsedMs, remainingMs });
    await clock.sleep(Math.min(options.intervalMs, remainingMs));
  }
}
