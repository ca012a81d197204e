export interface SettleTiming {
  /** Upper bound for polling a readiness condition. */
  timeoutMs: number;
  pollIntervalMs: number;
  /** Fixed delay slept when no condition is given, or before the last re-check of one that timed out. */
  fallbackDelayMs: number;
}

export type Condition = () => boolean | Promise<boolean>;

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Polls `check` until it returns true or `timeoutMs` elapses.
 * The condition is always evaluated at least once. Errors thrown by the
 * condition count as "not ready yet".
 */
export async function waitForCondition(
  check: Condition,
  options: { timeoutMs: number; pollIntervalMs: number },
): Promise<boolean> {
  const deadline = Date.now() + Math.max(0, options.timeoutMs);
  const interval = Math.max(1, options.pollIntervalMs);

  for (;;) {
    try {
      if (await check()) return true;
    } catch {
      // Not queryable yet
    }
    const remaining = deadline - Date.now();
    if (remaining <= 0) return false;
    await sleep(Math.min(interval, remaining));
  }
}

/**
 * Waits for the UI to catch up after an action. Resolves to whether the
 * condition was observed. A condition that times out gets one more check
 * after the fallback delay; without a condition only the delay is slept.
 */
export async function settle(check: Condition | undefined, timing: SettleTiming): Promise<boolean> {
  if (!check) {
    await sleep(timing.fallbackDelayMs);
    return false;
  }
  if (await waitForCondition(check, timing)) return true;

  await sleep(timing.fallbackDelayMs);
  return waitForCondition(check, { timeoutMs: 0, pollIntervalMs: timing.pollIntervalMs });
}
