/**
 * Condition waits with a timeout
 * Polls a condition through an injectable pause so browser-backed callers can
 * use the page's own timer and tests can run without real delays.
 */

export interface WaitOptions {
  /** @default 3000 */
  timeoutMs?: number;
  /** @default 250 */
  intervalMs?: number;
  /** Pause implementation, defaults to setTimeout */
  pause?: (ms: number) => Promise<void>;
}

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Resolve true as soon as the condition holds, or false once timeoutMs of
 * polling has elapsed. The condition is always checked at least once.
 */
export async function waitUntil(
  condition: () => Promise<boolean>,
  options?: WaitOptions
): Promise<boolean> {
  const timeoutMs = options?.timeoutMs ?? 3000;
  const intervalMs = Math.max(1, options?.intervalMs ?? 250);
  const pause = options?.pause ?? sleep;

  let elapsed = 0;
  for (;;) {
    if (await condition()) {
      return true;
    }
    if (elapsed >= timeoutMs) {
      return false;
    }
    const step = Math.min(intervalMs, timeoutMs - elapsed);
    await pause(step);
    elapsed += step;
  }
}
