import { setTimeout as delay } from "node:timers/promises";

/** Largest delay a Node timer honours; anything longer fires after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Waits `ms`, rejecting with an AbortError once the signal aborts. Waits
 * longer than a single timer allows are slept in consecutive chunks.
 */
export const abortableSleep = async (ms: number, signal: AbortSignal): Promise<void> => {
  let remaining = Math.max(0, ms);

  while (remaining > MAX_TIMER_DELAY_MS) {
    await delay(MAX_TIMER_DELAY_MS, undefined, { signal });
    remaining -= MAX_TIMER_DELAY_MS;
  }

  await delay(remaining, undefined, { signal });
};
