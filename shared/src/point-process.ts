import { MIN_MEAN_WAIT_SECONDS } from "./constants.js";
import { InvalidScheduleError } from "./errors.js";
import type { EmissionTiming, RandomSource } from "./types.js";

/** Exponential draw with the given rate (events per second). */
export const exponentialWait = (ratePerSecond: number, random: RandomSource = Math.random): number => {
  // 1 - u lies in (0, 1] so the log is finite
  return -Math.log(1 - random()) / ratePerSecond;
};

export const ratePerSecondFor = (count: number, timing: EmissionTiming): number => {
  if (timing.mode === "rate") {
    if (!Number.isFinite(timing.postsPerMinute) || timing.postsPerMinute <= 0) {
      throw new InvalidScheduleError(
        `postsPerMinute must be a positive number, got ${timing.postsPerMinute}`
      );
    }

    return timing.postsPerMinute / 60;
  }

  if (!Number.isFinite(timing.windowMinutes) || timing.windowMinutes < 0) {
    throw new InvalidScheduleError(
      `windowMinutes must be a non-negative number, got ${timing.windowMinutes}`
    );
  }

  const meanSeconds = (timing.windowMinutes * 60) / Math.max(count, 1);
  return 1 / Math.max(meanSeconds, MIN_MEAN_WAIT_SECONDS);
};

/**
 * Per-item waits, in seconds, approximating Poisson inter-arrival spacing.
 *
 * Each entry is an independent draw measured from when that item starts
 * waiting, not a cumulative arrival time.
 */
export const scheduleWaits = (
  count: number,
  timing: EmissionTiming,
  random: RandomSource = Math.random
): number[] => {
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidScheduleError(`count must be a non-negative integer, got ${count}`);
  }

  const rate = ratePerSecondFor(count, timing);
  if (count === 0) {
    return [];
  }

  return Array.from({ length: count }, () => exponentialWait(rate, random));
};
