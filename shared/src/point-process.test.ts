import { describe, expect, it } from "vitest";

import { InvalidScheduleError } from "./errors.js";
import { exponentialWait, scheduleWaits } from "./point-process.js";
import { createSeededRandom } from "./test-helpers/seeded-random.js";

const mean = (values: readonly number[]): number => {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

describe("exponentialWait", () => {
  it("should return ln(2)/rate for the median roll", () => {
    expect(exponentialWait(1, () => 0.5)).toBeCloseTo(Math.LN2, 10);
    expect(exponentialWait(4, () => 0.5)).toBeCloseTo(Math.LN2 / 4, 10);
  });

  it("should return zero for a zero roll", () => {
    expect(exponentialWait(2, () => 0)).toBe(0);
  });
});

describe("scheduleWaits", () => {
  it("should return an empty sequence for zero items in either mode", () => {
    expect(scheduleWaits(0, { mode: "rate", postsPerMinute: 3 })).toEqual([]);
    expect(scheduleWaits(0, { mode: "window", windowMinutes: 20 })).toEqual([]);
  });

  it("should return one independent wait per item", () => {
    const waits = scheduleWaits(5, { mode: "rate", postsPerMinute: 60 }, () => 0.5);

    expect(waits).toHaveLength(5);
    for (const wait of waits) {
      expect(wait).toBeCloseTo(Math.LN2, 10);
    }
  });

  it("should average 60/R seconds in rate mode", () => {
    const waits = scheduleWaits(20_000, { mode: "rate", postsPerMinute: 12 }, createSeededRandom(11));

    expect(waits.every((wait) => wait >= 0)).toBe(true);
    expect(Math.abs(mean(waits) - 5)).toBeLessThan(0.25);
  });

  it("should average (W*60)/N seconds in window mode", () => {
    const waits = scheduleWaits(
      20_000,
      { mode: "window", windowMinutes: 1_000 },
      createSeededRandom(99)
    );

    expect(waits.every((wait) => wait >= 0)).toBe(true);
    expect(Math.abs(mean(waits) - 3)).toBeLessThan(0.15);
  });

  it("should floor a degenerate window to a tiny positive mean", () => {
    const [wait] = scheduleWaits(1, { mode: "window", windowMinutes: 0 }, () => 0.5);

    expect(wait).toBeCloseTo(Math.LN2 / 1000, 10);
  });

  it("should reject a non-positive rate", () => {
    expect(() => scheduleWaits(3, { mode: "rate", postsPerMinute: 0 })).toThrow(
      InvalidScheduleError
    );
  });

  it("should reject a negative or fractional count", () => {
    expect(() => scheduleWaits(-1, { mode: "window", windowMinutes: 5 })).toThrow(
      InvalidScheduleError
    );
    expect(() => scheduleWaits(1.5, { mode: "window", windowMinutes: 5 })).toThrow(
      "count must be a non-negative integer, got 1.5"
    );
  });
});
