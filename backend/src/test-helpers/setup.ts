import { afterEach, beforeEach, vi } from "vitest";

// Tests inject their own fetch; anything reaching the global one is a bug.
beforeEach(() => {
  vi.stubGlobal(
    "fetch",
    vi.fn(async () => {
      throw new Error("Unexpected network call in test");
    })
  );
});

afterEach(() => {
  vi.unstubAllGlobals();
});
