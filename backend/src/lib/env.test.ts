import { describe, expect, it } from "vitest";

import { applyEnvFile } from "./env.js";

describe("applyEnvFile", () => {
  it("sets unquoted values and skips comments and malformed lines", () => {
    const target: Record<string, string | undefined> = {};

    applyEnvFile(
      [
        "# local settings",
        "",
        "SIM_COUNT=12",
        'SIM_LANGUAGES="ko=0.5,en=0.5"',
        "ADMIN_TOKEN='test-admin-token'",
        "=orphan",
        "NO_SEPARATOR",
      ].join("\n"),
      target
    );

    expect(target).toEqual({
      SIM_COUNT: "12",
      SIM_LANGUAGES: "ko=0.5,en=0.5",
      ADMIN_TOKEN: "test-admin-token",
    });
  });

  it("never overrides variables that are already set", () => {
    const target: Record<string, string | undefined> = { SIM_COUNT: "3" };

    applyEnvFile("SIM_COUNT=60\r\nWATCH_BATCH_LIMIT=10", target);

    expect(target).toEqual({ SIM_COUNT: "3", WATCH_BATCH_LIMIT: "10" });
  });
});
