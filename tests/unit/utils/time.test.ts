import { describe, it, expect } from "vitest";

import { isoNow } from "../../../src/utils/time.js";

describe("utils/time", () => {
  it("should format second-precision timestamps with an offset", () => {
    expect(isoNow(new Date("2026-03-01T00:30:00.750Z"))).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}[+-]\d{2}:\d{2}$/
    );
  });

  it("should describe the same instant", () => {
    const date = new Date("2026-03-01T00:30:00Z");

    expect(new Date(isoNow(date)).getTime()).toBe(date.getTime());
  });
});
