import { describe, it, expect } from "vitest";

import { parsePort, parseStatusFilter } from "../../../../src/cli/utils/options.js";

describe("cli/utils/options", () => {
  describe("parsePort", () => {
    it("should accept ports from 0 to 65535", () => {
      expect(parsePort("8000")).toBe(8000);
      expect(parsePort("0")).toBe(0);
      expect(parsePort("65535")).toBe(65535);
    });

    it("should reject anything else", () => {
      expect(() => parsePort("65536")).toThrow("Invalid port: 65536");
      expect(() => parsePort("80a")).toThrow("Invalid port: 80a");
      expect(() => parsePort("-1")).toThrow("Invalid port: -1");
      expect(() => parsePort("")).toThrow("Invalid port: ");
    });
  });

  describe("parseStatusFilter", () => {
    it("should pass through a missing filter", () => {
      expect(parseStatusFilter(undefined)).toBeUndefined();
    });

    it("should accept either status in any case", () => {
      expect(parseStatusFilter("active")).toBe("ACTIVE");
      expect(parseStatusFilter(" Inactive ")).toBe("INACTIVE");
    });

    it("should reject an unknown status", () => {
      expect(() => parseStatusFilter("foo")).toThrow(
        'Unknown status "foo" (expected ACTIVE or INACTIVE)'
      );
    });
  });
});
