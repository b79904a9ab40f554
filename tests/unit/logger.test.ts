import { describe, it, expect } from "vitest";

import { createLogger, resolveLogLevel } from "../../src/logger.js";

describe("logger", () => {
  describe("resolveLogLevel", () => {
    it("should accept pino level names", () => {
      expect(resolveLogLevel("debug")).toBe("debug");
      expect(resolveLogLevel(" WARN ")).toBe("warn");
      expect(resolveLogLevel("silent")).toBe("silent");
    });

    it("should fall back to info", () => {
      expect(resolveLogLevel(undefined)).toBe("info");
      expect(resolveLogLevel("verbose")).toBe("info");
    });
  });

  describe("createLogger", () => {
    it("should apply the configured level", () => {
      const logger = createLogger({ level: "warn" });

      expect(logger.level).toBe("warn");
      expect(logger.isLevelEnabled("info")).toBe(false);
      expect(logger.isLevelEnabled("error")).toBe(true);
    });
  });
});
