import { describe, it, expect } from "vitest";

import {
  RequestCache,
  computeCacheKey,
  stableParams,
} from "../../../src/scraper/cache.js";
import { FakeClock } from "../../mocks/clock.js";

describe("scraper/cache", () => {
  describe("stableParams", () => {
    it("should not depend on key order", () => {
      expect(stableParams({ page: 2, school_id: 28 })).toBe(
        stableParams({ school_id: 28, page: 2 })
      );
      expect(stableParams({ b: 1, a: "x" })).toBe('[["a","x"],["b",1]]');
    });

    it("should be empty without params", () => {
      expect(stableParams(undefined)).toBe("");
    });
  });

  describe("computeCacheKey", () => {
    it("should be a sha256 hex digest", () => {
      expect(computeCacheKey("class_units", undefined)).toMatch(/^[0-9a-f]{64}$/);
    });

    it("should separate endpoints and params", () => {
      const key = computeCacheKey("teacher_profiles", { page: 1 });
      expect(computeCacheKey("teacher_profiles", { page: 1 })).toBe(key);
      expect(computeCacheKey("teacher_profiles", { page: 2 })).not.toBe(key);
      expect(computeCacheKey("student_profiles", { page: 1 })).not.toBe(key);
    });
  });

  describe("RequestCache", () => {
    it("should return stored values within the TTL", () => {
      const clock = new FakeClock();
      const cache = new RequestCache(1000, clock);

      cache.set("class_units", { with_home_based: "true" }, [1, 2]);
      clock.advance(999);

      expect(cache.get("class_units", { with_home_based: "true" })).toEqual([1, 2]);
    });

    it("should evict entries at the TTL", () => {
      const clock = new FakeClock();
      const cache = new RequestCache(1000, clock);

      cache.set("class_units", undefined, [1]);
      clock.advance(1000);

      expect(cache.get("class_units")).toBeUndefined();
      expect(cache.stats().size).toBe(0);
    });

    it("should count hits and misses", () => {
      const cache = new RequestCache(1000, new FakeClock());
      cache.set("a", undefined, 1);

      cache.get("a");
      cache.get("a");
      cache.get("b");

      expect(cache.stats()).toEqual({
        size: 1,
        hits: 2,
        misses: 1,
        hitRate: "66.7%",
      });
    });

    it("should report 0.0% before any lookup", () => {
      expect(new RequestCache().stats().hitRate).toBe("0.0%");
    });
  });
});
