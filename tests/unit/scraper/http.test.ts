import { describe, it, expect } from "vitest";

import {
  classifyJsonResponse,
  httpGet,
  parseRetryAfter,
  type HttpResponse,
} from "../../../src/scraper/http.js";
import { createFetchMock } from "../../mocks/fetch.js";
import { silentLogger } from "../../mocks/logger.js";

function response(status: number, body = "", headers: Record<string, string> = {}): HttpResponse {
  return { status, statusText: "", headers: new Headers(headers), body };
}

describe("scraper/http", () => {
  describe("httpGet", () => {
    it("should return status and body text", async () => {
      const fetchFn = createFetchMock([
        { match: () => true, respond: () => ({ status: 200, body: { ok: 1 } }) },
      ]);

      const result = await httpGet(fetchFn, "https://directory.test/x", silentLogger);

      expect(result.kind).toBe("found");
      if (result.kind === "found") {
        expect(result.value.status).toBe(200);
        expect(result.value.body).toBe('{"ok":1}');
      }
    });

    it("should turn network errors into transient failures", async () => {
      const fetchFn = createFetchMock([
        { match: () => true, respond: () => ({ error: new Error("ECONNRESET") }) },
      ]);

      const result = await httpGet(fetchFn, "https://directory.test/x", silentLogger);

      expect(result).toEqual({
        kind: "transient-failure",
        reason: "network error: ECONNRESET",
      });
    });
  });

  describe("parseRetryAfter", () => {
    it("should read whole seconds", () => {
      expect(parseRetryAfter(new Headers({ "retry-after": "12" }))).toBe(12_000);
    });

    it("should fall back to the default", () => {
      expect(parseRetryAfter(new Headers())).toBe(30_000);
      expect(parseRetryAfter(new Headers({ "retry-after": "soon" }), 5000)).toBe(5000);
    });
  });

  describe("classifyJsonResponse", () => {
    it("should parse 200 bodies", () => {
      expect(classifyJsonResponse(response(200, "[1,2]"))).toEqual({
        kind: "found",
        value: [1, 2],
      });
    });

    it("should treat unparseable 200 bodies as permanent", () => {
      expect(classifyJsonResponse(response(200, "<html>"))).toEqual({
        kind: "permanent-failure",
        reason: "response body is not valid JSON",
      });
    });

    it("should map 404 to not-found", () => {
      expect(classifyJsonResponse(response(404))).toEqual({ kind: "not-found" });
    });

    it("should map 429 to transient with the retry hint", () => {
      expect(classifyJsonResponse(response(429, "", { "retry-after": "3" }))).toEqual({
        kind: "transient-failure",
        reason: "rate limited (429)",
        retryAfterMs: 3000,
      });
    });

    it("should map 5xx to transient and other statuses to permanent", () => {
      expect(classifyJsonResponse(response(503))).toEqual({
        kind: "transient-failure",
        reason: "server error (503)",
      });
      expect(classifyJsonResponse(response(401))).toEqual({
        kind: "permanent-failure",
        reason: "unexpected status 401",
      });
    });
  });
});
