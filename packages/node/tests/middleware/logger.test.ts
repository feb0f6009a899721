/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { ADMIN, ARB, PRODUCER, as, createTestApp, jsonRequest } from "../setup.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({}, { logFn: (entry) => entries.push(entry) });

    await app.request(jsonRequest("/health", "GET", undefined, { "X-Request-Id": "log-1" }));

    expect(entries).toHaveLength(1);
    expect(entries[0]?.method).toBe("GET");
    expect(entries[0]?.path).toBe("/health");
    expect(entries[0]?.status).toBe(200);
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
    expect(entries[0]?.requestId).toBe("log-1");
    expect(entries[0]?.caller).toBeUndefined();
  });

  it("records the caller and final status of mutating requests", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({}, { logFn: (entry) => entries.push(entry) });

    await app.request(
      jsonRequest(`/api/v1/producers/${PRODUCER}/reward-tokens`, "POST", { rewardToken: ARB }, as(ADMIN)),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]?.method).toBe("POST");
    expect(entries[0]?.status).toBe(201);
    expect(entries[0]?.caller).toBe(ADMIN);
  });
});
