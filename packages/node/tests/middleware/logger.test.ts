/**
 * Tests for logger middleware.
 */

import { describe, it, expect, vi } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import { levelForStatus, loggerMiddleware } from "../../src/middleware/logger.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { requestIdMiddleware } from "../../src/middleware/request-id.js";

function loggedApp() {
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger));
  app.get("/ok", (c) => c.json({ ok: true }));
  app.get("/missing", (c) => c.json({ ok: false }, 404));
  app.get("/broken", (c) => c.json({ ok: false }, 500));
  return { app, logger };
}

describe("levelForStatus", () => {
  it("picks the level from the status class", () => {
    expect(levelForStatus(200)).toBe("info");
    expect(levelForStatus(399)).toBe("info");
    expect(levelForStatus(400)).toBe("warn");
    expect(levelForStatus(503)).toBe("error");
  });
});

describe("loggerMiddleware", () => {
  it("logs one info line with request details", async () => {
    const { app, logger } = loggedApp();

    await app.request("/ok", { headers: { "X-Request-Id": "req-1" } });

    expect(logger.info).toHaveBeenCalledTimes(1);
    const [entry, message] = logger.info.mock.calls[0] as [RequestLogEntry, string];
    expect(entry.method).toBe("GET");
    expect(entry.path).toBe("/ok");
    expect(entry.status).toBe(200);
    expect(entry.requestId).toBe("req-1");
    expect(entry.durationMs).toBeGreaterThanOrEqual(0);
    expect(message).toBe("GET /ok 200");
  });

  it("logs client errors as warnings and server errors as errors", async () => {
    const { app, logger } = loggedApp();

    await app.request("/missing");
    await app.request("/broken");

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.info).not.toHaveBeenCalled();
  });
});
