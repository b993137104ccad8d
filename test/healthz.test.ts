import request from "supertest";
import { describe, expect, it, vi } from "vitest";
import { createApp } from "../src/app";
import { createConfig } from "./support/fixtures";

describe("GET /healthz", () => {
  it("returns ok when health dependencies pass", async () => {
    const app = createApp(createConfig());

    const response = await request(app).get("/healthz");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ ok: true });
  });

  it("returns 503 and logs a warning when health dependencies fail", async () => {
    const warn = vi.fn();
    const app = createApp(createConfig(), {
      logger: { info: vi.fn(), warn, error: vi.fn() },
      healthCheck: async () => {
        throw new Error("db unavailable");
      }
    });

    const response = await request(app).get("/healthz");

    expect(response.status).toBe(503);
    expect(response.body).toEqual({ ok: false });
    expect(warn).toHaveBeenCalledWith("health_check_failed", { error: new Error("db unavailable") });
  });
});
