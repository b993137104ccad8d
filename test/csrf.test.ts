import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { createCsrfGuard } from "../src/security/csrf";

function createGuardedApp(minTokenLength?: number) {
  const app = express();
  app.use(createCsrfGuard({ minTokenLength }));
  app.all("/", (_req, res) => {
    res.status(200).json({ ok: true });
  });
  return app;
}

describe("createCsrfGuard", () => {
  it("lets safe methods through without a token", async () => {
    const response = await request(createGuardedApp()).get("/");

    expect(response.status).toBe(200);
  });

  it("rejects writes whose token is shorter than the minimum", async () => {
    const response = await request(createGuardedApp()).delete("/").set("x-csrf-token", "  short-token  ");

    expect(response.status).toBe(403);
    expect(response.body).toEqual({ error: "Invalid CSRF token" });
  });

  it("honours a custom minimum length", async () => {
    const response = await request(createGuardedApp(8)).patch("/").set("x-csrf-token", "12345678");

    expect(response.status).toBe(200);
  });
});
