import request from "supertest";
import { describe, expect, it } from "vitest";
import { createApp } from "../src/app";
import { createConfig } from "./support/fixtures";

describe("API security headers", () => {
  it("denies every subresource and omits HSTS outside production", async () => {
    const app = createApp(createConfig());
    const response = await request(app).get("/api/categories");

    expect(response.status).toBe(200);

    const csp = response.headers["content-security-policy"];
    expect(csp).toBeTypeOf("string");
    expect(csp).toContain("default-src 'none'");
    expect(csp).toContain("base-uri 'none'");
    expect(csp).toContain("frame-ancestors 'none'");
    expect(csp).toContain("form-action 'none'");

    expect(response.headers["x-content-type-options"]).toBe("nosniff");
    expect(response.headers["x-frame-options"]).toBe("DENY");
    expect(response.headers["referrer-policy"]).toBe("no-referrer");
    expect(response.headers["cross-origin-opener-policy"]).toBe("same-origin");
    expect(response.headers["cross-origin-resource-policy"]).toBe("same-site");
    expect(response.headers["permissions-policy"]).toBe("geolocation=(), microphone=(), camera=(), payment=()");
    expect(response.headers["strict-transport-security"]).toBeUndefined();
    expect(response.headers["x-powered-by"]).toBeUndefined();
  });

  it("adds HSTS in production", async () => {
    const app = createApp(createConfig({ securityHeaders: { isProduction: true } }));
    const response = await request(app).get("/api/tags");

    expect(response.headers["strict-transport-security"]).toBe("max-age=31536000; includeSubDomains");
  });

  it("does not attach API headers to the health probe", async () => {
    const response = await request(createApp(createConfig())).get("/healthz");

    expect(response.headers["content-security-policy"]).toBeUndefined();
  });
});
