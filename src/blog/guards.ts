import type { RequestHandler, Router } from "express";
import type { AppConfig } from "../config";
import { applyDevAuthFallback } from "../middleware/dev-auth";
import { hydrateAuthFromHeaders } from "../middleware/auth";
import { createCsrfGuard } from "../security/csrf";
import { createApiSecurityHeaders } from "../security/headers";
import { createRateLimiter, resolveRateLimitConfig, type RateLimitStore } from "../security/rate-limit";

/**
 * Shared by every blog router. Identity is optional at this point; routes add
 * requireAuthenticated / requireAuthor / requireAdmin where they need them.
 */
export function applyBlogGuards(router: Router, config: AppConfig): void {
  router.use(createApiSecurityHeaders(config));
  router.use(hydrateAuthFromHeaders);
  router.use(applyDevAuthFallback(config));
  router.use(createCsrfGuard());
}

export interface BlogRateLimiters {
  read: RequestHandler;
  write: RequestHandler;
}

export function createBlogRateLimiters(config: AppConfig, store: RateLimitStore, scope: string): BlogRateLimiters {
  const limits = resolveRateLimitConfig(config);
  const limitFor = (perMinute: number) => (limits.enabled ? perMinute : 0);

  return {
    read: createRateLimiter({ name: `${scope}-read`, limit: limitFor(limits.readPerMinute) }, store),
    write: createRateLimiter({ name: `${scope}-write`, limit: limitFor(limits.writePerMinute) }, store)
  };
}
