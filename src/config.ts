import type { UserRole } from "./types/context";

export interface SecurityHeadersConfig {
  isProduction: boolean;
}

export interface RateLimitConfig {
  enabled: boolean;
  readPerMinute: number;
  writePerMinute: number;
}

export interface CommentsConfig {
  requireModeration: boolean;
}

export interface ViewsConfig {
  throttleMinutes: number;
}

export interface AppConfig {
  port: number;
  devAuthBypassEnabled: boolean;
  devAuthBypassUserId: string;
  devAuthBypassUserRole: UserRole;
  comments?: Partial<CommentsConfig>;
  views?: Partial<ViewsConfig>;
  rateLimit?: Partial<RateLimitConfig>;
  securityHeaders?: Partial<SecurityHeadersConfig>;
}

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.toLowerCase();
  if (normalized === "true") {
    return true;
  }
  if (normalized === "false") {
    return false;
  }
  return defaultValue;
}

export function parseUserRole(value: string | undefined, defaultValue: UserRole): UserRole {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toUpperCase();
  if (normalized === "ADMIN" || normalized === "AUTHOR" || normalized === "READER") {
    return normalized;
  }

  return defaultValue;
}

function parsePositiveInteger(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return defaultValue;
  }

  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const isProduction = (env.NODE_ENV ?? "").toLowerCase() === "production";
  const requestedDevBypass = parseBoolean(env.BLOG_DEV_AUTH_BYPASS, !isProduction);
  const devAuthBypassUserId =
    (env.BLOG_DEV_USER_ID ?? "00000000-0000-4000-8000-000000000001").trim() || "00000000-0000-4000-8000-000000000001";

  return {
    port: parsePositiveInteger(env.PORT, 3000),
    devAuthBypassEnabled: !isProduction && requestedDevBypass,
    devAuthBypassUserId,
    devAuthBypassUserRole: parseUserRole(env.BLOG_DEV_USER_ROLE, "ADMIN"),
    comments: {
      requireModeration: parseBoolean(env.COMMENTS_REQUIRE_MODERATION, true)
    },
    views: {
      throttleMinutes: parsePositiveInteger(env.VIEW_THROTTLE_MINUTES, 30)
    },
    rateLimit: {
      enabled: parseBoolean(env.RATE_LIMIT_ENABLED, true),
      readPerMinute: parsePositiveInteger(env.RATE_LIMIT_READ_PER_MIN, 120),
      writePerMinute: parsePositiveInteger(env.RATE_LIMIT_WRITE_PER_MIN, 30)
    },
    securityHeaders: {
      isProduction
    }
  };
}
