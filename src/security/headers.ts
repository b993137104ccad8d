import helmet from "helmet";
import type { RequestHandler } from "express";
import type { AppConfig, SecurityHeadersConfig } from "../config";

const PERMISSIONS_POLICY_VALUE = "geolocation=(), microphone=(), camera=(), payment=()";

function resolveSecurityHeadersConfig(config: AppConfig): SecurityHeadersConfig {
  const inferredProduction = (process.env.NODE_ENV ?? "").toLowerCase() === "production";
  return {
    isProduction: config.securityHeaders?.isProduction ?? inferredProduction
  };
}

/** JSON responses never load subresources, so the policy denies everything. */
export function createApiSecurityHeaders(config: AppConfig): RequestHandler {
  const resolved = resolveSecurityHeadersConfig(config);
  const helmetMiddleware = helmet({
    contentSecurityPolicy: {
      useDefaults: false,
      directives: {
        defaultSrc: ["'none'"],
        baseUri: ["'none'"],
        frameAncestors: ["'none'"],
        formAction: ["'none'"]
      }
    },
    referrerPolicy: { policy: "no-referrer" },
    xFrameOptions: { action: "deny" },
    crossOriginOpenerPolicy: { policy: "same-origin" },
    crossOriginResourcePolicy: { policy: "same-site" },
    crossOriginEmbedderPolicy: false,
    hsts: resolved.isProduction
      ? {
          maxAge: 31536000,
          includeSubDomains: true
        }
      : false
  });

  return (req, res, next) => {
    if (!res.getHeader("Permissions-Policy")) {
      res.setHeader("Permissions-Policy", PERMISSIONS_POLICY_VALUE);
    }
    helmetMiddleware(req, res, next);
  };
}
