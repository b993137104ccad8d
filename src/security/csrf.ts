import type { RequestHandler } from "express";

const SAFE_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

export const CSRF_HEADER = "x-csrf-token";
export const CSRF_TOKEN_MIN_LENGTH = 16;

export interface CsrfGuardOptions {
  minTokenLength?: number;
}

// The edge proxy issues and verifies the token; here we only refuse writes that arrive without one.
export function createCsrfGuard(options: CsrfGuardOptions = {}): RequestHandler {
  const minTokenLength = options.minTokenLength ?? CSRF_TOKEN_MIN_LENGTH;

  return (req, res, next) => {
    if (SAFE_METHODS.has(req.method)) {
      next();
      return;
    }

    const token = req.header(CSRF_HEADER)?.trim() ?? "";
    if (token.length < minTokenLength) {
      res.status(403).json({ error: "Invalid CSRF token" });
      return;
    }

    next();
  };
}
