import type { NextFunction, Request, RequestHandler, Response } from "express";
import { parseUserRole } from "../config";
import type { UserRole } from "../types/context";

// Identity comes from the upstream proxy; a missing or blank user id means anonymous.
export function hydrateAuthFromHeaders(req: Request, _res: Response, next: NextFunction): void {
  const userId = req.header("x-user-id")?.trim();

  req.auth = userId
    ? { userId, role: parseUserRole(req.header("x-user-role"), "READER"), isAuthenticated: true }
    : undefined;
  next();
}

export function requireAuthenticated(req: Request, res: Response, next: NextFunction): void {
  if (!req.auth?.isAuthenticated) {
    res.status(401).json({ error: "Authentication required" });
    return;
  }

  next();
}

function requireRole(allowed: readonly UserRole[], deniedMessage: string): RequestHandler {
  return (req, res, next) => {
    if (!req.auth?.isAuthenticated) {
      res.status(401).json({ error: "Authentication required" });
      return;
    }

    if (!allowed.includes(req.auth.role)) {
      res.status(403).json({ error: deniedMessage });
      return;
    }

    next();
  };
}

export const requireAuthor = requireRole(["AUTHOR", "ADMIN"], "Author access required");
export const requireAdmin = requireRole(["ADMIN"], "Admin access required");
