import type { Request } from "express";
import type { UserRole } from "../types/context";
import { ForbiddenError } from "./errors";

const MAX_SESSION_ID_LENGTH = 128;

export interface Actor {
  userId: string;
  role: UserRole;
  isAdmin: boolean;
}

export function getOptionalActor(req: Request): Actor | undefined {
  const auth = req.auth;
  if (!auth?.isAuthenticated) {
    return undefined;
  }

  return {
    userId: auth.userId,
    role: auth.role,
    isAdmin: auth.role === "ADMIN"
  };
}

export function getActor(req: Request): Actor {
  const actor = getOptionalActor(req);
  if (!actor) {
    throw new ForbiddenError("authentication required");
  }
  return actor;
}

/**
 * Viewer session for view accounting: an explicit `x-session-id`, then the
 * signed-in user, then the client address.
 */
export function resolveViewerSessionId(req: Request): string {
  const header = req.header("x-session-id")?.trim();
  if (header && header.length <= MAX_SESSION_ID_LENGTH) {
    return `session:${header}`;
  }

  const actor = getOptionalActor(req);
  if (actor) {
    return `user:${actor.userId}`;
  }

  return `ip:${req.ip ?? "unknown"}`;
}
