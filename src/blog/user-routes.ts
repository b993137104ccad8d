import { Router, type Request, type Response } from "express";
import { parseUserRole, type AppConfig } from "../config";
import { requireAdmin, requireAuthenticated } from "../middleware/auth";
import { appLogger, type Logger } from "../security/logger";
import { InMemoryRateLimitStore, type RateLimitStore } from "../security/rate-limit";
import { ForbiddenError, ValidationError } from "./errors";
import { applyBlogGuards, createBlogRateLimiters } from "./guards";
import {
  parseIdParam,
  readBody,
  requireBoolean,
  requireString,
  sendError,
  serializeUser,
  serializeUserProfile,
  serializeUserStatistics
} from "./http";
import { getActor } from "./request-context";
import type { BlogServices } from "./services";

const USERNAME_PATTERN = /^[A-Za-z0-9_.-]{1,50}$/;

export function createUserRouter(
  config: AppConfig,
  services: BlogServices,
  logger: Logger = appLogger,
  rateLimitStore: RateLimitStore = new InMemoryRateLimitStore()
): Router {
  const router = Router();
  applyBlogGuards(router, config);
  const limiters = createBlogRateLimiters(config, rateLimitStore, "users");

  router.get("/", requireAdmin, limiters.read, async (_req: Request, res: Response) => {
    try {
      const users = await services.users.list();
      res.status(200).json({ items: users.map(serializeUser) });
    } catch (error) {
      sendError(res, error, logger, { route: "users.list" });
    }
  });

  router.get("/username/:username", limiters.read, async (req: Request, res: Response) => {
    try {
      const username = req.params.username ?? "";
      if (!USERNAME_PATTERN.test(username)) {
        throw new ValidationError("username is invalid");
      }
      const profile = await services.users.getByUsername(username);
      res.status(200).json(serializeUserProfile(profile));
    } catch (error) {
      sendError(res, error, logger, { route: "users.get_by_username" });
    }
  });

  router.get("/:userId", limiters.read, async (req: Request, res: Response) => {
    try {
      const profile = await services.users.getById(parseIdParam(req, "userId"));
      res.status(200).json(serializeUserProfile(profile));
    } catch (error) {
      sendError(res, error, logger, { route: "users.get" });
    }
  });

  router.get("/:userId/statistics", requireAuthenticated, limiters.read, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      const actor = getActor(req);
      actorId = actor.userId;
      const userId = parseIdParam(req, "userId");
      if (!actor.isAdmin && actor.userId !== userId) {
        throw new ForbiddenError("statistics are visible to the user and admins only");
      }

      const statistics = await services.users.statistics(userId);
      res.status(200).json(serializeUserStatistics(statistics));
    } catch (error) {
      sendError(res, error, logger, { route: "users.statistics", actorId });
    }
  });

  router.patch("/:userId/role", requireAdmin, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      actorId = getActor(req).userId;
      const userId = parseIdParam(req, "userId");
      const rawRole = requireString(readBody(req), "role");
      const role = parseUserRole(rawRole, "READER");
      if (role !== rawRole.trim().toUpperCase()) {
        throw new ValidationError("role must be one of: READER, AUTHOR, ADMIN");
      }

      const user = await services.users.updateRole(userId, role);
      logger.info("blog_user_role_updated", { actorId, userId, role });
      res.status(200).json(serializeUser(user));
    } catch (error) {
      sendError(res, error, logger, { route: "users.update_role", actorId });
    }
  });

  router.patch("/:userId/status", requireAdmin, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      actorId = getActor(req).userId;
      const userId = parseIdParam(req, "userId");
      const isActive = requireBoolean(readBody(req), "is_active");

      const user = await services.users.updateStatus(userId, isActive);
      logger.info("blog_user_status_updated", { actorId, userId, isActive });
      res.status(200).json(serializeUser(user));
    } catch (error) {
      sendError(res, error, logger, { route: "users.update_status", actorId });
    }
  });

  router.delete("/:userId", requireAdmin, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      actorId = getActor(req).userId;
      const userId = parseIdParam(req, "userId");
      await services.users.delete(userId);

      logger.info("blog_user_deleted", { actorId, userId });
      res.status(204).end();
    } catch (error) {
      sendError(res, error, logger, { route: "users.delete", actorId });
    }
  });

  return router;
}
