import { Router, type Request, type Response } from "express";
import type { AppConfig } from "../config";
import { requireAdmin, requireAuthenticated } from "../middleware/auth";
import { appLogger, type Logger } from "../security/logger";
import { InMemoryRateLimitStore, type RateLimitStore } from "../security/rate-limit";
import { NotFoundError, ValidationError } from "./errors";
import { applyBlogGuards, createBlogRateLimiters } from "./guards";
import { parseIdParam, parseOptionalIdValue, readBody, requireString, sendError, serializeComment } from "./http";
import { getActor, getOptionalActor } from "./request-context";
import type { BlogServices } from "./services";

export function createCommentRouter(
  config: AppConfig,
  services: BlogServices,
  logger: Logger = appLogger,
  rateLimitStore: RateLimitStore = new InMemoryRateLimitStore()
): Router {
  const router = Router();
  applyBlogGuards(router, config);
  const limiters = createBlogRateLimiters(config, rateLimitStore, "comments");

  router.get("/pending", requireAdmin, limiters.read, async (_req: Request, res: Response) => {
    try {
      const comments = await services.comments.listPending();
      res.status(200).json({ items: comments.map(serializeComment) });
    } catch (error) {
      sendError(res, error, logger, { route: "comments.list_pending" });
    }
  });

  router.get("/user/:userId", limiters.read, async (req: Request, res: Response) => {
    try {
      const userId = parseIdParam(req, "userId");
      const actor = getOptionalActor(req);
      const canSeePending = Boolean(actor && (actor.isAdmin || actor.userId === userId));
      const comments = await services.comments.listByUser(userId);
      res.status(200).json({
        items: comments.filter((comment) => canSeePending || comment.isApproved).map(serializeComment)
      });
    } catch (error) {
      sendError(res, error, logger, { route: "comments.list_by_user" });
    }
  });

  router.get("/:commentId", limiters.read, async (req: Request, res: Response) => {
    try {
      const comment = await services.comments.getById(parseIdParam(req, "commentId"));
      const actor = getOptionalActor(req);
      if (!comment.isApproved && !(actor && (actor.isAdmin || actor.userId === comment.authorId))) {
        throw new NotFoundError("comment not found");
      }
      res.status(200).json(serializeComment(comment));
    } catch (error) {
      sendError(res, error, logger, { route: "comments.get" });
    }
  });

  router.post("/", requireAuthenticated, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      actorId = getActor(req).userId;
      const body = readBody(req);
      const postId = parseOptionalIdValue(body.post_id, "post_id");
      if (!postId) {
        throw new ValidationError("post_id is required");
      }

      const comment = await services.comments.create(actorId, {
        postId,
        content: requireString(body, "content"),
        parentCommentId: parseOptionalIdValue(body.parent_comment_id, "parent_comment_id")
      });

      logger.info("blog_comment_created", { actorId, commentId: comment.id, postId: comment.postId });
      res.status(201).json(serializeComment(comment));
    } catch (error) {
      sendError(res, error, logger, { route: "comments.create", actorId });
    }
  });

  router.post("/:commentId/replies", requireAuthenticated, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      actorId = getActor(req).userId;
      const parentId = parseIdParam(req, "commentId");
      const comment = await services.comments.reply(parentId, actorId, {
        content: requireString(readBody(req), "content")
      });

      logger.info("blog_comment_replied", { actorId, commentId: comment.id, parentCommentId: parentId });
      res.status(201).json(serializeComment(comment));
    } catch (error) {
      sendError(res, error, logger, { route: "comments.reply", actorId });
    }
  });

  router.patch("/:commentId", requireAuthenticated, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      actorId = getActor(req).userId;
      const commentId = parseIdParam(req, "commentId");
      const comment = await services.comments.update(commentId, actorId, requireString(readBody(req), "content"));

      logger.info("blog_comment_updated", { actorId, commentId });
      res.status(200).json(serializeComment(comment));
    } catch (error) {
      sendError(res, error, logger, { route: "comments.update", actorId });
    }
  });

  router.delete("/:commentId", requireAuthenticated, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      const actor = getActor(req);
      actorId = actor.userId;
      const commentId = parseIdParam(req, "commentId");
      await services.comments.delete(commentId, actor.userId, actor.isAdmin);

      logger.info("blog_comment_deleted", { actorId, commentId });
      res.status(204).end();
    } catch (error) {
      sendError(res, error, logger, { route: "comments.delete", actorId });
    }
  });

  router.post("/:commentId/approve", requireAdmin, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      actorId = getActor(req).userId;
      const comment = await services.comments.approve(parseIdParam(req, "commentId"));

      logger.info("blog_comment_approved", { actorId, commentId: comment.id });
      res.status(200).json(serializeComment(comment));
    } catch (error) {
      sendError(res, error, logger, { route: "comments.approve", actorId });
    }
  });

  router.post("/:commentId/reject", requireAdmin, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      actorId = getActor(req).userId;
      const commentId = parseIdParam(req, "commentId");
      await services.comments.reject(commentId);

      logger.info("blog_comment_rejected", { actorId, commentId });
      res.status(204).end();
    } catch (error) {
      sendError(res, error, logger, { route: "comments.reject", actorId });
    }
  });

  return router;
}
