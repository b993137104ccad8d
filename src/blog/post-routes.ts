import { Router, type Request, type Response } from "express";
import type { AppConfig } from "../config";
import { requireAdmin, requireAuthenticated, requireAuthor } from "../middleware/auth";
import { appLogger, type Logger } from "../security/logger";
import { InMemoryRateLimitStore, type RateLimitStore } from "../security/rate-limit";
import { NotFoundError } from "./errors";
import { applyBlogGuards, createBlogRateLimiters } from "./guards";
import {
  optionalBoolean,
  optionalIdArray,
  optionalNullableString,
  optionalString,
  optionalStringArray,
  parseIdParam,
  parsePagination,
  parseSearchQuery,
  parseSlugParam,
  readBody,
  requireString,
  sendError,
  serializeComment,
  serializePost
} from "./http";
import type { CreatePostInput, UpdatePostInput } from "./posts";
import { getActor, getOptionalActor, resolveViewerSessionId } from "./request-context";
import type { BlogServices } from "./services";

function readCreatePostInput(req: Request): CreatePostInput {
  const body = readBody(req);
  return {
    title: requireString(body, "title"),
    content: requireString(body, "content"),
    summary: optionalString(body, "summary"),
    coverImageUrl: optionalNullableString(body, "cover_image_url"),
    isDraft: optionalBoolean(body, "is_draft"),
    allowComments: optionalBoolean(body, "allow_comments"),
    categoryIds: optionalIdArray(body, "category_ids"),
    tags: optionalStringArray(body, "tags")
  };
}

function readUpdatePostInput(req: Request): UpdatePostInput {
  const body = readBody(req);
  return {
    title: optionalString(body, "title"),
    content: optionalString(body, "content"),
    summary: optionalString(body, "summary"),
    coverImageUrl: optionalNullableString(body, "cover_image_url"),
    allowComments: optionalBoolean(body, "allow_comments"),
    categoryIds: optionalIdArray(body, "category_ids"),
    tags: optionalStringArray(body, "tags")
  };
}

export function createPostRouter(
  config: AppConfig,
  services: BlogServices,
  logger: Logger = appLogger,
  rateLimitStore: RateLimitStore = new InMemoryRateLimitStore()
): Router {
  const router = Router();
  applyBlogGuards(router, config);
  const limiters = createBlogRateLimiters(config, rateLimitStore, "posts");

  router.get("/", limiters.read, async (req: Request, res: Response) => {
    try {
      const pagination = parsePagination(req);
      const posts = await services.posts.listPublished(pagination);
      res.status(200).json({ items: posts.map((post) => serializePost(post)), pagination });
    } catch (error) {
      sendError(res, error, logger, { route: "posts.list" });
    }
  });

  router.get("/featured", limiters.read, async (_req: Request, res: Response) => {
    try {
      const posts = await services.posts.listFeatured();
      res.status(200).json({ items: posts.map((post) => serializePost(post)) });
    } catch (error) {
      sendError(res, error, logger, { route: "posts.featured" });
    }
  });

  router.get("/search", limiters.read, async (req: Request, res: Response) => {
    try {
      const query = parseSearchQuery(req);
      const pagination = parsePagination(req);
      const posts = await services.posts.search(query, pagination);
      res.status(200).json({ items: posts.map((post) => serializePost(post)), pagination });
    } catch (error) {
      sendError(res, error, logger, { route: "posts.search" });
    }
  });

  router.get("/slug/:slug", limiters.read, async (req: Request, res: Response) => {
    try {
      const slug = parseSlugParam(req);
      const post = await services.posts.getBySlug(slug, resolveViewerSessionId(req));
      res.status(200).json(serializePost(post, { includeHtml: true }));
    } catch (error) {
      sendError(res, error, logger, { route: "posts.get_by_slug" });
    }
  });

  router.get("/author/:authorId", limiters.read, async (req: Request, res: Response) => {
    try {
      const authorId = parseIdParam(req, "authorId");
      const actor = getOptionalActor(req);
      const pagination = parsePagination(req);
      const posts = await services.posts.listByAuthor(authorId, {
        includeDrafts: Boolean(actor && (actor.isAdmin || actor.userId === authorId)),
        pagination
      });
      res.status(200).json({ items: posts.map((post) => serializePost(post)), pagination });
    } catch (error) {
      sendError(res, error, logger, { route: "posts.list_by_author" });
    }
  });

  router.get("/category/:categoryId", limiters.read, async (req: Request, res: Response) => {
    try {
      const pagination = parsePagination(req);
      const posts = await services.posts.listByCategory(parseIdParam(req, "categoryId"), pagination);
      res.status(200).json({ items: posts.map((post) => serializePost(post)), pagination });
    } catch (error) {
      sendError(res, error, logger, { route: "posts.list_by_category" });
    }
  });

  router.get("/tag/:tagId", limiters.read, async (req: Request, res: Response) => {
    try {
      const pagination = parsePagination(req);
      const posts = await services.posts.listByTag(parseIdParam(req, "tagId"), pagination);
      res.status(200).json({ items: posts.map((post) => serializePost(post)), pagination });
    } catch (error) {
      sendError(res, error, logger, { route: "posts.list_by_tag" });
    }
  });

  router.get("/:postId", limiters.read, async (req: Request, res: Response) => {
    try {
      const post = await services.posts.getById(parseIdParam(req, "postId"));
      const actor = getOptionalActor(req);
      if (post.status === "draft" && !(actor && (actor.isAdmin || actor.userId === post.authorId))) {
        throw new NotFoundError("post not found");
      }
      res.status(200).json(serializePost(post, { includeHtml: true }));
    } catch (error) {
      sendError(res, error, logger, { route: "posts.get" });
    }
  });

  router.get("/:postId/comments", limiters.read, async (req: Request, res: Response) => {
    try {
      const actor = getOptionalActor(req);
      const comments = await services.comments.listByPost(parseIdParam(req, "postId"), Boolean(actor?.isAdmin));
      res.status(200).json({ items: comments.map(serializeComment) });
    } catch (error) {
      sendError(res, error, logger, { route: "posts.list_comments" });
    }
  });

  router.post("/", requireAuthor, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      const actor = getActor(req);
      actorId = actor.userId;
      const post = await services.posts.create(actor.userId, readCreatePostInput(req));

      logger.info("blog_post_created", { actorId, postId: post.id, status: post.status });
      res.status(201).json(serializePost(post));
    } catch (error) {
      sendError(res, error, logger, { route: "posts.create", actorId });
    }
  });

  router.patch("/:postId", requireAuthenticated, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      const actor = getActor(req);
      actorId = actor.userId;
      const postId = parseIdParam(req, "postId");
      const input = readUpdatePostInput(req);
      await services.posts.assertCanManage(postId, actor);
      const post = await services.posts.update(postId, input);

      logger.info("blog_post_updated", { actorId, postId });
      res.status(200).json(serializePost(post));
    } catch (error) {
      sendError(res, error, logger, { route: "posts.update", actorId });
    }
  });

  router.delete("/:postId", requireAuthenticated, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      const actor = getActor(req);
      actorId = actor.userId;
      const postId = parseIdParam(req, "postId");
      await services.posts.assertCanManage(postId, actor);
      await services.posts.delete(postId);

      logger.info("blog_post_deleted", { actorId, postId });
      res.status(204).end();
    } catch (error) {
      sendError(res, error, logger, { route: "posts.delete", actorId });
    }
  });

  for (const transition of ["publish", "unpublish"] as const) {
    router.post(`/:postId/${transition}`, requireAuthenticated, limiters.write, async (req: Request, res: Response) => {
      let actorId: string | undefined;
      try {
        const actor = getActor(req);
        actorId = actor.userId;
        const postId = parseIdParam(req, "postId");
        await services.posts.assertCanManage(postId, actor);
        const post =
          transition === "publish" ? await services.posts.publish(postId) : await services.posts.unpublish(postId);

        logger.info(`blog_post_${transition}ed`, { actorId, postId });
        res.status(200).json(serializePost(post));
      } catch (error) {
        sendError(res, error, logger, { route: `posts.${transition}`, actorId });
      }
    });
  }

  for (const transition of ["feature", "unfeature"] as const) {
    router.post(`/:postId/${transition}`, requireAdmin, limiters.write, async (req: Request, res: Response) => {
      let actorId: string | undefined;
      try {
        actorId = getActor(req).userId;
        const postId = parseIdParam(req, "postId");
        const post =
          transition === "feature" ? await services.posts.feature(postId) : await services.posts.unfeature(postId);

        logger.info(`blog_post_${transition}d`, { actorId, postId });
        res.status(200).json(serializePost(post));
      } catch (error) {
        sendError(res, error, logger, { route: `posts.${transition}`, actorId });
      }
    });
  }

  return router;
}
