import { Router, type Request, type Response } from "express";
import type { AppConfig } from "../config";
import { requireAdmin } from "../middleware/auth";
import { appLogger, type Logger } from "../security/logger";
import { InMemoryRateLimitStore, type RateLimitStore } from "../security/rate-limit";
import { applyBlogGuards, createBlogRateLimiters } from "./guards";
import {
  optionalNullableString,
  optionalString,
  parseIdParam,
  parseLimit,
  parseSlugParam,
  readBody,
  requireString,
  sendError
} from "./http";
import { sendPublicCachedReadJson } from "./read-cache";
import { getActor } from "./request-context";
import type { BlogServices } from "./services";
import { DEFAULT_POPULAR_TAG_LIMIT } from "./tags";
import type { CategoryRecord, CategoryWithPostCount, TagRecord, TagWithPostCount } from "./types";

function serializeCategory(category: CategoryRecord | CategoryWithPostCount) {
  return {
    id: category.id,
    name: category.name,
    slug: category.slug,
    description: category.description,
    ...("postCount" in category ? { post_count: category.postCount } : {}),
    created_at: category.createdAt,
    updated_at: category.updatedAt
  };
}

function serializeTag(tag: TagRecord | TagWithPostCount) {
  return {
    id: tag.id,
    name: tag.name,
    slug: tag.slug,
    ...("postCount" in tag ? { post_count: tag.postCount } : {}),
    created_at: tag.createdAt,
    updated_at: tag.updatedAt
  };
}

export function createCategoryRouter(
  config: AppConfig,
  services: BlogServices,
  logger: Logger = appLogger,
  rateLimitStore: RateLimitStore = new InMemoryRateLimitStore()
): Router {
  const router = Router();
  applyBlogGuards(router, config);
  const limiters = createBlogRateLimiters(config, rateLimitStore, "categories");

  router.get("/", limiters.read, async (req: Request, res: Response) => {
    try {
      const categories = await services.categories.list();
      sendPublicCachedReadJson(req, res, { items: categories.map(serializeCategory) });
    } catch (error) {
      sendError(res, error, logger, { route: "categories.list" });
    }
  });

  router.get("/with-post-count", limiters.read, async (req: Request, res: Response) => {
    try {
      const categories = await services.categories.listWithPostCount();
      sendPublicCachedReadJson(req, res, { items: categories.map(serializeCategory) });
    } catch (error) {
      sendError(res, error, logger, { route: "categories.list_with_post_count" });
    }
  });

  router.get("/slug/:slug", limiters.read, async (req: Request, res: Response) => {
    try {
      const category = await services.categories.getBySlug(parseSlugParam(req));
      res.status(200).json(serializeCategory(category));
    } catch (error) {
      sendError(res, error, logger, { route: "categories.get_by_slug" });
    }
  });

  router.get("/:categoryId", limiters.read, async (req: Request, res: Response) => {
    try {
      const category = await services.categories.getById(parseIdParam(req, "categoryId"));
      res.status(200).json(serializeCategory(category));
    } catch (error) {
      sendError(res, error, logger, { route: "categories.get" });
    }
  });

  router.post("/", requireAdmin, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      actorId = getActor(req).userId;
      const body = readBody(req);
      const category = await services.categories.create({
        name: requireString(body, "name"),
        slug: optionalString(body, "slug"),
        description: optionalNullableString(body, "description")
      });

      logger.info("blog_category_created", { actorId, categoryId: category.id, slug: category.slug });
      res.status(201).json(serializeCategory(category));
    } catch (error) {
      sendError(res, error, logger, { route: "categories.create", actorId });
    }
  });

  router.patch("/:categoryId", requireAdmin, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      actorId = getActor(req).userId;
      const categoryId = parseIdParam(req, "categoryId");
      const body = readBody(req);
      const category = await services.categories.update(categoryId, {
        name: optionalString(body, "name"),
        slug: optionalString(body, "slug"),
        description: optionalNullableString(body, "description")
      });

      logger.info("blog_category_updated", { actorId, categoryId });
      res.status(200).json(serializeCategory(category));
    } catch (error) {
      sendError(res, error, logger, { route: "categories.update", actorId });
    }
  });

  router.delete("/:categoryId", requireAdmin, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      actorId = getActor(req).userId;
      const categoryId = parseIdParam(req, "categoryId");
      await services.categories.delete(categoryId);

      logger.info("blog_category_deleted", { actorId, categoryId });
      res.status(204).end();
    } catch (error) {
      sendError(res, error, logger, { route: "categories.delete", actorId });
    }
  });

  return router;
}

export function createTagRouter(
  config: AppConfig,
  services: BlogServices,
  logger: Logger = appLogger,
  rateLimitStore: RateLimitStore = new InMemoryRateLimitStore()
): Router {
  const router = Router();
  applyBlogGuards(router, config);
  const limiters = createBlogRateLimiters(config, rateLimitStore, "tags");

  router.get("/", limiters.read, async (req: Request, res: Response) => {
    try {
      const tags = await services.tags.list();
      sendPublicCachedReadJson(req, res, { items: tags.map(serializeTag) });
    } catch (error) {
      sendError(res, error, logger, { route: "tags.list" });
    }
  });

  router.get("/with-post-count", limiters.read, async (req: Request, res: Response) => {
    try {
      const tags = await services.tags.listWithPostCount();
      sendPublicCachedReadJson(req, res, { items: tags.map(serializeTag) });
    } catch (error) {
      sendError(res, error, logger, { route: "tags.list_with_post_count" });
    }
  });

  router.get("/popular", limiters.read, async (req: Request, res: Response) => {
    try {
      const tags = await services.tags.listPopular(parseLimit(req, DEFAULT_POPULAR_TAG_LIMIT));
      sendPublicCachedReadJson(req, res, { items: tags.map(serializeTag) });
    } catch (error) {
      sendError(res, error, logger, { route: "tags.popular" });
    }
  });

  router.get("/slug/:slug", limiters.read, async (req: Request, res: Response) => {
    try {
      const tag = await services.tags.getBySlug(parseSlugParam(req));
      res.status(200).json(serializeTag(tag));
    } catch (error) {
      sendError(res, error, logger, { route: "tags.get_by_slug" });
    }
  });

  router.get("/:tagId", limiters.read, async (req: Request, res: Response) => {
    try {
      const tag = await services.tags.getById(parseIdParam(req, "tagId"));
      res.status(200).json(serializeTag(tag));
    } catch (error) {
      sendError(res, error, logger, { route: "tags.get" });
    }
  });

  router.post("/", requireAdmin, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      actorId = getActor(req).userId;
      const body = readBody(req);
      const tag = await services.tags.create({
        name: requireString(body, "name"),
        slug: optionalString(body, "slug")
      });

      logger.info("blog_tag_created", { actorId, tagId: tag.id, slug: tag.slug });
      res.status(201).json(serializeTag(tag));
    } catch (error) {
      sendError(res, error, logger, { route: "tags.create", actorId });
    }
  });

  router.patch("/:tagId", requireAdmin, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      actorId = getActor(req).userId;
      const tagId = parseIdParam(req, "tagId");
      const body = readBody(req);
      const tag = await services.tags.update(tagId, {
        name: optionalString(body, "name"),
        slug: optionalString(body, "slug")
      });

      logger.info("blog_tag_updated", { actorId, tagId });
      res.status(200).json(serializeTag(tag));
    } catch (error) {
      sendError(res, error, logger, { route: "tags.update", actorId });
    }
  });

  router.delete("/:tagId", requireAdmin, limiters.write, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    try {
      actorId = getActor(req).userId;
      const tagId = parseIdParam(req, "tagId");
      await services.tags.delete(tagId);

      logger.info("blog_tag_deleted", { actorId, tagId });
      res.status(204).end();
    } catch (error) {
      sendError(res, error, logger, { route: "tags.delete", actorId });
    }
  });

  return router;
}
