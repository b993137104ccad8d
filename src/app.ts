import express, { type ErrorRequestHandler, type Express } from "express";
import type { AppConfig } from "./config";
import { createCommentRouter } from "./blog/comment-routes";
import { createInMemoryRepositories } from "./blog/memory-repository";
import { createPostRouter } from "./blog/post-routes";
import type { BlogRepositories } from "./blog/repository";
import { createBlogServices } from "./blog/services";
import { createCategoryRouter, createTagRouter } from "./blog/taxonomy-routes";
import { createUserRouter } from "./blog/user-routes";
import { InMemoryViewMarkerStore, type ViewMarkerStore } from "./blog/view-tracker";
import { appLogger, type Logger } from "./security/logger";
import { InMemoryRateLimitStore, type RateLimitStore } from "./security/rate-limit";

export interface AppDependencies {
  logger?: Logger;
  repositories?: BlogRepositories;
  viewMarkerStore?: ViewMarkerStore;
  rateLimitStore?: RateLimitStore;
  healthCheck?: () => Promise<void> | void;
  now?: () => number;
}

// body-parser reports malformed or oversized bodies as errors carrying a 4xx `status`.
function clientErrorStatus(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status >= 400 && error.status < 500 ? error.status : null;
  }
  return null;
}

function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req, res, _next) => {
    const statusCode = clientErrorStatus(error);
    if (statusCode !== null) {
      logger.info("blog_request_failed", { route: req.path, statusCode, errorType: "validation" });
      res.status(statusCode).json({ error: "Invalid request body" });
      return;
    }

    logger.error("blog_request_failed", { route: req.path, statusCode: 500, errorType: "internal", error });
    res.status(500).json({ error: "Internal server error" });
  };
}

export function createApp(config: AppConfig, dependencies: AppDependencies = {}): Express {
  const app = express();
  const logger = dependencies.logger ?? appLogger;
  const repositories = dependencies.repositories ?? createInMemoryRepositories();
  const viewMarkerStore = dependencies.viewMarkerStore ?? new InMemoryViewMarkerStore();
  const rateLimitStore = dependencies.rateLimitStore ?? new InMemoryRateLimitStore();
  const healthCheck = dependencies.healthCheck ?? (() => undefined);
  const services = createBlogServices(config, repositories, viewMarkerStore, dependencies.now);

  app.disable("x-powered-by");
  app.use(express.json({ limit: "128kb" }));

  app.get("/healthz", async (_req, res) => {
    try {
      await healthCheck();
      res.status(200).json({ ok: true });
      return;
    } catch (error) {
      logger.warn("health_check_failed", { error });
      res.status(503).json({ ok: false });
    }
  });

  app.use("/api/posts", createPostRouter(config, services, logger, rateLimitStore));
  app.use("/api/comments", createCommentRouter(config, services, logger, rateLimitStore));
  app.use("/api/categories", createCategoryRouter(config, services, logger, rateLimitStore));
  app.use("/api/tags", createTagRouter(config, services, logger, rateLimitStore));
  app.use("/api/users", createUserRouter(config, services, logger, rateLimitStore));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });
  app.use(createErrorHandler(logger));

  return app;
}
