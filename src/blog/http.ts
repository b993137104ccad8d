import type { Request, Response } from "express";
import type { Logger } from "../security/logger";
import { renderMarkdownSafe } from "../security/markdown";
import { type BlogErrorKind, ValidationError, isBlogError } from "./errors";
import { assertSlugShape } from "./validation";
import type { CommentRecord, PaginationInput, PostAggregate, UserRecord } from "./types";
import type { UserProfile, UserStatistics } from "./users";

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 50;
const MAX_SEARCH_LENGTH = 120;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

const STATUS_BY_KIND: Record<BlogErrorKind, number> = {
  not_found: 404,
  conflict: 409,
  forbidden: 403,
  invalid_state: 422,
  validation: 400
};

type RequestBody = Record<string, unknown>;

function firstValue(rawValue: unknown): unknown {
  return Array.isArray(rawValue) ? rawValue[0] : rawValue;
}

function parseIntegerValue(name: string, rawValue: unknown): number | undefined {
  if (rawValue === undefined || rawValue === null) {
    return undefined;
  }

  const value = firstValue(rawValue);
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ValidationError(`${name} must be a non-negative integer`);
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ValidationError(`${name} must be a non-negative integer`);
  }

  return parsed;
}

export function parsePagination(req: Request): PaginationInput {
  const requestedLimit = parseIntegerValue("limit", req.query.limit);
  const limit = Math.min(Math.max(requestedLimit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = parseIntegerValue("offset", req.query.offset) ?? 0;
  return { limit, offset };
}

export function parseLimit(req: Request, defaultLimit: number): number {
  const requestedLimit = parseIntegerValue("limit", req.query.limit);
  return Math.min(Math.max(requestedLimit ?? defaultLimit, 1), MAX_LIMIT);
}

export function parseSearchQuery(req: Request): string {
  const query = firstValue(req.query.q);
  if (typeof query !== "string" || query.trim().length === 0) {
    throw new ValidationError("q is required");
  }

  const normalized = query.trim();
  if (normalized.length > MAX_SEARCH_LENGTH) {
    throw new ValidationError(`q must be ${MAX_SEARCH_LENGTH} characters or less`);
  }
  return normalized;
}

export function parseIdParam(req: Request, name: string): string {
  const value = req.params[name];
  if (typeof value !== "string" || !UUID_PATTERN.test(value)) {
    throw new ValidationError(`${name} must be a valid id`);
  }
  return value.toLowerCase();
}

export function parseOptionalIdValue(value: unknown, field: string): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "string" || !UUID_PATTERN.test(value)) {
    throw new ValidationError(`${field} must be a valid id`);
  }
  return value.toLowerCase();
}

export function parseSlugParam(req: Request, name = "slug"): string {
  const value = req.params[name];
  return assertSlugShape(typeof value === "string" ? value.toLowerCase() : "");
}

export function readBody(req: Request): RequestBody {
  const body: unknown = req.body;
  if (!body || typeof body !== "object" || Array.isArray(body)) {
    return {};
  }

  const result: RequestBody = {};
  for (const [key, value] of Object.entries(body)) {
    result[key] = value;
  }
  return result;
}

export function requireString(body: RequestBody, field: string): string {
  const value = body[field];
  if (typeof value !== "string") {
    throw new ValidationError(`${field} is required`);
  }
  return value;
}

export function optionalString(body: RequestBody, field: string): string | undefined {
  const value = body[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be a string`);
  }
  return value;
}

export function optionalNullableString(body: RequestBody, field: string): string | null | undefined {
  return body[field] === null ? null : optionalString(body, field);
}

export function optionalBoolean(body: RequestBody, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new ValidationError(`${field} must be a boolean`);
  }
  return value;
}

export function requireBoolean(body: RequestBody, field: string): boolean {
  const value = optionalBoolean(body, field);
  if (value === undefined) {
    throw new ValidationError(`${field} is required`);
  }
  return value;
}

export function optionalStringArray(body: RequestBody, field: string): string[] | undefined {
  const value = body[field];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ValidationError(`${field} must be an array of strings`);
  }
  return value;
}

export function optionalIdArray(body: RequestBody, field: string): string[] | undefined {
  const ids = optionalStringArray(body, field);
  if (ids && ids.some((id) => !UUID_PATTERN.test(id))) {
    throw new ValidationError(`${field} must contain valid ids`);
  }
  return ids?.map((id) => id.toLowerCase());
}

export function sendError(
  res: Response,
  error: unknown,
  logger: Logger,
  metadata: { route: string; actorId?: string; [key: string]: unknown }
): void {
  if (isBlogError(error)) {
    const statusCode = STATUS_BY_KIND[error.kind];
    logger.info("blog_request_failed", { ...metadata, statusCode, errorType: error.kind });
    res.status(statusCode).json({ error: error.message });
    return;
  }

  logger.error("blog_request_failed", { ...metadata, statusCode: 500, errorType: "internal", error });
  res.status(500).json({ error: "Internal server error" });
}

export function serializePost(post: PostAggregate, options: { includeHtml?: boolean } = {}) {
  return {
    id: post.id,
    title: post.title,
    slug: post.slug,
    content: post.content,
    ...(options.includeHtml ? { content_html: renderMarkdownSafe(post.content) } : {}),
    summary: post.summary,
    cover_image_url: post.coverImageUrl,
    status: post.status,
    published_at: post.publishedAt,
    view_count: post.viewCount,
    allow_comments: post.allowComments,
    is_featured: post.isFeatured,
    author: post.author
      ? { id: post.author.id, username: post.author.username, display_name: post.author.displayName }
      : null,
    categories: post.categories,
    tags: post.tags,
    created_at: post.createdAt,
    updated_at: post.updatedAt
  };
}

export function serializeComment(comment: CommentRecord) {
  return {
    id: comment.id,
    content: comment.content,
    is_approved: comment.isApproved,
    post_id: comment.postId,
    author_id: comment.authorId,
    parent_comment_id: comment.parentCommentId,
    created_at: comment.createdAt,
    updated_at: comment.updatedAt
  };
}

export function serializeUser(user: UserRecord) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    display_name: user.displayName,
    role: user.role,
    is_active: user.isActive,
    created_at: user.createdAt,
    updated_at: user.updatedAt
  };
}

export function serializeUserProfile(profile: UserProfile) {
  return {
    ...serializeUser(profile),
    post_count: profile.postCount,
    comment_count: profile.commentCount
  };
}

export function serializeUserStatistics(statistics: UserStatistics) {
  return {
    total_posts: statistics.totalPosts,
    published_posts: statistics.publishedPosts,
    draft_posts: statistics.draftPosts,
    total_comments: statistics.totalComments,
    approved_comments: statistics.approvedComments,
    pending_comments: statistics.pendingComments
  };
}
