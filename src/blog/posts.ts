import type { UserRole } from "../types/context";
import { ForbiddenError, NotFoundError } from "./errors";
import type { BlogRepositories, PostListFilter, PostOrder, PostPatch } from "./repository";
import { generateSlug, suffixedSlugCandidate } from "./slug";
import { assertTagNames, TaxonomyReconciler } from "./taxonomy";
import type { AuthorSummary, PaginationInput, PostAggregate, PostRecord } from "./types";
import {
  sanitizeContent,
  sanitizeCoverImageUrl,
  sanitizeSummary,
  sanitizeTitle
} from "./validation";
import { DEFAULT_VIEW_THROTTLE_WINDOW_MS, shouldCountView, type ViewMarkerStore } from "./view-tracker";

export interface CreatePostInput {
  title: string;
  content: string;
  summary?: string;
  coverImageUrl?: string | null;
  isDraft?: boolean;
  allowComments?: boolean;
  categoryIds?: string[];
  tags?: string[];
}

export interface UpdatePostInput {
  title?: string;
  content?: string;
  summary?: string;
  coverImageUrl?: string | null;
  allowComments?: boolean;
  categoryIds?: string[];
  tags?: string[];
}

export interface PostActor {
  userId: string;
  role: UserRole;
}

export interface ListByAuthorOptions {
  includeDrafts: boolean;
  pagination?: PaginationInput;
}

export interface PostServiceOptions {
  now?: () => number;
  viewThrottleWindowMs?: number;
}

export class PostService {
  private readonly taxonomy: TaxonomyReconciler;
  private readonly now: () => number;
  private readonly viewThrottleWindowMs: number;

  constructor(
    private readonly repositories: BlogRepositories,
    private readonly viewMarkers: ViewMarkerStore,
    options: PostServiceOptions = {}
  ) {
    this.taxonomy = new TaxonomyReconciler(repositories.posts, repositories.categories, repositories.tags);
    this.now = options.now ?? (() => Date.now());
    this.viewThrottleWindowMs = options.viewThrottleWindowMs ?? DEFAULT_VIEW_THROTTLE_WINDOW_MS;
  }

  async create(authorId: string, input: CreatePostInput): Promise<PostAggregate> {
    const author = await this.repositories.users.findById(authorId);
    if (!author) {
      throw new NotFoundError("author not found");
    }

    const title = sanitizeTitle(input.title);
    assertTagNames(input.tags);
    const isDraft = input.isDraft ?? true;
    const post = await this.repositories.posts.insert({
      title,
      slug: await this.uniqueSlug(title),
      content: sanitizeContent(input.content),
      summary: sanitizeSummary(input.summary ?? ""),
      coverImageUrl: sanitizeCoverImageUrl(input.coverImageUrl ?? null),
      status: isDraft ? "draft" : "published",
      publishedAt: isDraft ? null : this.timestamp(),
      allowComments: input.allowComments ?? true,
      authorId
    });

    await this.taxonomy.apply(post.id, { categoryIds: input.categoryIds, tags: input.tags });
    return this.getById(post.id);
  }

  async update(postId: string, input: UpdatePostInput): Promise<PostAggregate> {
    const current = await this.requirePost(postId);
    assertTagNames(input.tags);
    const patch: PostPatch = {};

    if (input.title !== undefined) {
      const title = sanitizeTitle(input.title);
      if (title !== current.title) {
        patch.title = title;
        patch.slug = await this.uniqueSlug(title, postId);
      }
    }
    if (input.content !== undefined) {
      patch.content = sanitizeContent(input.content);
    }
    if (input.summary !== undefined) {
      patch.summary = sanitizeSummary(input.summary);
    }
    if (input.coverImageUrl !== undefined) {
      patch.coverImageUrl = sanitizeCoverImageUrl(input.coverImageUrl);
    }
    if (input.allowComments !== undefined) {
      patch.allowComments = input.allowComments;
    }

    await this.persist(postId, patch);
    await this.taxonomy.apply(postId, { categoryIds: input.categoryIds, tags: input.tags });
    return this.getById(postId);
  }

  async delete(postId: string): Promise<void> {
    const deleted = await this.repositories.posts.delete(postId);
    if (!deleted) {
      throw new NotFoundError("post not found");
    }
    await this.viewMarkers.forgetPost(postId);
  }

  /** Idempotent; every call moves publishedAt to now. */
  async publish(postId: string): Promise<PostAggregate> {
    await this.persist(postId, { status: "published", publishedAt: this.timestamp() });
    return this.getById(postId);
  }

  /** Idempotent; publishedAt is kept. */
  async unpublish(postId: string): Promise<PostAggregate> {
    await this.persist(postId, { status: "draft" });
    return this.getById(postId);
  }

  async feature(postId: string): Promise<PostAggregate> {
    await this.persist(postId, { isFeatured: true });
    return this.getById(postId);
  }

  async unfeature(postId: string): Promise<PostAggregate> {
    await this.persist(postId, { isFeatured: false });
    return this.getById(postId);
  }

  async getById(postId: string): Promise<PostAggregate> {
    const post = await this.requirePost(postId);
    const [aggregate] = await this.toAggregates([post]);
    return aggregate;
  }

  /**
   * Resolves published posts only. A view is counted when this session has no
   * marker for the post or its marker is older than the throttle window.
   */
  async getBySlug(slug: string, sessionId: string): Promise<PostAggregate> {
    const post = await this.repositories.posts.findBySlug(slug);
    if (!post || post.status !== "published") {
      throw new NotFoundError("post not found");
    }

    const nowMs = this.now();
    const lastViewedAt = await this.viewMarkers.getLastViewedAt(sessionId, post.id);
    let current = post;

    if (shouldCountView(lastViewedAt, nowMs, this.viewThrottleWindowMs)) {
      current = (await this.repositories.posts.update(post.id, { viewCount: post.viewCount + 1 })) ?? post;
      await this.viewMarkers.setLastViewedAt(sessionId, post.id, nowMs);
    }

    const [aggregate] = await this.toAggregates([current]);
    return aggregate;
  }

  listPublished(pagination: PaginationInput): Promise<PostAggregate[]> {
    return this.listPosts({ status: "published" }, "published_at_desc", pagination);
  }

  listByAuthor(authorId: string, options: ListByAuthorOptions): Promise<PostAggregate[]> {
    if (options.includeDrafts) {
      return this.listPosts({ authorId }, "created_at_desc", options.pagination);
    }
    return this.listPosts({ authorId, status: "published" }, "published_at_desc", options.pagination);
  }

  listFeatured(pagination?: PaginationInput): Promise<PostAggregate[]> {
    return this.listPosts({ status: "published", featured: true }, "published_at_desc", pagination);
  }

  async search(query: string, pagination: PaginationInput): Promise<PostAggregate[]> {
    const search = query.trim();
    if (search.length === 0) {
      return [];
    }
    return this.listPosts({ status: "published", search }, "published_at_desc", pagination);
  }

  async listByCategory(categoryId: string, pagination: PaginationInput): Promise<PostAggregate[]> {
    if (!(await this.repositories.categories.findById(categoryId))) {
      throw new NotFoundError("category not found");
    }
    return this.listPosts({ status: "published", categoryId }, "published_at_desc", pagination);
  }

  async listByTag(tagId: string, pagination: PaginationInput): Promise<PostAggregate[]> {
    if (!(await this.repositories.tags.findById(tagId))) {
      throw new NotFoundError("tag not found");
    }
    return this.listPosts({ status: "published", tagId }, "published_at_desc", pagination);
  }

  /** Owner or admin; NotFound takes precedence over Forbidden. */
  async assertCanManage(postId: string, actor: PostActor): Promise<PostRecord> {
    const post = await this.requirePost(postId);
    if (actor.role !== "ADMIN" && post.authorId !== actor.userId) {
      throw new ForbiddenError("only the author or an admin can manage this post");
    }
    return post;
  }

  private async uniqueSlug(title: string, excludePostId?: string): Promise<string> {
    const base = generateSlug(title);
    for (let attempt = 0; ; attempt += 1) {
      const candidate = suffixedSlugCandidate(base, attempt);
      if (!(await this.repositories.posts.slugExists(candidate, excludePostId))) {
        return candidate;
      }
    }
  }

  private async requirePost(postId: string): Promise<PostRecord> {
    const post = await this.repositories.posts.findById(postId);
    if (!post) {
      throw new NotFoundError("post not found");
    }
    return post;
  }

  private async persist(postId: string, patch: PostPatch): Promise<PostRecord> {
    const updated = await this.repositories.posts.update(postId, patch);
    if (!updated) {
      throw new NotFoundError("post not found");
    }
    return updated;
  }

  private async listPosts(
    filter: PostListFilter,
    order: PostOrder,
    pagination?: PaginationInput
  ): Promise<PostAggregate[]> {
    const posts = await this.repositories.posts.list({ filter, order, pagination });
    return this.toAggregates(posts);
  }

  private async toAggregates(posts: PostRecord[]): Promise<PostAggregate[]> {
    if (posts.length === 0) {
      return [];
    }

    const taxonomy = await this.repositories.posts.loadTaxonomy(posts.map((post) => post.id));
    const authorIds = [...new Set(posts.map((post) => post.authorId))];
    const authors = new Map<string, AuthorSummary>(
      (await this.repositories.users.findByIds(authorIds)).map((user) => [
        user.id,
        { id: user.id, username: user.username, displayName: user.displayName }
      ])
    );

    return posts.map((post) => ({
      ...post,
      categories: taxonomy.get(post.id)?.categories ?? [],
      tags: taxonomy.get(post.id)?.tags ?? [],
      author: authors.get(post.authorId) ?? null
    }));
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}
