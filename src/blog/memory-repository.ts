import { randomUUID } from "node:crypto";
import { ConflictError } from "./errors";
import type {
  BlogRepositories,
  CategoryPatch,
  CategoryRepository,
  CommentPatch,
  CommentRepository,
  ListCommentsByPostInput,
  NewCategoryRecord,
  NewCommentRecord,
  NewPostRecord,
  NewTagRecord,
  NewUserRecord,
  PostListQuery,
  PostPatch,
  PostRepository,
  TagPatch,
  TagRepository,
  UserPatch,
  UserRepository
} from "./repository";
import type {
  CategoryRecord,
  CategoryWithPostCount,
  CommentRecord,
  PostRecord,
  PostTaxonomy,
  TagRecord,
  TagWithPostCount,
  TaxonomyRef,
  UserRecord
} from "./types";

interface JoinRow {
  postId: string;
  targetId: string;
}

export interface InMemoryBlogSeed {
  users?: UserRecord[];
  posts?: PostRecord[];
  categories?: CategoryRecord[];
  tags?: TagRecord[];
  comments?: CommentRecord[];
  postCategories?: Array<{ postId: string; categoryId: string }>;
  postTags?: Array<{ postId: string; tagId: string }>;
}

/**
 * Shared backing state for the in-memory repositories so that joins, counts and
 * cascades behave the way the relational schema does.
 */
export class InMemoryBlogStore {
  users: UserRecord[];
  posts: PostRecord[];
  categories: CategoryRecord[];
  tags: TagRecord[];
  comments: CommentRecord[];
  postCategories: JoinRow[];
  postTags: JoinRow[];
  private clockMs = 0;

  constructor(seed: InMemoryBlogSeed = {}) {
    this.users = [...(seed.users ?? [])];
    this.posts = [...(seed.posts ?? [])];
    this.categories = [...(seed.categories ?? [])];
    this.tags = [...(seed.tags ?? [])];
    this.comments = [...(seed.comments ?? [])];
    this.postCategories = (seed.postCategories ?? []).map((row) => ({ postId: row.postId, targetId: row.categoryId }));
    this.postTags = (seed.postTags ?? []).map((row) => ({ postId: row.postId, targetId: row.tagId }));
  }

  // Strictly increasing so ordering by timestamp stays deterministic within one millisecond.
  timestamp(): string {
    this.clockMs = Math.max(Date.now(), this.clockMs + 1);
    return new Date(this.clockMs).toISOString();
  }
}

function toRef(record: { id: string; name: string; slug: string }): TaxonomyRef {
  return { id: record.id, name: record.name, slug: record.slug };
}

function compareDesc(left: string | null, right: string | null): number {
  return (right ?? "").localeCompare(left ?? "");
}

function countJoins(rows: JoinRow[], targetId: string): number {
  return rows.filter((row) => row.targetId === targetId).length;
}

function uniqueIds(ids: string[]): string[] {
  return [...new Set(ids)];
}

function definedFields<T extends object>(patch: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(patch) as Array<keyof T>) {
    if (patch[key] !== undefined) {
      result[key] = patch[key];
    }
  }
  return result;
}

export class InMemoryPostRepository implements PostRepository {
  constructor(private readonly store: InMemoryBlogStore) {}

  async findById(id: string): Promise<PostRecord | null> {
    const post = this.store.posts.find((candidate) => candidate.id === id);
    return post ? { ...post } : null;
  }

  async findBySlug(slug: string): Promise<PostRecord | null> {
    const post = this.store.posts.find((candidate) => candidate.slug === slug);
    return post ? { ...post } : null;
  }

  async slugExists(slug: string, excludePostId?: string): Promise<boolean> {
    return this.store.posts.some((post) => post.slug === slug && post.id !== excludePostId);
  }

  async list(query: PostListQuery): Promise<PostRecord[]> {
    const { filter } = query;
    const search = filter.search?.toLowerCase();

    const matches = this.store.posts
      .filter((post) => !filter.status || post.status === filter.status)
      .filter((post) => !filter.authorId || post.authorId === filter.authorId)
      .filter((post) => filter.featured === undefined || post.isFeatured === filter.featured)
      .filter(
        (post) =>
          !filter.categoryId ||
          this.store.postCategories.some((row) => row.postId === post.id && row.targetId === filter.categoryId)
      )
      .filter(
        (post) =>
          !filter.tagId || this.store.postTags.some((row) => row.postId === post.id && row.targetId === filter.tagId)
      )
      .filter(
        (post) =>
          !search ||
          post.title.toLowerCase().includes(search) ||
          post.content.toLowerCase().includes(search) ||
          post.summary.toLowerCase().includes(search)
      )
      .sort((left, right) => {
        const primary =
          query.order === "published_at_desc"
            ? compareDesc(left.publishedAt, right.publishedAt)
            : compareDesc(left.createdAt, right.createdAt);
        return primary !== 0 ? primary : right.id.localeCompare(left.id);
      });

    const page = query.pagination
      ? matches.slice(query.pagination.offset, query.pagination.offset + query.pagination.limit)
      : matches;

    return page.map((post) => ({ ...post }));
  }

  async insert(input: NewPostRecord): Promise<PostRecord> {
    if (this.store.posts.some((post) => post.slug === input.slug)) {
      throw new ConflictError("post slug already exists");
    }

    const createdAt = this.store.timestamp();
    const post: PostRecord = {
      id: randomUUID(),
      ...input,
      viewCount: 0,
      isFeatured: false,
      createdAt,
      updatedAt: createdAt
    };

    this.store.posts.push(post);
    return { ...post };
  }

  async update(id: string, patch: PostPatch): Promise<PostRecord | null> {
    const index = this.store.posts.findIndex((post) => post.id === id);
    if (index === -1) {
      return null;
    }

    if (
      patch.slug !== undefined &&
      this.store.posts.some((post, postIndex) => postIndex !== index && post.slug === patch.slug)
    ) {
      throw new ConflictError("post slug already exists");
    }

    const next: PostRecord = {
      ...this.store.posts[index],
      ...definedFields(patch),
      updatedAt: this.store.timestamp()
    };
    this.store.posts[index] = next;
    return { ...next };
  }

  async delete(id: string): Promise<boolean> {
    const before = this.store.posts.length;
    this.store.posts = this.store.posts.filter((post) => post.id !== id);
    if (this.store.posts.length === before) {
      return false;
    }

    this.store.postCategories = this.store.postCategories.filter((row) => row.postId !== id);
    this.store.postTags = this.store.postTags.filter((row) => row.postId !== id);
    this.store.comments = this.store.comments.filter((comment) => comment.postId !== id);
    return true;
  }

  async countByAuthor(authorId: string): Promise<{ total: number; published: number; draft: number }> {
    const posts = this.store.posts.filter((post) => post.authorId === authorId);
    return {
      total: posts.length,
      published: posts.filter((post) => post.status === "published").length,
      draft: posts.filter((post) => post.status === "draft").length
    };
  }

  async loadTaxonomy(postIds: string[]): Promise<Map<string, PostTaxonomy>> {
    const result = new Map<string, PostTaxonomy>();

    for (const postId of postIds) {
      const categories = this.store.postCategories
        .filter((row) => row.postId === postId)
        .map((row) => this.store.categories.find((category) => category.id === row.targetId))
        .filter((category): category is CategoryRecord => category !== undefined)
        .map(toRef)
        .sort((left, right) => left.name.localeCompare(right.name));
      const tags = this.store.postTags
        .filter((row) => row.postId === postId)
        .map((row) => this.store.tags.find((tag) => tag.id === row.targetId))
        .filter((tag): tag is TagRecord => tag !== undefined)
        .map(toRef)
        .sort((left, right) => left.name.localeCompare(right.name));

      result.set(postId, { categories, tags });
    }

    return result;
  }

  async replaceCategories(postId: string, categoryIds: string[]): Promise<void> {
    this.store.postCategories = [
      ...this.store.postCategories.filter((row) => row.postId !== postId),
      ...uniqueIds(categoryIds).map((targetId) => ({ postId, targetId }))
    ];
  }

  async replaceTags(postId: string, tagIds: string[]): Promise<void> {
    this.store.postTags = [
      ...this.store.postTags.filter((row) => row.postId !== postId),
      ...uniqueIds(tagIds).map((targetId) => ({ postId, targetId }))
    ];
  }
}

export class InMemoryCategoryRepository implements CategoryRepository {
  constructor(private readonly store: InMemoryBlogStore) {}

  async findById(id: string): Promise<CategoryRecord | null> {
    const category = this.store.categories.find((candidate) => candidate.id === id);
    return category ? { ...category } : null;
  }

  async findByIds(ids: string[]): Promise<CategoryRecord[]> {
    return this.store.categories.filter((category) => ids.includes(category.id)).map((category) => ({ ...category }));
  }

  async findBySlug(slug: string): Promise<CategoryRecord | null> {
    const category = this.store.categories.find((candidate) => candidate.slug === slug);
    return category ? { ...category } : null;
  }

  async isSlugUnique(slug: string): Promise<boolean> {
    return !this.store.categories.some((category) => category.slug === slug);
  }

  async list(): Promise<CategoryRecord[]> {
    return [...this.store.categories]
      .sort((left, right) => left.name.localeCompare(right.name))
      .map((category) => ({ ...category }));
  }

  async listWithPostCount(): Promise<CategoryWithPostCount[]> {
    const categories = await this.list();
    return categories.map((category) => ({
      ...category,
      postCount: countJoins(this.store.postCategories, category.id)
    }));
  }

  async insert(input: NewCategoryRecord): Promise<CategoryRecord> {
    if (this.store.categories.some((category) => category.slug === input.slug)) {
      throw new ConflictError("category slug already exists");
    }

    const createdAt = this.store.timestamp();
    const category: CategoryRecord = { id: randomUUID(), ...input, createdAt, updatedAt: createdAt };
    this.store.categories.push(category);
    return { ...category };
  }

  async update(id: string, patch: CategoryPatch): Promise<CategoryRecord | null> {
    const index = this.store.categories.findIndex((category) => category.id === id);
    if (index === -1) {
      return null;
    }

    if (
      patch.slug !== undefined &&
      this.store.categories.some((category, categoryIndex) => categoryIndex !== index && category.slug === patch.slug)
    ) {
      throw new ConflictError("category slug already exists");
    }

    const next: CategoryRecord = {
      ...this.store.categories[index],
      ...definedFields(patch),
      updatedAt: this.store.timestamp()
    };
    this.store.categories[index] = next;
    return { ...next };
  }

  async delete(id: string): Promise<boolean> {
    const before = this.store.categories.length;
    this.store.categories = this.store.categories.filter((category) => category.id !== id);
    this.store.postCategories = this.store.postCategories.filter((row) => row.targetId !== id);
    return this.store.categories.length !== before;
  }
}

export class InMemoryTagRepository implements TagRepository {
  constructor(private readonly store: InMemoryBlogStore) {}

  async findById(id: string): Promise<TagRecord | null> {
    const tag = this.store.tags.find((candidate) => candidate.id === id);
    return tag ? { ...tag } : null;
  }

  async findBySlug(slug: string): Promise<TagRecord | null> {
    const tag = this.store.tags.find((candidate) => candidate.slug === slug);
    return tag ? { ...tag } : null;
  }

  async isSlugUnique(slug: string): Promise<boolean> {
    return !this.store.tags.some((tag) => tag.slug === slug);
  }

  async list(): Promise<TagRecord[]> {
    return [...this.store.tags].sort((left, right) => left.name.localeCompare(right.name)).map((tag) => ({ ...tag }));
  }

  async listWithPostCount(): Promise<TagWithPostCount[]> {
    const tags = await this.list();
    return tags.map((tag) => ({ ...tag, postCount: countJoins(this.store.postTags, tag.id) }));
  }

  async insert(input: NewTagRecord): Promise<TagRecord> {
    if (this.store.tags.some((tag) => tag.slug === input.slug)) {
      throw new ConflictError("tag slug already exists");
    }

    const createdAt = this.store.timestamp();
    const tag: TagRecord = { id: randomUUID(), ...input, createdAt, updatedAt: createdAt };
    this.store.tags.push(tag);
    return { ...tag };
  }

  async update(id: string, patch: TagPatch): Promise<TagRecord | null> {
    const index = this.store.tags.findIndex((tag) => tag.id === id);
    if (index === -1) {
      return null;
    }

    if (
      patch.slug !== undefined &&
      this.store.tags.some((tag, tagIndex) => tagIndex !== index && tag.slug === patch.slug)
    ) {
      throw new ConflictError("tag slug already exists");
    }

    const next: TagRecord = {
      ...this.store.tags[index],
      ...definedFields(patch),
      updatedAt: this.store.timestamp()
    };
    this.store.tags[index] = next;
    return { ...next };
  }

  async delete(id: string): Promise<boolean> {
    const before = this.store.tags.length;
    this.store.tags = this.store.tags.filter((tag) => tag.id !== id);
    this.store.postTags = this.store.postTags.filter((row) => row.targetId !== id);
    return this.store.tags.length !== before;
  }
}

export class InMemoryCommentRepository implements CommentRepository {
  constructor(private readonly store: InMemoryBlogStore) {}

  async findById(id: string): Promise<CommentRecord | null> {
    const comment = this.store.comments.find((candidate) => candidate.id === id);
    return comment ? { ...comment } : null;
  }

  async listByPost(input: ListCommentsByPostInput): Promise<CommentRecord[]> {
    return this.newestFirst(
      this.store.comments.filter(
        (comment) => comment.postId === input.postId && (input.includePending || comment.isApproved)
      )
    );
  }

  async listByAuthor(authorId: string): Promise<CommentRecord[]> {
    return this.newestFirst(this.store.comments.filter((comment) => comment.authorId === authorId));
  }

  async listPending(): Promise<CommentRecord[]> {
    return this.newestFirst(this.store.comments.filter((comment) => !comment.isApproved));
  }

  async insert(input: NewCommentRecord): Promise<CommentRecord> {
    const createdAt = this.store.timestamp();
    const comment: CommentRecord = { id: randomUUID(), ...input, createdAt, updatedAt: createdAt };
    this.store.comments.push(comment);
    return { ...comment };
  }

  async update(id: string, patch: CommentPatch): Promise<CommentRecord | null> {
    const index = this.store.comments.findIndex((comment) => comment.id === id);
    if (index === -1) {
      return null;
    }

    const next: CommentRecord = {
      ...this.store.comments[index],
      ...definedFields(patch),
      updatedAt: this.store.timestamp()
    };
    this.store.comments[index] = next;
    return { ...next };
  }

  async delete(id: string): Promise<boolean> {
    if (!this.store.comments.some((comment) => comment.id === id)) {
      return false;
    }

    const removed = new Set([id]);
    let grew = true;
    while (grew) {
      grew = false;
      for (const comment of this.store.comments) {
        if (comment.parentCommentId && removed.has(comment.parentCommentId) && !removed.has(comment.id)) {
          removed.add(comment.id);
          grew = true;
        }
      }
    }

    this.store.comments = this.store.comments.filter((comment) => !removed.has(comment.id));
    return true;
  }

  private newestFirst(comments: CommentRecord[]): CommentRecord[] {
    return [...comments]
      .sort((left, right) => compareDesc(left.createdAt, right.createdAt))
      .map((comment) => ({ ...comment }));
  }
}

export class InMemoryUserRepository implements UserRepository {
  constructor(private readonly store: InMemoryBlogStore) {}

  async findById(id: string): Promise<UserRecord | null> {
    const user = this.store.users.find((candidate) => candidate.id === id);
    return user ? { ...user } : null;
  }

  async findByIds(ids: string[]): Promise<UserRecord[]> {
    return this.store.users.filter((user) => ids.includes(user.id)).map((user) => ({ ...user }));
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const user = this.store.users.find((candidate) => candidate.username === username);
    return user ? { ...user } : null;
  }

  async list(): Promise<UserRecord[]> {
    return [...this.store.users]
      .sort((left, right) => left.username.localeCompare(right.username))
      .map((user) => ({ ...user }));
  }

  async insert(input: NewUserRecord): Promise<UserRecord> {
    if (this.store.users.some((user) => user.username === input.username || user.email === input.email)) {
      throw new ConflictError("username or email already exists");
    }

    const createdAt = this.store.timestamp();
    const user: UserRecord = { id: randomUUID(), ...input, isActive: true, createdAt, updatedAt: createdAt };
    this.store.users.push(user);
    return { ...user };
  }

  async update(id: string, patch: UserPatch): Promise<UserRecord | null> {
    const index = this.store.users.findIndex((user) => user.id === id);
    if (index === -1) {
      return null;
    }

    const next: UserRecord = {
      ...this.store.users[index],
      ...definedFields(patch),
      updatedAt: this.store.timestamp()
    };
    this.store.users[index] = next;
    return { ...next };
  }
}

export function createInMemoryRepositories(store: InMemoryBlogStore = new InMemoryBlogStore()): BlogRepositories {
  return {
    posts: new InMemoryPostRepository(store),
    categories: new InMemoryCategoryRepository(store),
    tags: new InMemoryTagRepository(store),
    comments: new InMemoryCommentRepository(store),
    users: new InMemoryUserRepository(store)
  };
}
