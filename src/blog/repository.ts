import type { UserRole } from "../types/context";
import type {
  CategoryRecord,
  CategoryWithPostCount,
  CommentRecord,
  PaginationInput,
  PostRecord,
  PostStatus,
  PostTaxonomy,
  TagRecord,
  TagWithPostCount,
  UserRecord
} from "./types";

export type PostOrder = "published_at_desc" | "created_at_desc";

export interface PostListFilter {
  status?: PostStatus;
  authorId?: string;
  featured?: boolean;
  categoryId?: string;
  tagId?: string;
  search?: string;
}

export interface PostListQuery {
  filter: PostListFilter;
  order: PostOrder;
  pagination?: PaginationInput;
}

export interface NewPostRecord {
  title: string;
  slug: string;
  content: string;
  summary: string;
  coverImageUrl: string | null;
  status: PostStatus;
  publishedAt: string | null;
  allowComments: boolean;
  authorId: string;
}

export type PostPatch = Partial<
  Pick<
    PostRecord,
    | "title"
    | "slug"
    | "content"
    | "summary"
    | "coverImageUrl"
    | "status"
    | "publishedAt"
    | "viewCount"
    | "allowComments"
    | "isFeatured"
  >
>;

/**
 * Post storage. `update` always stamps `updatedAt`. Slug uniqueness is enforced by
 * `insert`/`update` themselves (ConflictError); `slugExists` is only a pre-check.
 */
export interface PostRepository {
  findById(id: string): Promise<PostRecord | null>;
  findBySlug(slug: string): Promise<PostRecord | null>;
  slugExists(slug: string, excludePostId?: string): Promise<boolean>;
  list(query: PostListQuery): Promise<PostRecord[]>;
  insert(input: NewPostRecord): Promise<PostRecord>;
  update(id: string, patch: PostPatch): Promise<PostRecord | null>;
  delete(id: string): Promise<boolean>;
  countByAuthor(authorId: string): Promise<{ total: number; published: number; draft: number }>;
  loadTaxonomy(postIds: string[]): Promise<Map<string, PostTaxonomy>>;
  replaceCategories(postId: string, categoryIds: string[]): Promise<void>;
  replaceTags(postId: string, tagIds: string[]): Promise<void>;
}

export interface NewCategoryRecord {
  name: string;
  slug: string;
  description: string | null;
}

export type CategoryPatch = Partial<NewCategoryRecord>;

export interface CategoryRepository {
  findById(id: string): Promise<CategoryRecord | null>;
  findByIds(ids: string[]): Promise<CategoryRecord[]>;
  findBySlug(slug: string): Promise<CategoryRecord | null>;
  isSlugUnique(slug: string): Promise<boolean>;
  list(): Promise<CategoryRecord[]>;
  listWithPostCount(): Promise<CategoryWithPostCount[]>;
  insert(input: NewCategoryRecord): Promise<CategoryRecord>;
  update(id: string, patch: CategoryPatch): Promise<CategoryRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface NewTagRecord {
  name: string;
  slug: string;
}

export type TagPatch = Partial<NewTagRecord>;

export interface TagRepository {
  findById(id: string): Promise<TagRecord | null>;
  findBySlug(slug: string): Promise<TagRecord | null>;
  isSlugUnique(slug: string): Promise<boolean>;
  list(): Promise<TagRecord[]>;
  listWithPostCount(): Promise<TagWithPostCount[]>;
  insert(input: NewTagRecord): Promise<TagRecord>;
  update(id: string, patch: TagPatch): Promise<TagRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface NewCommentRecord {
  content: string;
  isApproved: boolean;
  postId: string;
  authorId: string;
  parentCommentId: string | null;
}

export type CommentPatch = Partial<Pick<CommentRecord, "content" | "isApproved">>;

export interface ListCommentsByPostInput {
  postId: string;
  includePending: boolean;
}

export interface CommentRepository {
  findById(id: string): Promise<CommentRecord | null>;
  listByPost(input: ListCommentsByPostInput): Promise<CommentRecord[]>;
  listByAuthor(authorId: string): Promise<CommentRecord[]>;
  listPending(): Promise<CommentRecord[]>;
  insert(input: NewCommentRecord): Promise<CommentRecord>;
  update(id: string, patch: CommentPatch): Promise<CommentRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface NewUserRecord {
  username: string;
  email: string;
  displayName: string;
  role: UserRole;
}

export type UserPatch = Partial<Pick<UserRecord, "username" | "email" | "displayName" | "role" | "isActive">>;

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  findByIds(ids: string[]): Promise<UserRecord[]>;
  findByUsername(username: string): Promise<UserRecord | null>;
  list(): Promise<UserRecord[]>;
  insert(input: NewUserRecord): Promise<UserRecord>;
  update(id: string, patch: UserPatch): Promise<UserRecord | null>;
}

export interface BlogRepositories {
  posts: PostRepository;
  categories: CategoryRepository;
  tags: TagRepository;
  comments: CommentRepository;
  users: UserRepository;
}
