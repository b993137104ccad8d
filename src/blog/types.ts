import type { UserRole } from "../types/context";

export type PostStatus = "draft" | "published";

export interface PaginationInput {
  limit: number;
  offset: number;
}

export interface PostRecord {
  id: string;
  title: string;
  slug: string;
  content: string;
  summary: string;
  coverImageUrl: string | null;
  status: PostStatus;
  publishedAt: string | null;
  viewCount: number;
  allowComments: boolean;
  isFeatured: boolean;
  authorId: string;
  createdAt: string;
  updatedAt: string;
}

export interface CategoryRecord {
  id: string;
  name: string;
  slug: string;
  description: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface TagRecord {
  id: string;
  name: string;
  slug: string;
  createdAt: string;
  updatedAt: string;
}

export interface CommentRecord {
  id: string;
  content: string;
  isApproved: boolean;
  postId: string;
  authorId: string;
  parentCommentId: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface UserRecord {
  id: string;
  username: string;
  email: string;
  displayName: string;
  role: UserRole;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface TaxonomyRef {
  id: string;
  name: string;
  slug: string;
}

export interface PostTaxonomy {
  categories: TaxonomyRef[];
  tags: TaxonomyRef[];
}

export interface AuthorSummary {
  id: string;
  username: string;
  displayName: string;
}

export interface PostAggregate extends PostRecord, PostTaxonomy {
  author: AuthorSummary | null;
}

export type CategoryWithPostCount = CategoryRecord & { postCount: number };
export type TagWithPostCount = TagRecord & { postCount: number };
