import { type SqlClient, type SqlPool, withTransaction } from "../db/connection";
import type { UserRole } from "../types/context";
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
  PostStatus,
  PostTaxonomy,
  TagRecord,
  TagWithPostCount,
  UserRecord
} from "./types";

interface PostRow {
  id: string;
  title: string;
  slug: string;
  content: string;
  summary: string;
  cover_image_url: string | null;
  status: PostStatus;
  published_at: Date | null;
  view_count: number;
  allow_comments: boolean;
  is_featured: boolean;
  author_id: string;
  created_at: Date;
  updated_at: Date;
}

interface CategoryRow {
  id: string;
  name: string;
  slug: string;
  description: string | null;
  created_at: Date;
  updated_at: Date;
}

interface TagRow {
  id: string;
  name: string;
  slug: string;
  created_at: Date;
  updated_at: Date;
}

interface CommentRow {
  id: string;
  content: string;
  is_approved: boolean;
  post_id: string;
  author_id: string;
  parent_comment_id: string | null;
  created_at: Date;
  updated_at: Date;
}

interface UserRow {
  id: string;
  username: string;
  email: string;
  display_name: string;
  role: UserRole;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

interface TaxonomyJoinRow {
  post_id: string;
  id: string;
  name: string;
  slug: string;
}

const POST_COLUMNS = `
  id, title, slug, content, summary, cover_image_url, status, published_at,
  view_count, allow_comments, is_featured, author_id, created_at, updated_at
`;
const CATEGORY_COLUMNS = "id, name, slug, description, created_at, updated_at";
const TAG_COLUMNS = "id, name, slug, created_at, updated_at";
const COMMENT_COLUMNS = "id, content, is_approved, post_id, author_id, parent_comment_id, created_at, updated_at";
const USER_COLUMNS = "id, username, email, display_name, role, is_active, created_at, updated_at";

export function isUniqueViolation(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "23505";
}

async function mapUniqueViolation<T>(message: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new ConflictError(message);
    }
    throw error;
  }
}

/** Pushes one `column = $n` per defined patch field, in column order. */
function buildAssignments<T extends object>(patch: T, columns: Array<[keyof T, string]>, values: unknown[]): string[] {
  const assignments: string[] = [];
  for (const [key, column] of columns) {
    const value = patch[key];
    if (value !== undefined) {
      values.push(value);
      assignments.push(`${column} = $${values.length}`);
    }
  }
  assignments.push("updated_at = now()");
  return assignments;
}

function escapeLikePattern(input: string): string {
  return input.replace(/[\\%_]/g, "\\$&");
}

function toPost(row: PostRow): PostRecord {
  return {
    id: row.id,
    title: row.title,
    slug: row.slug,
    content: row.content,
    summary: row.summary,
    coverImageUrl: row.cover_image_url,
    status: row.status,
    publishedAt: row.published_at ? row.published_at.toISOString() : null,
    viewCount: row.view_count,
    allowComments: row.allow_comments,
    isFeatured: row.is_featured,
    authorId: row.author_id,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

function toCategory(row: CategoryRow): CategoryRecord {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    description: row.description,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

function toTag(row: TagRow): TagRecord {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

function toComment(row: CommentRow): CommentRecord {
  return {
    id: row.id,
    content: row.content,
    isApproved: row.is_approved,
    postId: row.post_id,
    authorId: row.author_id,
    parentCommentId: row.parent_comment_id,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

function toUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    displayName: row.display_name,
    role: row.role,
    isActive: row.is_active,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

const POST_PATCH_COLUMNS: Array<[keyof PostPatch, string]> = [
  ["title", "title"],
  ["slug", "slug"],
  ["content", "content"],
  ["summary", "summary"],
  ["coverImageUrl", "cover_image_url"],
  ["status", "status"],
  ["publishedAt", "published_at"],
  ["viewCount", "view_count"],
  ["allowComments", "allow_comments"],
  ["isFeatured", "is_featured"]
];

export class PostgresPostRepository implements PostRepository {
  constructor(private readonly pool: SqlPool) {}

  async findById(id: string): Promise<PostRecord | null> {
    const result = await this.pool.query<PostRow>(`SELECT ${POST_COLUMNS} FROM posts WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? toPost(row) : null;
  }

  async findBySlug(slug: string): Promise<PostRecord | null> {
    const result = await this.pool.query<PostRow>(`SELECT ${POST_COLUMNS} FROM posts WHERE slug = $1`, [slug]);
    const row = result.rows[0];
    return row ? toPost(row) : null;
  }

  async slugExists(slug: string, excludePostId?: string): Promise<boolean> {
    const result = await this.pool.query<{ exists: boolean }>(
      `
        SELECT EXISTS (
          SELECT 1 FROM posts WHERE slug = $1 AND ($2::uuid IS NULL OR id <> $2::uuid)
        ) AS exists
      `,
      [slug, excludePostId ?? null]
    );
    return result.rows[0]?.exists ?? false;
  }

  async list(query: PostListQuery): Promise<PostRecord[]> {
    const { filter } = query;
    const values: unknown[] = [];
    const conditions: string[] = [];

    if (filter.status) {
      values.push(filter.status);
      conditions.push(`p.status = $${values.length}`);
    }
    if (filter.authorId) {
      values.push(filter.authorId);
      conditions.push(`p.author_id = $${values.length}`);
    }
    if (filter.featured !== undefined) {
      values.push(filter.featured);
      conditions.push(`p.is_featured = $${values.length}`);
    }
    if (filter.categoryId) {
      values.push(filter.categoryId);
      conditions.push(
        `EXISTS (SELECT 1 FROM post_categories pc WHERE pc.post_id = p.id AND pc.category_id = $${values.length})`
      );
    }
    if (filter.tagId) {
      values.push(filter.tagId);
      conditions.push(`EXISTS (SELECT 1 FROM post_tags pt WHERE pt.post_id = p.id AND pt.tag_id = $${values.length})`);
    }
    if (filter.search) {
      values.push(`%${escapeLikePattern(filter.search)}%`);
      const placeholder = `$${values.length}`;
      conditions.push(`(p.title ILIKE ${placeholder} OR p.content ILIKE ${placeholder} OR p.summary ILIKE ${placeholder})`);
    }

    const orderBy =
      query.order === "published_at_desc"
        ? "p.published_at DESC NULLS LAST, p.id DESC"
        : "p.created_at DESC, p.id DESC";

    let pageClause = "";
    if (query.pagination) {
      values.push(query.pagination.limit, query.pagination.offset);
      pageClause = `LIMIT $${values.length - 1} OFFSET $${values.length}`;
    }

    const result = await this.pool.query<PostRow>(
      `
        SELECT ${POST_COLUMNS}
        FROM posts p
        ${conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : ""}
        ORDER BY ${orderBy}
        ${pageClause}
      `,
      values
    );

    return result.rows.map(toPost);
  }

  async insert(input: NewPostRecord): Promise<PostRecord> {
    return mapUniqueViolation("post slug already exists", async () => {
      const result = await this.pool.query<PostRow>(
        `
          INSERT INTO posts (
            title, slug, content, summary, cover_image_url, status, published_at, allow_comments, author_id
          )
          VALUES ($1, $2, $3, $4, $5, $6, $7::timestamptz, $8, $9)
          RETURNING ${POST_COLUMNS}
        `,
        [
          input.title,
          input.slug,
          input.content,
          input.summary,
          input.coverImageUrl,
          input.status,
          input.publishedAt,
          input.allowComments,
          input.authorId
        ]
      );
      return toPost(result.rows[0]);
    });
  }

  async update(id: string, patch: PostPatch): Promise<PostRecord | null> {
    const values: unknown[] = [];
    const assignments = buildAssignments<PostPatch>(patch, POST_PATCH_COLUMNS, values);
    values.push(id);

    return mapUniqueViolation("post slug already exists", async () => {
      const result = await this.pool.query<PostRow>(
        `UPDATE posts SET ${assignments.join(", ")} WHERE id = $${values.length} RETURNING ${POST_COLUMNS}`,
        values
      );
      const row = result.rows[0];
      return row ? toPost(row) : null;
    });
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.pool.query("DELETE FROM posts WHERE id = $1", [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async countByAuthor(authorId: string): Promise<{ total: number; published: number; draft: number }> {
    const result = await this.pool.query<{ total: number; published: number; draft: number }>(
      `
        SELECT
          count(*)::int AS total,
          count(*) FILTER (WHERE status = 'published')::int AS published,
          count(*) FILTER (WHERE status = 'draft')::int AS draft
        FROM posts
        WHERE author_id = $1
      `,
      [authorId]
    );
    return result.rows[0] ?? { total: 0, published: 0, draft: 0 };
  }

  async loadTaxonomy(postIds: string[]): Promise<Map<string, PostTaxonomy>> {
    const taxonomy = new Map<string, PostTaxonomy>(postIds.map((id) => [id, { categories: [], tags: [] }]));
    if (postIds.length === 0) {
      return taxonomy;
    }

    const categories = await this.pool.query<TaxonomyJoinRow>(
      `
        SELECT pc.post_id, c.id, c.name, c.slug
        FROM post_categories pc
        JOIN categories c ON c.id = pc.category_id
        WHERE pc.post_id = ANY($1::uuid[])
        ORDER BY c.name ASC
      `,
      [postIds]
    );
    const tags = await this.pool.query<TaxonomyJoinRow>(
      `
        SELECT pt.post_id, t.id, t.name, t.slug
        FROM post_tags pt
        JOIN tags t ON t.id = pt.tag_id
        WHERE pt.post_id = ANY($1::uuid[])
        ORDER BY t.name ASC
      `,
      [postIds]
    );

    for (const row of categories.rows) {
      taxonomy.get(row.post_id)?.categories.push({ id: row.id, name: row.name, slug: row.slug });
    }
    for (const row of tags.rows) {
      taxonomy.get(row.post_id)?.tags.push({ id: row.id, name: row.name, slug: row.slug });
    }

    return taxonomy;
  }

  async replaceCategories(postId: string, categoryIds: string[]): Promise<void> {
    await this.replaceAssociations("post_categories", "category_id", postId, categoryIds);
  }

  async replaceTags(postId: string, tagIds: string[]): Promise<void> {
    await this.replaceAssociations("post_tags", "tag_id", postId, tagIds);
  }

  private async replaceAssociations(
    table: "post_categories" | "post_tags",
    column: "category_id" | "tag_id",
    postId: string,
    targetIds: string[]
  ): Promise<void> {
    await withTransaction(this.pool, async (client: SqlClient) => {
      await client.query(`DELETE FROM ${table} WHERE post_id = $1`, [postId]);
      if (targetIds.length > 0) {
        await client.query(
          `
            INSERT INTO ${table} (post_id, ${column})
            SELECT $1, target_id FROM unnest($2::uuid[]) AS target_id
            ON CONFLICT DO NOTHING
          `,
          [postId, [...new Set(targetIds)]]
        );
      }
    });
  }
}

export class PostgresCategoryRepository implements CategoryRepository {
  constructor(private readonly pool: SqlPool) {}

  async findById(id: string): Promise<CategoryRecord | null> {
    const result = await this.pool.query<CategoryRow>(`SELECT ${CATEGORY_COLUMNS} FROM categories WHERE id = $1`, [
      id
    ]);
    const row = result.rows[0];
    return row ? toCategory(row) : null;
  }

  async findByIds(ids: string[]): Promise<CategoryRecord[]> {
    if (ids.length === 0) {
      return [];
    }
    const result = await this.pool.query<CategoryRow>(
      `SELECT ${CATEGORY_COLUMNS} FROM categories WHERE id = ANY($1::uuid[])`,
      [ids]
    );
    return result.rows.map(toCategory);
  }

  async findBySlug(slug: string): Promise<CategoryRecord | null> {
    const result = await this.pool.query<CategoryRow>(`SELECT ${CATEGORY_COLUMNS} FROM categories WHERE slug = $1`, [
      slug
    ]);
    const row = result.rows[0];
    return row ? toCategory(row) : null;
  }

  async isSlugUnique(slug: string): Promise<boolean> {
    return (await this.findBySlug(slug)) === null;
  }

  async list(): Promise<CategoryRecord[]> {
    const result = await this.pool.query<CategoryRow>(`SELECT ${CATEGORY_COLUMNS} FROM categories ORDER BY name ASC`);
    return result.rows.map(toCategory);
  }

  async listWithPostCount(): Promise<CategoryWithPostCount[]> {
    const result = await this.pool.query<CategoryRow & { post_count: number }>(
      `
        SELECT c.id, c.name, c.slug, c.description, c.created_at, c.updated_at, count(pc.post_id)::int AS post_count
        FROM categories c
        LEFT JOIN post_categories pc ON pc.category_id = c.id
        GROUP BY c.id
        ORDER BY c.name ASC
      `
    );
    return result.rows.map((row) => ({ ...toCategory(row), postCount: row.post_count }));
  }

  async insert(input: NewCategoryRecord): Promise<CategoryRecord> {
    return mapUniqueViolation("category slug already exists", async () => {
      const result = await this.pool.query<CategoryRow>(
        `INSERT INTO categories (name, slug, description) VALUES ($1, $2, $3) RETURNING ${CATEGORY_COLUMNS}`,
        [input.name, input.slug, input.description]
      );
      return toCategory(result.rows[0]);
    });
  }

  async update(id: string, patch: CategoryPatch): Promise<CategoryRecord | null> {
    const values: unknown[] = [];
    const assignments = buildAssignments<CategoryPatch>(
      patch,
      [
        ["name", "name"],
        ["slug", "slug"],
        ["description", "description"]
      ],
      values
    );
    values.push(id);

    return mapUniqueViolation("category slug already exists", async () => {
      const result = await this.pool.query<CategoryRow>(
        `UPDATE categories SET ${assignments.join(", ")} WHERE id = $${values.length} RETURNING ${CATEGORY_COLUMNS}`,
        values
      );
      const row = result.rows[0];
      return row ? toCategory(row) : null;
    });
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.pool.query("DELETE FROM categories WHERE id = $1", [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

export class PostgresTagRepository implements TagRepository {
  constructor(private readonly pool: SqlPool) {}

  async findById(id: string): Promise<TagRecord | null> {
    const result = await this.pool.query<TagRow>(`SELECT ${TAG_COLUMNS} FROM tags WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? toTag(row) : null;
  }

  async findBySlug(slug: string): Promise<TagRecord | null> {
    const result = await this.pool.query<TagRow>(`SELECT ${TAG_COLUMNS} FROM tags WHERE slug = $1`, [slug]);
    const row = result.rows[0];
    return row ? toTag(row) : null;
  }

  async isSlugUnique(slug: string): Promise<boolean> {
    return (await this.findBySlug(slug)) === null;
  }

  async list(): Promise<TagRecord[]> {
    const result = await this.pool.query<TagRow>(`SELECT ${TAG_COLUMNS} FROM tags ORDER BY name ASC`);
    return result.rows.map(toTag);
  }

  async listWithPostCount(): Promise<TagWithPostCount[]> {
    const result = await this.pool.query<TagRow & { post_count: number }>(
      `
        SELECT t.id, t.name, t.slug, t.created_at, t.updated_at, count(pt.post_id)::int AS post_count
        FROM tags t
        LEFT JOIN post_tags pt ON pt.tag_id = t.id
        GROUP BY t.id
        ORDER BY t.name ASC
      `
    );
    return result.rows.map((row) => ({ ...toTag(row), postCount: row.post_count }));
  }

  async insert(input: NewTagRecord): Promise<TagRecord> {
    return mapUniqueViolation("tag slug already exists", async () => {
      const result = await this.pool.query<TagRow>(
        `INSERT INTO tags (name, slug) VALUES ($1, $2) RETURNING ${TAG_COLUMNS}`,
        [input.name, input.slug]
      );
      return toTag(result.rows[0]);
    });
  }

  async update(id: string, patch: TagPatch): Promise<TagRecord | null> {
    const values: unknown[] = [];
    const assignments = buildAssignments<TagPatch>(
      patch,
      [
        ["name", "name"],
        ["slug", "slug"]
      ],
      values
    );
    values.push(id);

    return mapUniqueViolation("tag slug already exists", async () => {
      const result = await this.pool.query<TagRow>(
        `UPDATE tags SET ${assignments.join(", ")} WHERE id = $${values.length} RETURNING ${TAG_COLUMNS}`,
        values
      );
      const row = result.rows[0];
      return row ? toTag(row) : null;
    });
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.pool.query("DELETE FROM tags WHERE id = $1", [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

export class PostgresCommentRepository implements CommentRepository {
  constructor(private readonly pool: SqlPool) {}

  async findById(id: string): Promise<CommentRecord | null> {
    const result = await this.pool.query<CommentRow>(`SELECT ${COMMENT_COLUMNS} FROM comments WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? toComment(row) : null;
  }

  async listByPost(input: ListCommentsByPostInput): Promise<CommentRecord[]> {
    const result = await this.pool.query<CommentRow>(
      `
        SELECT ${COMMENT_COLUMNS}
        FROM comments
        WHERE post_id = $1 AND ($2::boolean OR is_approved)
        ORDER BY created_at DESC, id DESC
      `,
      [input.postId, input.includePending]
    );
    return result.rows.map(toComment);
  }

  async listByAuthor(authorId: string): Promise<CommentRecord[]> {
    const result = await this.pool.query<CommentRow>(
      `SELECT ${COMMENT_COLUMNS} FROM comments WHERE author_id = $1 ORDER BY created_at DESC, id DESC`,
      [authorId]
    );
    return result.rows.map(toComment);
  }

  async listPending(): Promise<CommentRecord[]> {
    const result = await this.pool.query<CommentRow>(
      `SELECT ${COMMENT_COLUMNS} FROM comments WHERE is_approved = false ORDER BY created_at DESC, id DESC`
    );
    return result.rows.map(toComment);
  }

  async insert(input: NewCommentRecord): Promise<CommentRecord> {
    const result = await this.pool.query<CommentRow>(
      `
        INSERT INTO comments (content, is_approved, post_id, author_id, parent_comment_id)
        VALUES ($1, $2, $3, $4, $5)
        RETURNING ${COMMENT_COLUMNS}
      `,
      [input.content, input.isApproved, input.postId, input.authorId, input.parentCommentId]
    );
    return toComment(result.rows[0]);
  }

  async update(id: string, patch: CommentPatch): Promise<CommentRecord | null> {
    const values: unknown[] = [];
    const assignments = buildAssignments<CommentPatch>(
      patch,
      [
        ["content", "content"],
        ["isApproved", "is_approved"]
      ],
      values
    );
    values.push(id);

    const result = await this.pool.query<CommentRow>(
      `UPDATE comments SET ${assignments.join(", ")} WHERE id = $${values.length} RETURNING ${COMMENT_COLUMNS}`,
      values
    );
    const row = result.rows[0];
    return row ? toComment(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.pool.query("DELETE FROM comments WHERE id = $1", [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

export class PostgresUserRepository implements UserRepository {
  constructor(private readonly pool: SqlPool) {}

  async findById(id: string): Promise<UserRecord | null> {
    const result = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async findByIds(ids: string[]): Promise<UserRecord[]> {
    if (ids.length === 0) {
      return [];
    }
    const result = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = ANY($1::uuid[])`, [
      ids
    ]);
    return result.rows.map(toUser);
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const result = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE username = $1`, [
      username
    ]);
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async list(): Promise<UserRecord[]> {
    const result = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users ORDER BY username ASC`);
    return result.rows.map(toUser);
  }

  async insert(input: NewUserRecord): Promise<UserRecord> {
    return mapUniqueViolation("username or email already exists", async () => {
      const result = await this.pool.query<UserRow>(
        `
          INSERT INTO users (username, email, display_name, role)
          VALUES ($1, $2, $3, $4)
          RETURNING ${USER_COLUMNS}
        `,
        [input.username, input.email, input.displayName, input.role]
      );
      return toUser(result.rows[0]);
    });
  }

  async update(id: string, patch: UserPatch): Promise<UserRecord | null> {
    const values: unknown[] = [];
    const assignments = buildAssignments<UserPatch>(
      patch,
      [
        ["username", "username"],
        ["email", "email"],
        ["displayName", "display_name"],
        ["role", "role"],
        ["isActive", "is_active"]
      ],
      values
    );
    values.push(id);

    return mapUniqueViolation("username or email already exists", async () => {
      const result = await this.pool.query<UserRow>(
        `UPDATE users SET ${assignments.join(", ")} WHERE id = $${values.length} RETURNING ${USER_COLUMNS}`,
        values
      );
      const row = result.rows[0];
      return row ? toUser(row) : null;
    });
  }
}

export function createPostgresRepositories(pool: SqlPool): BlogRepositories {
  return {
    posts: new PostgresPostRepository(pool),
    categories: new PostgresCategoryRepository(pool),
    tags: new PostgresTagRepository(pool),
    comments: new PostgresCommentRepository(pool),
    users: new PostgresUserRepository(pool)
  };
}
