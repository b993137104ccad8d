import { ConflictError } from "../../src/blog/errors";
import { createPostgresRepositories } from "../../src/blog/postgres-repository";
import { createBlogServices } from "../../src/blog/services";
import { generateSlug } from "../../src/blog/slug";
import { PostgresViewMarkerStore } from "../../src/blog/view-tracker";
import { loadConfig } from "../../src/config";
import { createDatabasePool } from "../../src/db/connection";
import { migrateUp } from "../../src/db/migrations";
import { appLogger } from "../../src/security/logger";
import type { UserRole } from "../../src/types/context";
import { formatError } from "./format-error";

const DEV_SEED_AUTHOR_ID = "00000000-0000-4000-8000-000000000002";

const DEV_SEED_CATEGORIES = [
  { name: "Technology & Innovation", description: "Tools, languages and the people building them." },
  { name: "Getting Started", description: "First steps for new readers." }
] as const;

interface SeedPost {
  title: string;
  content: string;
  summary: string;
  isDraft: boolean;
  categories: string[];
  tags: string[];
}

const DEV_SEED_POSTS: SeedPost[] = [
  {
    title: "Getting Started!!",
    content: "## Welcome\n\nThis blog covers *practical* engineering notes.\n\n- Short posts\n- Working examples",
    summary: "What to expect here.",
    isDraft: false,
    categories: ["getting-started"],
    tags: ["Intro", "meta"]
  },
  {
    title: "Release Notes",
    content: "## Changes\n\n- Faster search across titles and summaries.\n- Tag pages list posts newest first.",
    summary: "What shipped this month.",
    isDraft: false,
    categories: ["technology-innovation"],
    tags: ["release", "search"]
  },
  {
    title: "Draft: Comment Threads",
    content: "Notes on nested replies and moderation. Not ready yet.",
    summary: "",
    isDraft: true,
    categories: ["technology-innovation"],
    tags: []
  }
];

async function main() {
  if (process.env.NODE_ENV === "production") {
    throw new Error("seed-dev must not run in production");
  }

  const config = loadConfig();
  const pool = createDatabasePool();

  try {
    await migrateUp(pool);

    const devUsers: Array<{ id: string; username: string; displayName: string; role: UserRole }> = [
      { id: config.devAuthBypassUserId, username: "dev-admin", displayName: "Dev Admin", role: "ADMIN" },
      { id: DEV_SEED_AUTHOR_ID, username: "dev-author", displayName: "Dev Author", role: "AUTHOR" }
    ];
    for (const user of devUsers) {
      await pool.query(
        `
          INSERT INTO users (id, username, email, display_name, role)
          VALUES ($1, $2, $3, $4, $5)
          ON CONFLICT (id) DO NOTHING
        `,
        [user.id, user.username, `${user.username}@example.com`, user.displayName, user.role]
      );
    }

    const repositories = createPostgresRepositories(pool);
    const services = createBlogServices(config, repositories, new PostgresViewMarkerStore(pool));

    const categoryIdsBySlug = new Map<string, string>();
    for (const category of DEV_SEED_CATEGORIES) {
      try {
        const created = await services.categories.create(category);
        categoryIdsBySlug.set(created.slug, created.id);
      } catch (error) {
        if (!(error instanceof ConflictError)) {
          throw error;
        }
        const existing = await services.categories.getBySlug(generateSlug(category.name));
        categoryIdsBySlug.set(existing.slug, existing.id);
      }
    }

    let created = 0;
    for (const post of DEV_SEED_POSTS) {
      if (await repositories.posts.findBySlug(generateSlug(post.title))) {
        continue;
      }

      await services.posts.create(DEV_SEED_AUTHOR_ID, {
        title: post.title,
        content: post.content,
        summary: post.summary,
        isDraft: post.isDraft,
        categoryIds: post.categories.flatMap((slug) => categoryIdsBySlug.get(slug) ?? []),
        tags: post.tags
      });
      created += 1;
    }

    appLogger.info("dev_seed_completed", {
      users: devUsers.length,
      categories: categoryIdsBySlug.size,
      postsCreated: created
    });
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  appLogger.error("dev_seed_failed", { detail: formatError(error) });
  process.exitCode = 1;
});
