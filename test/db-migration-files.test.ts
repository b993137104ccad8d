import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { DEFAULT_MIGRATIONS_DIRECTORY, loadMigrations, migrateDown, migrateUp } from "../src/db/migrations";
import { StubPool } from "./support/stub-pool";

const schemaSql = readFileSync(path.resolve(process.cwd(), "db/migrations/0001_blog_schema.up.sql"), "utf8");
const viewMarkersSql = readFileSync(path.resolve(process.cwd(), "db/migrations/0002_post_view_markers.up.sql"), "utf8");

describe("DB migration 0001_blog_schema", () => {
  it("creates required tables", () => {
    for (const table of ["users", "posts", "categories", "tags", "post_categories", "post_tags", "comments"]) {
      expect(schemaSql).toContain(`CREATE TABLE IF NOT EXISTS ${table} (`);
    }
  });

  it("enforces slug uniqueness and shape", () => {
    expect(schemaSql).toContain("CONSTRAINT posts_slug_key UNIQUE (slug)");
    expect(schemaSql).toContain("CONSTRAINT categories_slug_key UNIQUE (slug)");
    expect(schemaSql).toContain("CONSTRAINT tags_slug_key UNIQUE (slug)");
    expect(schemaSql).toContain("CONSTRAINT posts_slug_format CHECK (slug ~ '^[a-z0-9-]*$')");
  });

  it("cascades associations and replies with their owner", () => {
    expect(schemaSql).toContain("PRIMARY KEY (post_id, category_id)");
    expect(schemaSql).toContain("PRIMARY KEY (post_id, tag_id)");
    expect(schemaSql).toContain("parent_comment_id uuid REFERENCES comments (id) ON DELETE CASCADE");
  });

  it("adds read-path indexes", () => {
    expect(schemaSql).toContain("idx_posts_status_published_at_desc");
    expect(schemaSql).toContain("idx_comments_post_created_at_desc");
    expect(schemaSql).toContain("idx_comments_pending");
  });
});

describe("DB migration 0002_post_view_markers", () => {
  it("keys markers by session and post and drops them with the post", () => {
    expect(viewMarkersSql).toContain("PRIMARY KEY (session_id, post_id)");
    expect(viewMarkersSql).toContain("post_id uuid NOT NULL REFERENCES posts (id) ON DELETE CASCADE");
  });
});

describe("loadMigrations", () => {
  it("pairs every up migration with its down migration in order", async () => {
    const migrations = await loadMigrations(DEFAULT_MIGRATIONS_DIRECTORY);

    expect(migrations.map((migration) => migration.name)).toEqual(["0001_blog_schema", "0002_post_view_markers"]);
    expect(migrations.map((migration) => migration.version)).toEqual([1, 2]);
    expect(path.basename(migrations[1]?.downPath ?? "")).toBe("0002_post_view_markers.down.sql");
  });
});

describe("migration runner", () => {
  let directory = "";

  function writeMigrations(files: Record<string, string>): string {
    directory = mkdtempSync(path.join(os.tmpdir(), "blog-migrations-"));
    for (const [fileName, sql] of Object.entries(files)) {
      writeFileSync(path.join(directory, fileName), sql);
    }
    return directory;
  }

  function appliedRows(names: string[]) {
    return (text: string) => (text.includes("SELECT name FROM schema_migrations") ? names.map((name) => ({ name })) : []);
  }

  const twoMigrations = {
    "0001_init.up.sql": "CREATE TABLE a ();\n",
    "0001_init.down.sql": "DROP TABLE a;\n",
    "0002_more.up.sql": "CREATE TABLE b ();\n",
    "0002_more.down.sql": "DROP TABLE b;\n"
  };

  afterEach(() => {
    if (directory) {
      rmSync(directory, { recursive: true, force: true });
      directory = "";
    }
  });

  it("applies only pending migrations, each in its own transaction", async () => {
    const pool = new StubPool(appliedRows(["0001_init"]));

    const applied = await migrateUp(pool, writeMigrations(twoMigrations));

    expect(applied).toEqual(["0002_more"]);
    expect(pool.statements().slice(2)).toEqual([
      "BEGIN",
      "CREATE TABLE b ();",
      "INSERT INTO schema_migrations (name) VALUES ($1)",
      "COMMIT"
    ]);
    expect(pool.queries[4]?.values).toEqual(["0002_more"]);
    expect(pool.released).toBe(1);
  });

  it("rolls back the most recent migration first", async () => {
    const pool = new StubPool(appliedRows(["0002_more", "0001_init"]));

    const rolledBack = await migrateDown(pool, 1, writeMigrations(twoMigrations));

    expect(rolledBack).toEqual(["0002_more"]);
    expect(pool.statements().slice(2)).toEqual([
      "BEGIN",
      "DROP TABLE b;",
      "DELETE FROM schema_migrations WHERE name = $1",
      "COMMIT"
    ]);
  });

  it("rejects an up migration without its down file", async () => {
    const migrationsDirectory = writeMigrations({ "0003_orphan.up.sql": "SELECT 1;" });

    await expect(loadMigrations(migrationsDirectory)).rejects.toThrow("Missing down migration for 0003_orphan");
  });

  it("rejects a non-positive step count", async () => {
    await expect(migrateDown(new StubPool(), 0, DEFAULT_MIGRATIONS_DIRECTORY)).rejects.toThrow(
      "steps must be a positive integer"
    );
  });
});
