import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { type SqlPool, withTransaction } from "./connection";

export interface Migration {
  version: number;
  name: string;
  upPath: string;
  downPath: string;
}

type Direction = "up" | "down";

export const DEFAULT_MIGRATIONS_DIRECTORY = path.resolve(process.cwd(), "db/migrations");

const MIGRATION_FILE_PATTERN = /^(\d{4})_[a-z0-9_]+\.up\.sql$/;

/** Files are `NNNN_name.up.sql` with a sibling `.down.sql`; versions must be unique. */
export async function loadMigrations(directory = DEFAULT_MIGRATIONS_DIRECTORY): Promise<Migration[]> {
  const files = new Set(await readdir(directory));
  const migrations: Migration[] = [];

  for (const fileName of files) {
    const match = MIGRATION_FILE_PATTERN.exec(fileName);
    if (!match) {
      continue;
    }

    const name = fileName.replace(/\.up\.sql$/, "");
    if (!files.has(`${name}.down.sql`)) {
      throw new Error(`Missing down migration for ${name}`);
    }

    migrations.push({
      version: Number(match[1]),
      name,
      upPath: path.join(directory, fileName),
      downPath: path.join(directory, `${name}.down.sql`)
    });
  }

  migrations.sort((left, right) => left.version - right.version);
  migrations.forEach((migration, index) => {
    if (index > 0 && migrations[index - 1]?.version === migration.version) {
      throw new Error(`Duplicate migration version ${migration.version}`);
    }
  });

  return migrations;
}

async function appliedMigrationNames(pool: SqlPool): Promise<string[]> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name text PRIMARY KEY,
      applied_at timestamptz NOT NULL DEFAULT now()
    )
  `);

  const result = await pool.query<{ name: string }>(
    "SELECT name FROM schema_migrations ORDER BY applied_at DESC, name DESC"
  );
  return result.rows.map((row) => row.name);
}

// The script and its bookkeeping row commit together or not at all.
async function runStep(pool: SqlPool, migration: Migration, direction: Direction): Promise<void> {
  const sql = await readFile(direction === "up" ? migration.upPath : migration.downPath, "utf8");

  await withTransaction(pool, async (client) => {
    await client.query(sql);
    if (direction === "up") {
      await client.query("INSERT INTO schema_migrations (name) VALUES ($1)", [migration.name]);
    } else {
      await client.query("DELETE FROM schema_migrations WHERE name = $1", [migration.name]);
    }
  });
}

export async function migrateUp(pool: SqlPool, directory = DEFAULT_MIGRATIONS_DIRECTORY): Promise<string[]> {
  const applied = new Set(await appliedMigrationNames(pool));
  const pending = (await loadMigrations(directory)).filter((migration) => !applied.has(migration.name));

  for (const migration of pending) {
    await runStep(pool, migration, "up");
  }

  return pending.map((migration) => migration.name);
}

/** Rolls back the `steps` most recently applied migrations, newest first. */
export async function migrateDown(pool: SqlPool, steps = 1, directory = DEFAULT_MIGRATIONS_DIRECTORY): Promise<string[]> {
  if (!Number.isInteger(steps) || steps < 1) {
    throw new Error("steps must be a positive integer");
  }

  const known = new Map((await loadMigrations(directory)).map((migration) => [migration.name, migration]));
  const targets = (await appliedMigrationNames(pool)).slice(0, steps).map((name) => {
    const migration = known.get(name);
    if (!migration) {
      throw new Error(`Applied migration ${name} has no files in ${directory}`);
    }
    return migration;
  });

  for (const migration of targets) {
    await runStep(pool, migration, "down");
  }

  return targets.map((migration) => migration.name);
}
