import { createDatabasePool } from "../../src/db/connection";
import { migrateUp } from "../../src/db/migrations";
import { appLogger } from "../../src/security/logger";
import { formatError } from "./format-error";

async function main() {
  const pool = createDatabasePool();
  try {
    const applied = await migrateUp(pool);
    appLogger.info("db_migrations_applied", { applied, count: applied.length });
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  appLogger.error("db_migrations_failed", { detail: formatError(error) });
  process.exitCode = 1;
});
