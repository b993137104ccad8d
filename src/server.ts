import { createApp } from "./app";
import { createPostgresRepositories } from "./blog/postgres-repository";
import { PostgresViewMarkerStore } from "./blog/view-tracker";
import { loadConfig } from "./config";
import { createDatabasePool } from "./db/connection";
import { appLogger } from "./security/logger";

const config = loadConfig();
const databasePool = createDatabasePool();
const app = createApp(config, {
  repositories: createPostgresRepositories(databasePool),
  viewMarkerStore: new PostgresViewMarkerStore(databasePool),
  healthCheck: async () => {
    await databasePool.query("SELECT 1");
  }
});

app.listen(config.port, () => {
  appLogger.info("server_started", { port: config.port });
});

async function shutdown(): Promise<void> {
  await databasePool.end();
}

process.on("SIGINT", () => {
  shutdown().finally(() => process.exit(0));
});

process.on("SIGTERM", () => {
  shutdown().finally(() => process.exit(0));
});
