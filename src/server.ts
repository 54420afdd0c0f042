import "dotenv/config";
import { buildApp } from "./app";
import { config } from "./config";
import { getPool } from "./infra/postgres/pool";

async function start() {
  const app = buildApp();

  if (config.REPO_PROVIDER === "postgres") {
    try {
      await getPool().query("SELECT 1");
      app.log.info("Database connection successful");
    } catch (error) {
      app.log.error({ err: error }, "Database connection failed");
      await app.close();
      process.exit(1);
    }
  } else {
    app.log.warn("Running with in-memory ledger storage (non-durable)");
  }

  const shutdown = (signal: NodeJS.Signals) => {
    app.log.info({ signal }, "Shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error({ err: error }, "Shutdown failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await app.listen({ port: config.PORT, host: config.HOST });
}

start().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
