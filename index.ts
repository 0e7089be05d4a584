import { createApp } from "./app";
import pool, { closePool } from "./config/db";
import { config } from "./config/env";
import { initializeDB } from "./config/initDB";
import { serverLogger } from "./config/logger";

await initializeDB(pool);

const app = createApp();

const server = app.listen(config.port, () => {
  serverLogger.info({ port: config.port }, "Server is running");
});

function shutdown(signal: NodeJS.Signals): void {
  serverLogger.info({ signal }, "Shutting down");
  server.close(() => {
    closePool().then(
      () => process.exit(0),
      (err: unknown) => {
        serverLogger.error({ err }, "Error while closing the database pool");
        process.exit(1);
      }
    );
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
