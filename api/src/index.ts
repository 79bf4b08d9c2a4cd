import type { Server } from "http";
import { bootstrapSchema, openDatabase } from "../../data/src/db";
import { createApp, listen } from "./app";
import { loadConfig } from "./config";
import { logger } from "./logger";

async function main() {
  const config = loadConfig();
  logger.configure({ level: config.logLevel, timestamps: true });

  const db = openDatabase(config.dbPath);
  let server: Server;
  try {
    const schema = bootstrapSchema(db);
    if (schema.renamedFrom) logger.info(`Renamed table ${schema.renamedFrom} to tasks`);
    if (schema.createdTable) logger.info(`Created tasks table in ${config.dbPath}`);
    for (const column of schema.addedColumns) {
      logger.info(`Added column tasks.${column}`);
    }

    const app = createApp({ db, log: logger, now: () => new Date() });
    server = await listen(app, config.port);
  } catch (err) {
    db.close();
    throw err;
  }
  logger.info(`Task list running on http://localhost:${config.port}`);

  let closing = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    logger.info(`${signal} received, shutting down`);
    server.close((err) => {
      if (err) logger.error("HTTP server did not close cleanly", err);
      db.close();
      process.exit(err ? 1 : 0);
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  logger.error("Startup failed", err);
  process.exit(1);
});
