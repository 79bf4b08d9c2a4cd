import express, { type Express } from "express";
import type { Server } from "http";
import cors from "cors";
import type { TodoDb } from "../../data/src/db";
import type { Logger } from "./logger";
import { errorHandler, notFoundHandler } from "./middleware/error-handler";
import { requestLogger } from "./middleware/request-logger";
import { pageRoutes } from "./routes/pages";
import { taskRoutes } from "./routes/tasks";

export interface AppContext {
  db: TodoDb;
  log: Logger;
  /** Clock for timestamps and due-date filters. */
  now: () => Date;
}

export function createApp(context: AppContext): Express {
  const app = express();

  app.use(requestLogger(context.log));
  app.use(express.urlencoded({ extended: false }));

  app.use("/api/tasks", cors(), taskRoutes(context));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/", pageRoutes(context));

  app.use(notFoundHandler);
  app.use(errorHandler(context.log));

  return app;
}

/**
 * Starts listening and resolves once the port is bound. A bind failure such
 * as EADDRINUSE rejects instead of surfacing as an unhandled 'error' event.
 */
export function listen(app: Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = host === undefined ? app.listen(port) : app.listen(port, host);
    const onError = (err: Error) => {
      server.off("listening", onListening);
      reject(err);
    };
    const onListening = () => {
      server.off("error", onError);
      resolve(server);
    };
    server.once("error", onError);
    server.once("listening", onListening);
  });
}
