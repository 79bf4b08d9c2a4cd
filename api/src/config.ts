import path from "path";
import { LOG_LEVELS, type LogLevel } from "./logger";

export interface AppConfig {
  port: number;
  dbPath: string;
  logLevel: LogLevel;
}

export const DEFAULT_PORT = 3001;

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const port = Number(env.PORT);
  return {
    port: Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_PORT,
    dbPath: env.DB_PATH || path.join(cwd, "data", "todo.db"),
    logLevel: LOG_LEVELS.find((level) => level === env.LOG_LEVEL) ?? "info",
  };
}
