import { describe, it, expect } from "vitest";
import path from "path";
import { DEFAULT_PORT, loadConfig } from "./config";

describe("loadConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadConfig({}, "/srv/tasks")).toEqual({
      port: DEFAULT_PORT,
      dbPath: path.join("/srv/tasks", "data", "todo.db"),
      logLevel: "info",
    });
  });

  it("reads PORT, DB_PATH and LOG_LEVEL", () => {
    expect(loadConfig({ PORT: "8080", DB_PATH: ":memory:", LOG_LEVEL: "debug" }, "/srv/tasks")).toEqual({
      port: 8080,
      dbPath: ":memory:",
      logLevel: "debug",
    });
  });

  it("ignores invalid values", () => {
    const config = loadConfig({ PORT: "eighty", LOG_LEVEL: "loud" }, "/srv/tasks");
    expect(config.port).toBe(DEFAULT_PORT);
    expect(config.logLevel).toBe("info");
    expect(loadConfig({ PORT: "70000" }, "/srv/tasks").port).toBe(DEFAULT_PORT);
  });
});
