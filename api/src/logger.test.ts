import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Logger } from "./logger";

function spyConsole() {
  return {
    logSpy: vi.spyOn(console, "log").mockImplementation(() => {}),
    errorSpy: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}

describe("Logger", () => {
  let spies: ReturnType<typeof spyConsole>;

  beforeEach(() => {
    spies = spyConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses default options when none are given", () => {
    expect(new Logger().getOptions()).toEqual({ level: "info", quiet: false, timestamps: false });
  });

  it("writes info to stdout and errors to stderr", () => {
    const logger = new Logger();
    logger.info("listening");
    logger.error("boom", 42);

    expect(spies.logSpy).toHaveBeenCalledWith("[info] listening");
    expect(spies.errorSpy).toHaveBeenCalledWith("[error] boom", 42);
  });

  it("drops messages below the configured level", () => {
    const logger = new Logger({ level: "warn" });
    logger.debug("noise");
    logger.info("noise");
    logger.warn("careful");

    expect(spies.logSpy).not.toHaveBeenCalled();
    expect(spies.errorSpy).toHaveBeenCalledWith("[warn] careful");
  });

  it("prints nothing when quiet", () => {
    const logger = new Logger({ quiet: true });
    logger.error("hidden");
    expect(spies.errorSpy).not.toHaveBeenCalled();
  });

  it("applies configure() to later calls", () => {
    const logger = new Logger();
    logger.configure({ level: "debug" });
    logger.debug("details");
    expect(spies.logSpy).toHaveBeenCalledWith("[debug] details");
  });

  it("prefixes a timestamp when enabled", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-05T12:00:00.000Z"));
    try {
      new Logger({ timestamps: true }).info("tick");
      expect(spies.logSpy).toHaveBeenCalledWith("2024-01-05T12:00:00.000Z [info] tick");
    } finally {
      vi.useRealTimers();
    }
  });
});
