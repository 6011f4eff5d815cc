import { afterEach, describe, expect, it, vi } from "vitest";
import { CatalogLogger, defaultLogLevel } from "./logger";

describe("defaultLogLevel", () => {
  it("reads FONT_CATALOG_LOG_LEVEL", () => {
    expect(defaultLogLevel({ FONT_CATALOG_LOG_LEVEL: "DEBUG" })).toBe("debug");
    expect(defaultLogLevel({ FONT_CATALOG_LOG_LEVEL: "silent" })).toBe("silent");
  });

  it("uses debug in development and warn otherwise", () => {
    expect(defaultLogLevel({ NODE_ENV: "development" })).toBe("debug");
    expect(defaultLogLevel({ NODE_ENV: "production" })).toBe("warn");
    expect(defaultLogLevel({ FONT_CATALOG_LOG_LEVEL: "loud" })).toBe("warn");
  });
});

describe("CatalogLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints entries at or above its level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new CatalogLogger("warn");

    logger.info("Provider", "scan", { files: 2 });
    logger.warn("Provider", "skip", { path: "/fonts/broken.ttf" });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[Provider] skip", { path: "/fonts/broken.ttf" });
  });

  it("keeps entries below its level", () => {
    const logger = new CatalogLogger("silent");
    logger.debug("Matcher", "rank", { family: "Harbor Sans" });

    const [entry] = logger.getEntries();
    expect(entry.level).toBe("debug");
    expect(entry.component).toBe("Matcher");
    expect(entry.action).toBe("rank");
    expect(entry.metadata).toEqual({ family: "Harbor Sans" });
  });

  it("records durations for timed entries", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(Date, "now").mockReturnValue(1_500);
    const logger = new CatalogLogger("info");

    logger.timed("error", "Collection", "build", 1_000, { families: 3 });

    expect(logger.getEntries()[0].duration).toBe(500);
    expect(error).toHaveBeenCalledWith("[Collection] build", { families: 3, duration: 500 });
  });

  it("changes level at runtime", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = new CatalogLogger("warn");

    logger.debug("A", "hidden");
    logger.setLevel("debug");
    logger.debug("A", "shown");

    expect(logger.getLevel()).toBe("debug");
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("[A] shown", {});
  });

  it("caps and clears stored entries", () => {
    const logger = new CatalogLogger("silent");
    for (let i = 0; i < 1005; i++) logger.info("Loop", String(i));

    const entries = logger.getEntries();
    expect(entries).toHaveLength(1000);
    expect(entries[0].action).toBe("5");

    logger.clear();
    expect(logger.getEntries()).toEqual([]);
  });
});
