import { afterEach, describe, expect, it, vi } from "vitest";

import { resolveIndexOptions } from "../config.js";
import { IndexError, isIndexError } from "../errors.js";
import { createConsoleLogger, silentLogger } from "../logger.js";

describe("resolveIndexOptions", () => {
  it("fills in defaults", () => {
    expect(resolveIndexOptions({ fields: ["title"] })).toEqual({
      fields: ["title"],
      idField: "_id",
      gramSize: 3,
      weights: { gram: 1, word: 50 },
      pruneRatio: 0.5,
      queryLogSize: 100,
      logLevel: "warn",
    });
  });

  it("reports every invalid option with its path", () => {
    let err: unknown;
    try {
      resolveIndexOptions({ fields: ["a", "a"], pruneRatio: 0, weights: { word: 1.5 } });
    } catch (e) {
      err = e;
    }

    expect(err).toBeInstanceOf(IndexError);
    if (!isIndexError(err)) return;
    expect(err.code).toBe("INVALID_CONFIG");
    expect(err.errors).toContainEqual({ path: "$.fields", message: "must not contain duplicates" });
    expect(err.errors?.map((e) => e.path)).toEqual(
      expect.arrayContaining(["$.fields", "$.pruneRatio", "$.weights.word"]),
    );
  });
});

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below its level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createConsoleLogger("warn");
    logger.debug("hidden");
    logger.warn("shown", { n: 1 });
    logger.warn("bare");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenNthCalledWith(1, "[fuzzdex] shown", { n: 1 });
    expect(warn).toHaveBeenNthCalledWith(2, "[fuzzdex] bare");
  });

  it("stays quiet when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createConsoleLogger("silent").error("nope");
    silentLogger.error("nope");

    expect(error).not.toHaveBeenCalled();
  });
});
