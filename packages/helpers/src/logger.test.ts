import { afterEach, describe, expect, it, vi } from "vitest";

import { createConsoleLogger, NOOP_LOGGER } from "./logger";
import { collectLines } from "./sinks";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages and forwards metadata", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const logger = createConsoleLogger("Test");

    logger.info("hello", { slot: 1 });
    logger.info("bare");

    expect(info).toHaveBeenNthCalledWith(1, "[Test] hello", { slot: 1 });
    expect(info).toHaveBeenNthCalledWith(2, "[Test] bare", "");
  });

  it("drops messages below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createConsoleLogger("Test", "warn");

    logger.debug("hidden");
    logger.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[Test] shown", "");
  });

  it("no-op logger accepts every level", () => {
    expect(() => {
      NOOP_LOGGER.debug("a");
      NOOP_LOGGER.info("b");
      NOOP_LOGGER.warn("c");
      NOOP_LOGGER.error("d");
    }).not.toThrow();
  });
});

describe("collectLines", () => {
  it("keeps lines in order", () => {
    const { sink, lines } = collectLines();
    sink("first");
    sink("second");
    expect(lines).toEqual(["first", "second"]);
  });
});
