import chalk from "chalk";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LogLevel } from "../common/common-enum";
import { createLogger, formatLine } from "./logger";

describe("logger", () => {
  const level = chalk.level;

  beforeEach(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = level;
    vi.restoreAllMocks();
  });

  it("formats a line with timestamp and level", () => {
    const line = formatLine(LogLevel.INFO, "exercise saved", new Date("2026-01-02T03:04:05.000Z"));

    expect(line).toBe("[2026-01-02T03:04:05.000Z] INFO exercise saved");
  });

  it("skips messages above the configured level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger({ level: LogLevel.WARN, enableConsole: true });

    logger.info("hidden");
    logger.debug("hidden");
    logger.warn("shown", { id: 1 });

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toMatch(/ WARN shown$/);
    expect(error.mock.calls[0][1]).toEqual({ id: 1 });
  });

  it("writes info and debug to stdout", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger({ level: LogLevel.DEBUG, enableConsole: true });

    logger.info("one");
    logger.debug("two");

    expect(log).toHaveBeenCalledTimes(2);
    expect(log.mock.calls[1][0]).toMatch(/ DEBUG two$/);
  });

  it("stays silent when console logging is disabled", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger({ level: LogLevel.DEBUG, enableConsole: false });

    logger.error("nothing");

    expect(error).not.toHaveBeenCalled();
  });
});
