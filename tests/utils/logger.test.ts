import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import {
  debug,
  error,
  formatMessage,
  getLogLevel,
  info,
  isLogLevel,
  type LogLevel,
  logger,
  setLogLevel,
  warn,
} from "../../src/utils/logger";

describe("logger", () => {
  let originalLevel: LogLevel;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleWarnSpy: MockInstance<typeof console.warn>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    originalLevel = getLogLevel();
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel(originalLevel);
    vi.restoreAllMocks();
  });

  function firstLogLine(): string {
    return String(consoleLogSpy.mock.calls[0]?.[0]);
  }

  describe("isLogLevel", () => {
    test("accepts the four levels", () => {
      for (const level of ["debug", "info", "warn", "error"]) {
        expect(isLogLevel(level)).toBe(true);
      }
    });

    test("rejects anything else", () => {
      expect(isLogLevel("INFO")).toBe(false);
      expect(isLogLevel("trace")).toBe(false);
    });
  });

  describe("log level filtering", () => {
    test("debug logs when level is debug", () => {
      setLogLevel("debug");
      debug("test message");
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });

    test("debug does not log when level is info", () => {
      setLogLevel("info");
      debug("test message");
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    test("info does not log when level is warn", () => {
      setLogLevel("warn");
      info("test message");
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    test("warn goes to stderr via console.warn", () => {
      setLogLevel("info");
      warn("test message");
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
    });

    test("warn does not log when level is error", () => {
      setLogLevel("error");
      warn("test message");
      expect(consoleWarnSpy).not.toHaveBeenCalled();
    });

    test("error always logs", () => {
      setLogLevel("error");
      error("test message");
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("message formatting", () => {
    test("prefixes an ISO timestamp and the padded level", () => {
      const line = formatMessage("info", "hello");
      expect(line).toMatch(/^\x1b\[36m\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] INFO \x1b\[0m hello$/);
    });

    test("formats object data as indented JSON", () => {
      setLogLevel("info");
      info("test", { nested: true });
      expect(firstLogLine().endsWith(' {\n  "nested": true\n}')).toBe(true);
    });

    test("prints an error's message outside debug", () => {
      setLogLevel("info");
      info("failed", new Error("disk full"));
      expect(firstLogLine().endsWith(" failed disk full")).toBe(true);
    });

    test("prints an error's stack at debug level", () => {
      setLogLevel("debug");
      const err = new Error("disk full");
      debug("failed", err);
      expect(firstLogLine()).toContain(String(err.stack));
    });

    test("converts other data to string", () => {
      setLogLevel("info");
      info("count", 42);
      expect(firstLogLine().endsWith(" count 42")).toBe(true);
    });
  });

  describe("logger object", () => {
    test("routes each level to the matching console method", () => {
      logger.setLevel("debug");
      expect(logger.getLevel()).toBe("debug");

      logger.debug("debug msg");
      logger.info("info msg");
      logger.warn("warn msg");
      logger.error("error msg");

      expect(consoleLogSpy).toHaveBeenCalledTimes(2);
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });
  });
});
