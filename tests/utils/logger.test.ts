import {
  afterEach,
  beforeEach,
  describe,
  expect,
  type MockInstance,
  test,
  vi,
} from "vitest";
import {
  debug,
  error,
  formatMessage,
  getLogLevel,
  info,
  logger,
  setLogLevel,
  warn,
} from "../../src/utils/logger";

describe("logger", () => {
  let originalLevel: ReturnType<typeof getLogLevel>;
  let consoleLogSpy: MockInstance;
  let consoleWarnSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

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

  describe("log level filtering", () => {
    test("debug logs only at debug level", () => {
      setLogLevel("info");
      debug("hidden");
      expect(consoleLogSpy).not.toHaveBeenCalled();

      setLogLevel("debug");
      debug("shown");
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });

    test("info is suppressed at warn level", () => {
      setLogLevel("warn");
      info("hidden");
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    test("warn goes to console.warn", () => {
      setLogLevel("info");
      warn("careful");
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    test("error always logs to console.error", () => {
      setLogLevel("error");
      error("broken");
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    test("logger object mirrors the functions", () => {
      logger.setLevel("debug");
      expect(logger.getLevel()).toBe("debug");

      logger.debug("a");
      logger.info("b");
      expect(consoleLogSpy).toHaveBeenCalledTimes(2);
    });
  });

  describe("formatMessage", () => {
    test("includes timestamp, padded level and message", () => {
      const line = formatMessage("info", "Starting Immich backup process...");

      const stamp = /\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\]/;
      expect(line).toMatch(new RegExp(`${stamp.source} INFO `));
      expect(line.endsWith(" Starting Immich backup process...")).toBe(true);
    });

    test("formats object data as JSON", () => {
      const line = formatMessage("debug", "paths", { upload: "/data/lib" });
      expect(line.endsWith(' paths {\n  "upload": "/data/lib"\n}')).toBe(true);
    });

    test("uses the message of an Error", () => {
      const failure = new Error("disk full");
      const line = formatMessage("error", "Restore failed:", failure);
      expect(line.endsWith(" Restore failed: disk full")).toBe(true);
    });

    test("stringifies primitive data", () => {
      const line = formatMessage("warn", "attempt", 3);
      expect(line.endsWith(" attempt 3")).toBe(true);
    });
  });
});
