import { describe, expect, test } from "vitest";
import { formatBytes, formatDuration } from "../../src/utils/format";

describe("formatBytes", () => {
  test("formats bytes without decimals", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(512)).toBe("512 B");
  });

  test("formats larger units with two decimals", () => {
    expect(formatBytes(1024)).toBe("1.00 KB");
    expect(formatBytes(1536)).toBe("1.50 KB");
    expect(formatBytes(5 * 1024 * 1024)).toBe("5.00 MB");
    expect(formatBytes(3 * 1024 ** 3)).toBe("3.00 GB");
  });
});

describe("formatDuration", () => {
  test("milliseconds", () => {
    expect(formatDuration(250)).toBe("250ms");
  });

  test("seconds", () => {
    expect(formatDuration(1500)).toBe("1.5s");
    expect(formatDuration(59_000)).toBe("59.0s");
  });

  test("minutes", () => {
    expect(formatDuration(125_000)).toBe("2m 5s");
  });
});
