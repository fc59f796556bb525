import { describe, expect, test } from "vitest";
import { formatArchiveTimestampForDisplay, formatBytes, formatDuration } from "../../src/utils/format";

describe("formatBytes", () => {
  test("formats bytes without decimals", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(512)).toBe("512 B");
  });

  test("scales to larger units", () => {
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(1024 * 1024)).toBe("1.0 MB");
    expect(formatBytes(5 * 1024 * 1024 * 1024)).toBe("5.0 GB");
  });
});

describe("formatDuration", () => {
  test("formats milliseconds, seconds and minutes", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1500)).toBe("1.5s");
    expect(formatDuration(125_000)).toBe("2m 5s");
  });
});

describe("formatArchiveTimestampForDisplay", () => {
  test("adds separators", () => {
    expect(formatArchiveTimestampForDisplay("20240115_143022")).toBe("2024-01-15 14:30:22");
  });

  test("leaves unexpected input alone", () => {
    expect(formatArchiveTimestampForDisplay("latest")).toBe("latest");
  });
});
