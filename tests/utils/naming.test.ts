import { describe, expect, test } from "vitest";
import { InvalidVolumeNameError } from "../../src/core/errors";
import {
  formatArchiveTimestamp,
  generateArchiveName,
  isArchiveOfVolume,
  parseArchiveName,
  sanitizeVolumeName,
} from "../../src/utils/naming";

describe("sanitizeVolumeName", () => {
  test("keeps letters, digits, underscores and dashes", () => {
    expect(sanitizeVolumeName("db-1_main")).toBe("db-1_main");
  });

  test("turns path separators into underscores", () => {
    expect(sanitizeVolumeName("project/db\\data")).toBe("project_db_data");
  });

  test("drops other characters", () => {
    expect(sanitizeVolumeName("app data.v1")).toBe("appdatav1");
  });

  test("is idempotent", () => {
    const once = sanitizeVolumeName("a/b c.d");
    expect(sanitizeVolumeName(once)).toBe(once);
  });

  test("throws when nothing is left", () => {
    expect(() => sanitizeVolumeName("...")).toThrow(InvalidVolumeNameError);
    expect(() => sanitizeVolumeName("")).toThrow(InvalidVolumeNameError);
  });
});

describe("archive names", () => {
  const at = new Date(2024, 0, 15, 14, 30, 22);

  test("formats local time as YYYYMMDD_HHMMSS", () => {
    expect(formatArchiveTimestamp(at)).toBe("20240115_143022");
    expect(formatArchiveTimestamp(new Date(2024, 8, 3, 4, 5, 6))).toBe("20240903_040506");
  });

  test("generates volume_timestamp.tar.gz", () => {
    expect(generateArchiveName("app_data", at)).toBe("app_data_20240115_143022.tar.gz");
  });

  test("parses the volume name and timestamp back", () => {
    expect(parseArchiveName("app_data_20240115_143022.tar.gz")).toEqual({
      volumeName: "app_data",
      timestamp: "20240115_143022",
    });
  });

  test("rejects names that do not follow the pattern", () => {
    expect(parseArchiveName("_20240115_143022.tar.gz")).toBeNull();
    expect(parseArchiveName("app_data_2024.tar.gz")).toBeNull();
    expect(parseArchiveName("app_data_20240115_143022.tar")).toBeNull();
    expect(parseArchiveName(".volume.json")).toBeNull();
  });

  test("matches archives of exactly one volume", () => {
    expect(isArchiveOfVolume("app_data_20240115_143022.tar.gz", "app_data")).toBe(true);
    expect(isArchiveOfVolume("app_data_20240115_143022.tar.gz", "app")).toBe(false);
    expect(isArchiveOfVolume("app_20240115_143022.tar.gz", "app_data")).toBe(false);
  });
});
