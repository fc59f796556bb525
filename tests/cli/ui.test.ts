import color from "picocolors";
import { describe, expect, test } from "vitest";
import {
  formatBackupLine,
  formatFailureLine,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
} from "../../src/cli/ui/formatters";
import type { VolumeBackupResult } from "../../src/types";

describe("formatters", () => {
  test("formatSummary aligns labels and skips empty values", () => {
    const summary = formatSummary([
      { label: "Volume", value: "db" },
      { label: "Stopped", value: null },
      { label: "Size", value: 42 },
    ]);

    expect(summary).toBe(`${color.dim("Volume")}  db\n${color.dim("Size  ")}  42`);
  });

  test("formatSummary of nothing is empty", () => {
    expect(formatSummary([])).toBe("");
  });

  test("formatTableRow pads each column", () => {
    expect(formatTableRow(["a", "bb"], [3, 4])).toBe(`a  ${color.dim(" │ ")}bb  `);
  });

  test("formatTableSeparator draws one segment per column", () => {
    expect(formatTableSeparator([2, 3])).toBe(color.dim("───┼────"));
  });

  test("formatBackupLine shows the checksum prefix and rotated archives", () => {
    const archive = {
      volumeName: "db",
      timestamp: "20240115_100000",
      filename: "db_20240115_100000.tar.gz",
      path: "/backups/db/db_20240115_100000.tar.gz",
      sizeBytes: 2048,
    };
    const result: VolumeBackupResult = {
      volumeName: "db",
      archive,
      checksum: "0123456789abcdef0123",
      retention: 1,
      rotation: { kept: [archive], deleted: [{ ...archive, timestamp: "20240114_100000" }], failed: [] },
      durationMs: 1500,
    };

    expect(formatBackupLine(result)).toBe(
      `${color.green("✓")} db  ${color.dim("db_20240115_100000.tar.gz")}  2.0 KB  ${color.dim("1.5s")}  ${color.dim("sha256:0123456789ab")}${color.dim("  (1 rotated)")}`,
    );
  });

  test("formatFailureLine shows the phase", () => {
    expect(formatFailureLine({ volumeName: "logs", phase: "archive", message: "boom" })).toBe(
      `${color.red("✗")} logs  ${color.dim("[archive]")} boom`,
    );
  });
});
