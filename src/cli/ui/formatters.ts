/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { VolumeBackupFailure, VolumeBackupResult } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";

export const TABLE_WIDTHS = {
  volume: 30,
  created: 19,
  size: 10,
  archiveName: 50,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const shown = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...shown.map((i) => i.label.length));
  return shown.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

export function formatBackupLine(result: VolumeBackupResult): string {
  const rotated = result.rotation.deleted.length;
  return (
    `${color.green("✓")} ${result.volumeName}  ${color.dim(result.archive.filename)}  ` +
    `${formatBytes(result.archive.sizeBytes)}  ${color.dim(formatDuration(result.durationMs))}  ` +
    color.dim(`sha256:${result.checksum.slice(0, 12)}`) +
    (rotated > 0 ? color.dim(`  (${rotated} rotated)`) : "")
  );
}

export function formatFailureLine(failure: VolumeBackupFailure): string {
  return `${color.red("✗")} ${failure.volumeName}  ${color.dim(`[${failure.phase}]`)} ${failure.message}`;
}
