import { findAndLoadConfig } from "../../config";
import { getErrorMessage } from "../../core";
import { listArchiveDirectories, listArchives } from "../../storage/local";
import type { Archive } from "../../types";
import { formatArchiveTimestampForDisplay, formatBytes } from "../../utils";
import type { CommandContext } from "../context";
import { color, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

const WIDTHS = [TABLE_WIDTHS.archiveName, TABLE_WIDTHS.created, TABLE_WIDTHS.size];

export function formatArchiveRows(archives: Archive[]): string[] {
  return [
    formatTableRow(["Archive", "Created", "Size"], WIDTHS),
    formatTableSeparator(WIDTHS),
    ...archives.map((a) =>
      formatTableRow(
        [a.filename, formatArchiveTimestampForDisplay(a.timestamp), formatBytes(a.sizeBytes)],
        WIDTHS,
      ),
    ),
  ];
}

/**
 * Print the archives of every volume directory under the backup root
 */
export async function listCommand(ctx: CommandContext): Promise<number> {
  ui.banner("list");

  try {
    const { config } = await findAndLoadConfig(ctx.configPath, ctx.cwd);
    const directories = await listArchiveDirectories(config.backupDirectory);

    if (directories.length === 0) {
      ui.info(`No backups found in ${config.backupDirectory}`);
      ui.outro("Done");
      return 0;
    }

    let total = 0;
    for (const dir of directories) {
      const archives = await listArchives(config.backupDirectory, dir.volumeName);
      total += archives.length;

      const suffix = dir.inferred ? color.dim(" (name inferred)") : "";
      ui.step(`${color.cyan(dir.volumeName)}${suffix} ${color.dim(`· ${archives.length} backup(s)`)}`);
      if (archives.length > 0) {
        console.log(formatArchiveRows(archives).join("\n"));
      }
    }

    ui.outro(`${total} backup(s) in ${directories.length} volume director${directories.length === 1 ? "y" : "ies"}`);
    return 0;
  } catch (error) {
    ui.error(`List failed: ${getErrorMessage(error)}`);
    if (ctx.verbose) {
      console.error(error);
    }
    return 1;
  }
}
