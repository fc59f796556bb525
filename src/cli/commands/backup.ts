import * as path from "node:path";
import { findAndLoadConfig, listConfiguredVolumes, resolveRetention } from "../../config";
import { backupVolumes, getErrorMessage } from "../../core";
import type { VolumeBackupsResult } from "../../types";
import { formatBytes, logger } from "../../utils";
import type { CommandContext } from "../context";
import { color, formatBackupLine, formatFailureLine, formatSummary, type SummaryItem, ui } from "../ui";

export function batchSummaryItems(result: VolumeBackupsResult): SummaryItem[] {
  return [
    { label: "Backed up", value: result.succeeded.length },
    { label: "Failed", value: result.failed.length > 0 ? result.failed.length : null },
    { label: "Skipped", value: result.skipped.length > 0 ? result.skipped.join(", ") : null },
    { label: "Total size", value: formatBytes(result.totalSizeBytes) },
  ];
}

/**
 * Unattended backup of every configured volume
 */
export async function backupCommand(ctx: CommandContext): Promise<number> {
  try {
    const { config } = await findAndLoadConfig(ctx.configPath, ctx.cwd);
    const volumes = listConfiguredVolumes(config);

    if (volumes.length === 0) {
      logger.info("No volumes configured. Nothing to back up.");
      return 0;
    }

    logger.info(`Backing up ${volumes.length} configured volume(s) into ${config.backupDirectory}`);
    const result = await backupVolumes(volumes, config, ctx.services);

    for (const failure of result.failed) {
      logger.error(`Volume '${failure.volumeName}' failed during ${failure.phase}: ${failure.message}`);
    }
    logger.info(
      `Backup finished: ${result.succeeded.length} succeeded, ${result.failed.length} failed, ` +
        `${result.skipped.length} skipped (${formatBytes(result.totalSizeBytes)})`,
    );

    return result.success ? 0 : 1;
  } catch (error) {
    logger.error(`Backup failed: ${getErrorMessage(error)}`);
    if (ctx.verbose) {
      console.error(error);
    }
    return 1;
  }
}

/**
 * Pick volumes used by running containers and back them up
 */
export async function interactiveBackupCommand(ctx: CommandContext): Promise<number> {
  ui.banner("interactive backup");

  try {
    const { config } = await findAndLoadConfig(ctx.configPath, ctx.cwd);
    const running = await ctx.services.runtime.listRunningVolumeNames();

    if (running.length === 0) {
      ui.info("No volumes are in use by running containers.");
      ui.outro("Nothing to back up");
      return 0;
    }

    const selected = await ui.multiselect({
      message: "Select volumes to back up",
      options: running.map((name) => ({
        value: name,
        label: name,
        hint: `keeps ${resolveRetention(config, name)}`,
      })),
      required: false,
    });

    if (ui.isCancel(selected)) {
      ui.cancel("Backup cancelled");
      return 0;
    }

    if (selected.length === 0) {
      ui.info("No volumes were selected for backup.");
      ui.outro("Done");
      return 0;
    }

    const directory = await ui.text({
      message: "Backup directory",
      initialValue: config.backupDirectory,
      validate: (value) => (value.trim() ? undefined : "A directory is required"),
    });

    if (ui.isCancel(directory)) {
      ui.cancel("Backup cancelled");
      return 0;
    }

    const backupDir = path.resolve(ctx.cwd, directory.trim());
    ui.note(`${selected.join("\n")}\n\n${color.dim(`into ${backupDir}`)}`, "Volumes to back up");

    const proceed = await ui.confirm({ message: "Proceed with backup?" });
    if (ui.isCancel(proceed) || !proceed) {
      ui.cancel("Backup cancelled");
      return 0;
    }

    const s = ui.spinner();
    s.start(`Backing up ${selected.length} volume(s)...`);
    const result = await backupVolumes(selected, config, ctx.services, backupDir);
    s.stop("Backup run finished");

    for (const item of result.succeeded) {
      ui.message(formatBackupLine(item));
    }
    for (const failure of result.failed) {
      ui.message(formatFailureLine(failure));
    }

    ui.note(formatSummary(batchSummaryItems(result)), "Backup Summary");

    if (!result.success) {
      ui.error("Some volumes failed to back up");
      return 1;
    }

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    ui.error(`Backup failed: ${getErrorMessage(error)}`);
    if (ctx.verbose) {
      console.error(error);
    }
    return 1;
  }
}
