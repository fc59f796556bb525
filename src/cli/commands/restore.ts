import { findAndLoadConfig } from "../../config";
import { getErrorMessage, RestoreCoordinator, type RestoreSession } from "../../core";
import { listArchiveDirectories, listArchives } from "../../storage/local";
import type { ConfirmFn } from "../../types";
import { formatArchiveTimestampForDisplay, formatBytes } from "../../utils";
import type { CommandContext } from "../context";
import { color, confirmOrCancel, formatSummary, ui } from "../ui";

type ContainerListKey = "stoppedContainers" | "restartedContainers" | "failedToRestart";

function containerNames(session: RestoreSession, key: ContainerListKey): string | null {
  const list = session[key];
  return list.length > 0 ? list.map((c) => c.name).join(", ") : null;
}

export function restoreExitCode(session: RestoreSession): number {
  switch (session.state) {
    case "done":
      return session.failedToRestart.length > 0 ? 1 : 0;
    case "cancelled":
      return 0;
    default:
      return 1;
  }
}

/**
 * Pick an archive directory and an archive, then restore it into its volume
 */
export async function restoreCommand(
  ctx: CommandContext,
  confirm: ConfirmFn = confirmOrCancel,
): Promise<number> {
  ui.banner("restore");

  try {
    const { config } = await findAndLoadConfig(ctx.configPath, ctx.cwd);
    const directories = await listArchiveDirectories(config.backupDirectory);

    if (directories.length === 0) {
      ui.error(`No volume backup directories found in '${config.backupDirectory}'`);
      return 1;
    }

    const directory = await ui.select({
      message: "Select the volume to restore",
      options: directories.map((dir) => ({
        value: dir,
        label: dir.volumeName,
        hint: dir.inferred ? "name inferred from directory" : undefined,
      })),
    });

    if (ui.isCancel(directory)) {
      ui.cancel("Restore cancelled");
      return 0;
    }

    const archives = await listArchives(config.backupDirectory, directory.volumeName);
    if (archives.length === 0) {
      ui.error(`No backups found for volume '${directory.volumeName}'`);
      return 1;
    }

    const archive = await ui.select({
      message: "Select the backup to restore",
      options: archives.map((a) => ({
        value: a,
        label: a.filename,
        hint: `${formatArchiveTimestampForDisplay(a.timestamp)} · ${formatBytes(a.sizeBytes)}`,
      })),
    });

    if (ui.isCancel(archive)) {
      ui.cancel("Restore cancelled");
      return 0;
    }

    const coordinator = new RestoreCoordinator(ctx.services.runtime, ctx.services.archiver, confirm);
    const session = await coordinator.restore({
      volumeName: archive.volumeName,
      archivePath: archive.path,
    });

    ui.note(
      formatSummary([
        { label: "Volume", value: session.volumeName },
        { label: "Archive", value: archive.filename },
        { label: "Result", value: session.state },
        { label: "Stopped", value: containerNames(session, "stoppedContainers") },
        { label: "Restarted", value: containerNames(session, "restartedContainers") },
        {
          label: "Failed to restart",
          value:
            session.failedToRestart.length > 0
              ? `${containerNames(session, "failedToRestart")} ${color.dim("(manual restart required)")}`
              : null,
        },
      ]),
      "Restore Summary",
    );

    switch (session.state) {
      case "done":
        if (session.failedToRestart.length > 0) {
          ui.warn("Restore completed, but some containers did not restart");
        } else {
          ui.outro("Restore complete!");
        }
        break;
      case "cancelled":
        ui.cancel("Restore cancelled");
        break;
      default:
        ui.error(`Restore failed: ${session.error?.message ?? "unknown error"}`);
    }

    return restoreExitCode(session);
  } catch (error) {
    ui.error(`Restore failed: ${getErrorMessage(error)}`);
    if (ctx.verbose) {
      console.error(error);
    }
    return 1;
  }
}
