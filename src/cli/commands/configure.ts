import * as path from "node:path";
import {
  DEFAULT_CONFIG_FILE,
  findAndLoadConfig,
  getVolumePolicy,
  isValidRetention,
  saveConfig,
} from "../../config";
import { getErrorMessage } from "../../core";
import type { VolumeManagerConfig, VolumePolicy } from "../../types";
import type { CommandContext } from "../context";
import { color, ui } from "../ui";

/**
 * Parse a keep-count typed at a prompt; blank input is `undefined`
 */
export function parseKeepCountInput(input: string): number | undefined | Error {
  const trimmed = input.trim();
  if (trimmed === "") return undefined;
  const value = /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
  return isValidRetention(value) ? value : new Error("Please enter a positive integer");
}

function validateKeepCount(input: string, allowBlank: boolean): string | undefined {
  const parsed = parseKeepCountInput(input);
  if (parsed instanceof Error) return parsed.message;
  if (parsed === undefined && !allowBlank) return "A value is required";
  return undefined;
}

function volumeHint(config: VolumeManagerConfig, name: string, available: string[]): string | undefined {
  if (!available.includes(name)) return "not found";
  const policy = getVolumePolicy(config, name);
  return policy === undefined ? undefined : `keeps ${policy}`;
}

export function describeConfig(config: VolumeManagerConfig): string {
  const volumes =
    config.volumes.length > 0
      ? config.volumes
          .map((v) => {
            const keep = v.maxBackups ?? `default ${config.defaultMaxBackups}`;
            return ` - ${v.name} ${color.dim(`(keeps ${keep})`)}`;
          })
          .join("\n")
      : " (none)";
  return `Backup directory:    ${config.backupDirectory}
Default max backups: ${config.defaultMaxBackups}
Volumes:
${volumes}`;
}

/**
 * Edit the configuration file interactively
 */
export async function configureCommand(ctx: CommandContext): Promise<number> {
  ui.banner("configure");

  try {
    const loaded = await findAndLoadConfig(ctx.configPath, ctx.cwd);
    const current = loaded.config;
    const target = loaded.path ?? path.resolve(ctx.cwd, ctx.configPath ?? DEFAULT_CONFIG_FILE);

    const directory = await ui.text({
      message: "Backup directory",
      initialValue: current.backupDirectory,
      validate: (value) => (value.trim() ? undefined : "A directory is required"),
    });
    if (ui.isCancel(directory)) {
      ui.cancel("Configuration discarded");
      return 0;
    }

    const defaultInput = await ui.text({
      message: "Default number of backups to keep per volume",
      initialValue: String(current.defaultMaxBackups),
      validate: (value) => validateKeepCount(value, false),
    });
    if (ui.isCancel(defaultInput)) {
      ui.cancel("Configuration discarded");
      return 0;
    }
    const parsedDefault = parseKeepCountInput(defaultInput);
    const defaultMaxBackups = typeof parsedDefault === "number" ? parsedDefault : current.defaultMaxBackups;

    const available = await ctx.services.runtime.listVolumeNames();
    const configured = current.volumes.map((v) => v.name);
    // configured volumes that no longer exist stay selectable so they can be dropped
    const choices = [...new Set([...available, ...configured])].sort();

    let selected: string[] = [];
    if (choices.length === 0) {
      ui.info("No Docker volumes found.");
    } else {
      const picked = await ui.multiselect({
        message: "Volumes to back up in silent mode",
        options: choices.map((name) => ({
          value: name,
          label: name,
          hint: volumeHint(current, name, available),
        })),
        initialValues: configured.filter((name) => choices.includes(name)),
        required: false,
      });
      if (ui.isCancel(picked)) {
        ui.cancel("Configuration discarded");
        return 0;
      }
      selected = picked;
    }

    const volumes: VolumePolicy[] = [];
    for (const name of selected) {
      const existing = getVolumePolicy(current, name);
      const answer = await ui.text({
        message: `Max backups for '${name}' (blank uses the default)`,
        initialValue: existing === undefined ? "" : String(existing),
        validate: (value) => validateKeepCount(value, true),
      });
      if (ui.isCancel(answer)) {
        ui.cancel("Configuration discarded");
        return 0;
      }
      const parsed = parseKeepCountInput(answer);
      volumes.push(typeof parsed === "number" ? { name, maxBackups: parsed } : { name });
    }

    const next: VolumeManagerConfig = {
      backupDirectory: directory.trim(),
      defaultMaxBackups,
      volumes,
    };

    ui.note(describeConfig(next), "New configuration");

    const save = await ui.confirm({ message: `Save this configuration to '${target}'?` });
    if (ui.isCancel(save) || !save) {
      ui.cancel("Configuration discarded");
      return 0;
    }

    const savedTo = await saveConfig(next, target);
    ui.outro(`Configuration saved to ${savedTo}`);
    return 0;
  } catch (error) {
    ui.error(`Configuration failed: ${getErrorMessage(error)}`);
    if (ctx.verbose) {
      console.error(error);
    }
    return 1;
  }
}
