/**
 * Configuration document validation
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (doc: Record<string, unknown>) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRetentionLike(value: unknown): boolean {
  return value === undefined || value === null || typeof value === "number" || typeof value === "string";
}

const validators: Record<"backupDirectory" | "defaultMaxBackups" | "volumes", Validator> = {
  backupDirectory: (d) => {
    if (d.backup_directory === undefined || d.backup_directory === null) {
      return; // falls back to the default directory
    }
    if (typeof d.backup_directory !== "string") {
      throw new ConfigError("backup_directory must be a string");
    }
  },

  defaultMaxBackups: (d) => {
    if (!isRetentionLike(d.default_max_backups)) {
      throw new ConfigError("default_max_backups must be a number");
    }
  },

  volumes: (d) => {
    if (d.volumes === undefined || d.volumes === null) {
      return;
    }
    if (!Array.isArray(d.volumes)) {
      throw new ConfigError("volumes must be an array");
    }

    const seen = new Set<string>();
    d.volumes.forEach((entry: unknown, i) => {
      if (!isRecord(entry)) {
        throw new ConfigError(`volumes[${i}] must be an object`);
      }
      if (typeof entry.name !== "string" || entry.name.length === 0) {
        throw new ConfigError(`volumes[${i}].name must be a non-empty string`);
      }
      if (!isRetentionLike(entry.max_backups)) {
        throw new ConfigError(`volumes[${i}].max_backups must be a number`);
      }
      if (seen.has(entry.name)) {
        throw new ConfigError(`volumes[${i}]: volume "${entry.name}" is listed more than once`);
      }
      seen.add(entry.name);
    });
  },
};

/**
 * Structural validation. Out-of-range keep-counts are not rejected here;
 * they fall back to defaults when the config is built.
 */
export function validateConfigDocument(doc: unknown): asserts doc is Record<string, unknown> {
  if (!isRecord(doc)) {
    throw new ConfigError("Config must be an object");
  }

  validators.backupDirectory(doc);
  validators.defaultMaxBackups(doc);
  validators.volumes(doc);
}
