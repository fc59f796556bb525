/**
 * Configuration file loading and saving
 */

import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { getErrorMessage } from "../core/errors";
import type { ConfigDocument, VolumeManagerConfig, VolumePolicy } from "../types";
import { logger } from "../utils/logger";
import {
  CONFIG_FILE_NAMES,
  DEFAULT_BACKUP_DIRECTORY,
  DEFAULT_MAX_BACKUPS,
  MIN_RETENTION_COUNT,
} from "./defaults";
import { isValidRetention } from "./resolver";
import { ConfigError, validateConfigDocument } from "./validator";

export { ConfigError } from "./validator";

/**
 * Result of locating and loading a config
 */
export interface LoadedConfig {
  config: VolumeManagerConfig;
  /** File the config came from; null when defaults were used */
  path: string | null;
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${getErrorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${getErrorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .json, .yaml or .yml`);
}

/**
 * Accepts integers and digit strings; anything else is reported and dropped
 */
function parseRetentionValue(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  const parsed = typeof value === "string" && /^\d+$/.test(value.trim()) ? Number(value) : value;
  if (isValidRetention(parsed)) {
    return parsed;
  }

  logger.warn(`Invalid ${field} value ${JSON.stringify(value)}, falling back to default`);
  return undefined;
}

/**
 * Build an immutable config from a validated document
 */
export function buildConfig(doc: Record<string, unknown>, baseDir: string): VolumeManagerConfig {
  const rawDir = typeof doc.backup_directory === "string" && doc.backup_directory.trim() !== ""
    ? doc.backup_directory
    : DEFAULT_BACKUP_DIRECTORY;

  let defaultMaxBackups = DEFAULT_MAX_BACKUPS;
  if (doc.default_max_backups !== undefined && doc.default_max_backups !== null) {
    defaultMaxBackups =
      parseRetentionValue(doc.default_max_backups, "default_max_backups") ?? MIN_RETENTION_COUNT;
  }

  const entries: unknown[] = Array.isArray(doc.volumes) ? doc.volumes : [];
  const volumes: VolumePolicy[] = [];
  for (const entry of entries) {
    if (typeof entry !== "object" || entry === null || !("name" in entry)) continue;
    const name = String(entry.name);
    const maxBackups =
      "max_backups" in entry ? parseRetentionValue(entry.max_backups, `max_backups for "${name}"`) : undefined;
    volumes.push(Object.freeze(maxBackups === undefined ? { name } : { name, maxBackups }));
  }

  return Object.freeze({
    backupDirectory: path.resolve(baseDir, rawDir),
    defaultMaxBackups,
    volumes: Object.freeze(volumes),
  });
}

/**
 * Config used when no file exists
 */
export function createDefaultConfig(baseDir: string = process.cwd()): VolumeManagerConfig {
  return buildConfig({}, baseDir);
}

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<VolumeManagerConfig> {
  const absolutePath = path.resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, "utf8");
  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());

  validateConfigDocument(parsed);

  const config = buildConfig(parsed, path.dirname(absolutePath));
  logger.debug(
    `Config loaded: dir=${config.backupDirectory}, default=${config.defaultMaxBackups}, ` +
      `volumes=${config.volumes.map((v) => v.name).join(",") || "(none)"}`,
  );
  return config;
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (existsSync(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Load an explicit config, else the first one found, else defaults
 */
export async function findAndLoadConfig(
  configPath?: string,
  startDir: string = process.cwd(),
): Promise<LoadedConfig> {
  if (configPath) {
    return { config: await loadConfig(configPath), path: path.resolve(configPath) };
  }

  const found = findConfigFile(startDir);
  if (!found) {
    logger.info("Configuration file not found. Using defaults.");
    return { config: createDefaultConfig(startDir), path: null };
  }

  return { config: await loadConfig(found), path: found };
}

export function toConfigDocument(config: VolumeManagerConfig): ConfigDocument {
  return {
    backup_directory: config.backupDirectory,
    default_max_backups: config.defaultMaxBackups,
    volumes: config.volumes.map((v) =>
      v.maxBackups === undefined ? { name: v.name } : { name: v.name, max_backups: v.maxBackups },
    ),
  };
}

/**
 * Persist a config in the format implied by the file extension
 */
export async function saveConfig(config: VolumeManagerConfig, configPath: string): Promise<string> {
  const absolutePath = path.resolve(configPath);
  const ext = path.extname(absolutePath).toLowerCase();
  const doc = toConfigDocument(config);

  let content: string;
  if (ext === ".yaml" || ext === ".yml") {
    content = yaml.dump(doc);
  } else if (ext === ".json") {
    content = `${JSON.stringify(doc, null, 2)}\n`;
  } else {
    throw new ConfigError(`Unsupported config file format: ${ext}. Use .json, .yaml or .yml`);
  }

  await mkdir(path.dirname(absolutePath), { recursive: true });
  await writeFile(absolutePath, content, "utf8");
  logger.info(`Configuration saved to ${absolutePath}`);
  return absolutePath;
}
