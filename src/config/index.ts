/**
 * Configuration module exports
 */

// Defaults
export {
  CONFIG_FILE_NAMES,
  DEFAULT_BACKUP_DIRECTORY,
  DEFAULT_CONFIG_FILE,
  DEFAULT_MAX_BACKUPS,
  MIN_RETENTION_COUNT,
} from "./defaults";
// Loader
export {
  buildConfig,
  ConfigError,
  createDefaultConfig,
  findAndLoadConfig,
  findConfigFile,
  type LoadedConfig,
  loadConfig,
  saveConfig,
  toConfigDocument,
} from "./loader";
// Resolver
export { getVolumePolicy, isValidRetention, listConfiguredVolumes, resolveRetention } from "./resolver";
// Validator
export { validateConfigDocument } from "./validator";
