/**
 * Default configuration values
 */

export const CONFIG_FILE_NAMES = ["backup_config.json", "backup_config.yaml", "backup_config.yml"];

export const DEFAULT_CONFIG_FILE = "backup_config.json";

export const DEFAULT_BACKUP_DIRECTORY = "docker_volume_backups";

/** Keep-count used when the document does not set one */
export const DEFAULT_MAX_BACKUPS = 5;

/** Floor for any resolved keep-count */
export const MIN_RETENTION_COUNT = 1;
