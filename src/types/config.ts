/**
 * Configuration type definitions
 */

/**
 * Retention override for a single volume
 */
export interface VolumePolicy {
  /** Docker volume name */
  name: string;
  /** Number of archives to keep; falls back to the default when absent */
  maxBackups?: number;
}

/**
 * Runtime configuration. Built once at startup and never mutated.
 */
export interface VolumeManagerConfig {
  readonly backupDirectory: string;
  readonly defaultMaxBackups: number;
  readonly volumes: readonly VolumePolicy[];
}

/**
 * On-disk configuration document (JSON or YAML)
 */
export interface ConfigDocument {
  backup_directory: string;
  default_max_backups: number;
  volumes: Array<{ name: string; max_backups?: number }>;
}
