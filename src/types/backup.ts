/**
 * Backup operation type definitions
 */

import type { BackupPhase } from "../core/errors";

/**
 * A single archive file on disk
 */
export interface Archive {
  volumeName: string;
  /** Fixed-width local timestamp, YYYYMMDD_HHMMSS */
  timestamp: string;
  filename: string;
  path: string;
  sizeBytes: number;
}

/**
 * An archive directory found under the backup root
 */
export interface ArchiveDirectory {
  sanitizedName: string;
  /** Volume name the archives belong to */
  volumeName: string;
  /** True when no manifest or archive filename confirmed the volume name */
  inferred: boolean;
  path: string;
}

export interface RotationResult {
  kept: Archive[];
  deleted: Archive[];
  failed: Array<{ archive: Archive; message: string }>;
  /** Set when the archive set could not be listed; nothing was deleted */
  error?: string;
}

export interface VolumeBackupOptions {
  backupDir: string;
  maxBackups: number;
}

/**
 * Result of backing up a single Docker volume
 */
export interface VolumeBackupResult {
  volumeName: string;
  archive: Archive;
  /** SHA-256 of the archive */
  checksum: string;
  /** Keep-count the rotation ran with */
  retention: number;
  rotation: RotationResult;
  durationMs: number;
}

export interface VolumeBackupFailure {
  volumeName: string;
  phase: BackupPhase;
  message: string;
}

/**
 * Result of a batch of volume backups
 */
export interface VolumeBackupsResult {
  succeeded: VolumeBackupResult[];
  failed: VolumeBackupFailure[];
  /** Volumes the runtime reported as missing */
  skipped: string[];
  totalSizeBytes: number;
  /** True only when no volume failed */
  success: boolean;
}
