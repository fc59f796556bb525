/**
 * Core module exports
 */

// Backup
export { backupVolume, backupVolumes, GzipIntegrityChecker } from "./backup";

// Retention
export { normalizeKeepCount, rotateArchives, selectForDeletion } from "./cleanup";

// Errors
export {
  ArchiveError,
  ArchiveNotFoundError,
  type BackupPhase,
  ContainerRuntimeError,
  CorruptArchiveError,
  getErrorMessage,
  InvalidVolumeNameError,
  PathError,
  RestoreFailedError,
  VolumeManagerError,
} from "./errors";

// Restore
export {
  isTerminal,
  RestoreCoordinator,
  type RestoreOutcome,
  type RestoreRequest,
  type RestoreSession,
  type RestoreState,
} from "./restore";
