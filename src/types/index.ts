/**
 * Centralized type exports
 */

// Backup types
export type {
  Archive,
  ArchiveDirectory,
  RotationResult,
  VolumeBackupFailure,
  VolumeBackupOptions,
  VolumeBackupResult,
  VolumeBackupsResult,
} from "./backup";
// Config types
export type { ConfigDocument, VolumeManagerConfig, VolumePolicy } from "./config";
// Runtime capabilities
export type {
  Archiver,
  ArchiverResult,
  ConfirmFn,
  ContainerRuntime,
  IntegrityChecker,
  VolumeContainer,
  VolumeServices,
} from "./runtime";
