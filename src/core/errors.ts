/**
 * Error taxonomy for backup and restore
 */

export type BackupPhase =
  | "validate"
  | "path"
  | "archive"
  | "verify"
  | "rotate"
  | "runtime"
  | "restore";

export class VolumeManagerError extends Error {
  constructor(
    message: string,
    readonly phase: BackupPhase,
    readonly volumeName?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "VolumeManagerError";
  }
}

export class InvalidVolumeNameError extends VolumeManagerError {
  constructor(volumeName: string) {
    super(`Could not derive a valid directory name for volume "${volumeName}"`, "validate", volumeName);
    this.name = "InvalidVolumeNameError";
  }
}

/**
 * Directory creation, permission or ownership problems under the backup root
 */
export class PathError extends VolumeManagerError {
  constructor(message: string, volumeName?: string) {
    super(message, "path", volumeName);
    this.name = "PathError";
  }
}

/**
 * The external archiver exited non-zero
 */
export class ArchiveError extends VolumeManagerError {
  constructor(message: string, volumeName: string, options?: ErrorOptions) {
    super(message, "archive", volumeName, options);
    this.name = "ArchiveError";
  }
}

/**
 * Archive was written but failed the integrity check
 */
export class CorruptArchiveError extends VolumeManagerError {
  constructor(archivePath: string, volumeName: string) {
    super(`Integrity check failed for ${archivePath}`, "verify", volumeName);
    this.name = "CorruptArchiveError";
  }
}

export class ArchiveNotFoundError extends VolumeManagerError {
  constructor(archivePath: string, volumeName: string) {
    super(`Backup file not found: ${archivePath}`, "restore", volumeName);
    this.name = "ArchiveNotFoundError";
  }
}

/**
 * Extraction into the recreated volume failed
 */
export class RestoreFailedError extends VolumeManagerError {
  constructor(message: string, volumeName: string) {
    super(message, "restore", volumeName);
    this.name = "RestoreFailedError";
  }
}

/**
 * A container or volume operation against the runtime failed
 */
export class ContainerRuntimeError extends VolumeManagerError {
  constructor(message: string, volumeName?: string) {
    super(message, "runtime", volumeName);
    this.name = "ContainerRuntimeError";
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
