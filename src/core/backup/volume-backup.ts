/**
 * Docker volume backup implementation
 */

import { stat } from "node:fs/promises";
import { resolveRetention } from "../../config/resolver";
import { deleteArchiveFile, ensureArchiveDir, getArchivePath } from "../../storage/local";
import type {
  Archive,
  ArchiverResult,
  RotationResult,
  VolumeBackupFailure,
  VolumeBackupOptions,
  VolumeBackupResult,
  VolumeBackupsResult,
  VolumeManagerConfig,
  VolumeServices,
} from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { logger } from "../../utils/logger";
import { formatArchiveTimestamp, generateArchiveName } from "../../utils/naming";
import { normalizeKeepCount, rotateArchives } from "../cleanup/retention";
import {
  ArchiveError,
  CorruptArchiveError,
  getErrorMessage,
  VolumeManagerError,
} from "../errors";

async function discardArchive(archivePath: string): Promise<void> {
  try {
    await deleteArchiveFile(archivePath);
  } catch (error) {
    logger.error(`Failed to remove incomplete archive ${archivePath}: ${getErrorMessage(error)}`);
  }
}

/**
 * Backup a single Docker volume: archive, verify, then rotate.
 * Failed or corrupt archives are removed before the error is thrown.
 */
export async function backupVolume(
  volumeName: string,
  options: VolumeBackupOptions,
  services: VolumeServices,
): Promise<VolumeBackupResult> {
  const startTime = Date.now();
  const dir = await ensureArchiveDir(options.backupDir, volumeName);

  const startedAt = services.now ? services.now() : new Date();
  const timestamp = formatArchiveTimestamp(startedAt);
  const filename = generateArchiveName(volumeName, startedAt);
  const archivePath = getArchivePath(options.backupDir, volumeName, timestamp);

  logger.info(`Starting backup for volume: ${volumeName} into ${dir}`);
  let result: ArchiverResult;
  try {
    result = await services.archiver.compress(volumeName, dir, filename);
  } catch (error) {
    await discardArchive(archivePath);
    throw new ArchiveError(
      `Failed to back up volume '${volumeName}': ${getErrorMessage(error)}`,
      volumeName,
      { cause: error },
    );
  }

  if (!result.success) {
    await discardArchive(archivePath);
    throw new ArchiveError(
      `Failed to back up volume '${volumeName}' (exit code ${result.exitCode})` +
        (result.message ? `: ${result.message}` : ""),
      volumeName,
    );
  }

  logger.debug(`Verifying backup file: ${archivePath}`);
  if (!(await services.integrity.verify(archivePath))) {
    await discardArchive(archivePath);
    throw new CorruptArchiveError(archivePath, volumeName);
  }

  const info = await stat(archivePath);
  const archive: Archive = {
    volumeName,
    timestamp,
    filename,
    path: archivePath,
    sizeBytes: info.size,
  };
  const checksum = await computeFileChecksum(archivePath);

  logger.info(`Successfully backed up volume '${volumeName}' to '${archivePath}' (sha256 ${checksum})`);

  const retention = normalizeKeepCount(options.maxBackups);
  let rotation: RotationResult;
  try {
    rotation = await rotateArchives(options.backupDir, volumeName, retention);
  } catch (error) {
    // the new archive is kept; only pruning is skipped
    const message = `Failed to rotate backups of volume '${volumeName}': ${getErrorMessage(error)}`;
    logger.error(message);
    rotation = { kept: [], deleted: [], failed: [], error: message };
  }

  return {
    volumeName,
    archive,
    checksum,
    retention,
    rotation,
    durationMs: Date.now() - startTime,
  };
}

/**
 * Backup several volumes one after another.
 * A failing volume is recorded and the rest still run.
 */
export async function backupVolumes(
  volumeNames: readonly string[],
  config: VolumeManagerConfig,
  services: VolumeServices,
  backupDir: string = config.backupDirectory,
): Promise<VolumeBackupsResult> {
  const succeeded: VolumeBackupResult[] = [];
  const failed: VolumeBackupFailure[] = [];
  const skipped: string[] = [];

  for (const volumeName of volumeNames) {
    let exists: boolean;
    try {
      exists = await services.runtime.volumeExists(volumeName);
    } catch (error) {
      const failure: VolumeBackupFailure = { volumeName, phase: "runtime", message: getErrorMessage(error) };
      logger.error(`Could not inspect volume '${volumeName}': ${failure.message}`);
      failed.push(failure);
      continue;
    }

    if (!exists) {
      logger.warn(`Configured volume '${volumeName}' not found. Skipping.`);
      skipped.push(volumeName);
      continue;
    }

    const maxBackups = resolveRetention(config, volumeName);
    logger.info(`Processing backup for volume: ${volumeName} (max_backups: ${maxBackups})`);

    try {
      const result = await backupVolume(volumeName, { backupDir, maxBackups }, services);
      succeeded.push(result);
      if (result.rotation.error) {
        failed.push({ volumeName, phase: "rotate", message: result.rotation.error });
      }
    } catch (error) {
      const failure: VolumeBackupFailure = {
        volumeName,
        phase: error instanceof VolumeManagerError ? error.phase : "archive",
        message: getErrorMessage(error),
      };
      logger.error(`Backup of volume '${volumeName}' failed during ${failure.phase}: ${failure.message}`);
      failed.push(failure);
    }
  }

  return {
    succeeded,
    failed,
    skipped,
    totalSizeBytes: succeeded.reduce((sum, r) => sum + r.archive.sizeBytes, 0),
    success: failed.length === 0,
  };
}
