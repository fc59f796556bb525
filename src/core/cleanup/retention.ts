/**
 * Retention policy logic
 */

import * as path from "node:path";
import { isValidRetention } from "../../config/resolver";
import { listArchives, deleteArchiveFile } from "../../storage/local";
import type { Archive, RotationResult } from "../../types";
import { logger } from "../../utils/logger";
import { getErrorMessage } from "../errors";

/**
 * Clamp a keep-count to a usable value
 */
export function normalizeKeepCount(keep: unknown): number {
  if (isValidRetention(keep)) {
    return keep;
  }
  logger.warn(`Invalid max_backups value '${String(keep)}'. Using 1.`);
  return 1;
}

/**
 * Archives outside the newest-N window. Input must be newest first.
 */
export function selectForDeletion(archives: readonly Archive[], keep: unknown): Archive[] {
  return archives.slice(normalizeKeepCount(keep));
}

/**
 * Delete a volume's archives beyond the keep-count.
 * Each deletion is attempted even if an earlier one fails.
 */
export async function rotateArchives(
  root: string,
  volumeName: string,
  keep: unknown,
): Promise<RotationResult> {
  const archives = await listArchives(root, volumeName);
  const keepCount = normalizeKeepCount(keep);
  const toDelete = selectForDeletion(archives, keepCount);

  logger.info(`Rotating backups for volume: ${volumeName} (keeping ${keepCount})`);

  const result: RotationResult = {
    kept: archives.slice(0, keepCount),
    deleted: [],
    failed: [],
  };

  for (const archive of toDelete) {
    try {
      logger.info(`Deleting old backup: ${path.basename(archive.path)}`);
      await deleteArchiveFile(archive.path);
      result.deleted.push(archive);
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error(`Failed to delete ${archive.path}: ${message}`);
      result.failed.push({ archive, message });
    }
  }

  return result;
}
