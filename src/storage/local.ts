/**
 * Local filesystem archive layout
 *
 * {root}/{sanitizedName}/{volumeName}_{YYYYMMDD_HHMMSS}.tar.gz
 * {root}/{sanitizedName}/.volume.json
 */

import { type Dirent, existsSync } from "node:fs";
import { mkdir, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { getErrorMessage, PathError } from "../core/errors";
import type { Archive, ArchiveDirectory } from "../types";
import { logger } from "../utils/logger";
import { ARCHIVE_EXTENSION, isArchiveOfVolume, parseArchiveName, sanitizeVolumeName } from "../utils/naming";

export const MANIFEST_FILE = ".volume.json";

interface DirectoryManifest {
  volume_name: string;
}

export function getArchiveDir(root: string, volumeName: string): string {
  return path.join(root, sanitizeVolumeName(volumeName));
}

export function getArchivePath(root: string, volumeName: string, timestamp: string): string {
  return path.join(getArchiveDir(root, volumeName), `${volumeName}_${timestamp}${ARCHIVE_EXTENSION}`);
}

function isMissing(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

export async function readManifest(dir: string): Promise<string | null> {
  let content: string;
  try {
    content = await readFile(path.join(dir, MANIFEST_FILE), "utf8");
  } catch (error) {
    if (isMissing(error)) return null;
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed === "object" && parsed !== null && "volume_name" in parsed) {
      return typeof parsed.volume_name === "string" ? parsed.volume_name : null;
    }
  } catch (error) {
    logger.warn(`Ignoring unreadable manifest in ${dir}`, error);
  }
  return null;
}

/**
 * Create the volume's archive directory and record which volume owns it
 */
export async function ensureArchiveDir(root: string, volumeName: string): Promise<string> {
  const dir = getArchiveDir(root, volumeName);

  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new PathError(
      `Failed to create volume backup directory '${dir}': ${getErrorMessage(error)}`,
      volumeName,
    );
  }

  // directories written before manifests existed are claimed by their archive names
  const owner = (await readManifest(dir)) ?? (await inferVolumeFromArchives(dir));
  if (owner !== null && owner !== volumeName) {
    throw new PathError(
      `Backup directory '${dir}' already holds archives of volume "${owner}"`,
      volumeName,
    );
  }

  if (!existsSync(path.join(dir, MANIFEST_FILE))) {
    const manifest: DirectoryManifest = { volume_name: volumeName };
    try {
      await writeFile(path.join(dir, MANIFEST_FILE), `${JSON.stringify(manifest)}\n`, "utf8");
    } catch (error) {
      throw new PathError(`Failed to write manifest in '${dir}': ${getErrorMessage(error)}`, volumeName);
    }
  }

  return dir;
}

async function listArchiveFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((e) => e.isFile()).map((e) => e.name);
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }
}

function compareNewestFirst(a: Archive, b: Archive): number {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp < b.timestamp ? 1 : -1;
  }
  return a.filename < b.filename ? 1 : a.filename > b.filename ? -1 : 0;
}

/**
 * Archives of a volume, newest first. A missing directory means no backups yet.
 */
export async function listArchives(root: string, volumeName: string): Promise<Archive[]> {
  const dir = getArchiveDir(root, volumeName);
  const archives: Archive[] = [];

  for (const filename of await listArchiveFiles(dir)) {
    if (!isArchiveOfVolume(filename, volumeName)) continue;

    const archivePath = path.join(dir, filename);
    const info = await stat(archivePath);
    archives.push({
      volumeName,
      timestamp: filename.slice(volumeName.length + 1, -ARCHIVE_EXTENSION.length),
      filename,
      path: archivePath,
      sizeBytes: info.size,
    });
  }

  return archives.sort(compareNewestFirst);
}

/**
 * Volume name embedded in a directory's archive filenames, if they all agree
 */
async function inferVolumeFromArchives(dir: string): Promise<string | null> {
  const names = new Set<string>();
  for (const filename of await listArchiveFiles(dir)) {
    const parsed = parseArchiveName(filename);
    if (parsed) names.add(parsed.volumeName);
  }

  if (names.size !== 1) return null;
  const [name] = names;
  return name ?? null;
}

/**
 * Archive directories under the root, sorted by directory name.
 * The owning volume comes from the manifest, then from archive filenames,
 * and only as a last resort from the directory name itself.
 */
export async function listArchiveDirectories(root: string): Promise<ArchiveDirectory[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }

  const dirs = entries
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort();

  const result: ArchiveDirectory[] = [];
  for (const sanitizedName of dirs) {
    const dir = path.join(root, sanitizedName);
    const fromManifest = await readManifest(dir);
    const volumeName = fromManifest ?? (await inferVolumeFromArchives(dir));

    if (volumeName === null) {
      logger.debug(`No volume name recorded for ${dir}; assuming "${sanitizedName}"`);
    }

    result.push({
      sanitizedName,
      volumeName: volumeName ?? sanitizedName,
      inferred: volumeName === null,
      path: dir,
    });
  }

  return result;
}

/**
 * Remove an archive file. A file that is already gone is not an error.
 */
export async function deleteArchiveFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
  logger.debug(`Deleted archive file: ${filePath}`);
}
