/**
 * Volume name sanitizing and archive naming
 */

import { InvalidVolumeNameError } from "../core/errors";

export const ARCHIVE_EXTENSION = ".tar.gz";

// volumeName_YYYYMMDD_HHMMSS.tar.gz
const ARCHIVE_SUFFIX_PATTERN = /_(\d{8}_\d{6})\.tar\.gz$/;

export interface ParsedArchiveName {
  volumeName: string;
  timestamp: string;
}

/**
 * Map a volume identifier to a safe path segment.
 * Separators become "_", anything outside [A-Za-z0-9_-] is dropped.
 */
export function sanitizeVolumeName(volumeName: string): string {
  const sanitized = volumeName.replace(/[/\\]/g, "_").replace(/[^A-Za-z0-9_-]/g, "");
  if (sanitized.length === 0) {
    throw new InvalidVolumeNameError(volumeName);
  }
  return sanitized;
}

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatArchiveTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function generateArchiveName(volumeName: string, date: Date): string {
  return `${volumeName}_${formatArchiveTimestamp(date)}${ARCHIVE_EXTENSION}`;
}

export function parseArchiveName(filename: string): ParsedArchiveName | null {
  const match = ARCHIVE_SUFFIX_PATTERN.exec(filename);
  const timestamp = match?.[1];
  if (!match || !timestamp || match.index === 0) {
    return null;
  }

  return {
    volumeName: filename.slice(0, match.index),
    timestamp,
  };
}

/**
 * True when the filename is an archive of exactly this volume
 */
export function isArchiveOfVolume(filename: string, volumeName: string): boolean {
  return parseArchiveName(filename)?.volumeName === volumeName;
}
