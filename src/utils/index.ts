/**
 * Utility exports
 */

export { computeFileChecksum } from "./crypto";
export { formatArchiveTimestampForDisplay, formatBytes, formatDuration } from "./format";
export type { LogLevel } from "./logger";
export { debug, error, getLogLevel, info, isLogLevel, logger, setLogLevel, warn } from "./logger";
export type { ParsedArchiveName } from "./naming";
export {
  ARCHIVE_EXTENSION,
  formatArchiveTimestamp,
  generateArchiveName,
  isArchiveOfVolume,
  parseArchiveName,
  sanitizeVolumeName,
} from "./naming";
