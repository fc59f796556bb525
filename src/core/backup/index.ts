/**
 * Backup module exports
 */

export { GzipIntegrityChecker } from "./integrity";
export { backupVolume, backupVolumes } from "./volume-backup";
