/**
 * Retention lookups over a loaded config
 */

import type { VolumeManagerConfig } from "../types";
import { MIN_RETENTION_COUNT } from "./defaults";

export function isValidRetention(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= MIN_RETENTION_COUNT;
}

/**
 * Explicit keep-count override for a volume, if one is configured
 */
export function getVolumePolicy(config: VolumeManagerConfig, volumeName: string): number | undefined {
  return config.volumes.find((v) => v.name === volumeName)?.maxBackups;
}

/**
 * Keep-count for a volume: valid override, else valid default, else the floor
 */
export function resolveRetention(config: VolumeManagerConfig, volumeName: string): number {
  const override = getVolumePolicy(config, volumeName);
  if (isValidRetention(override)) {
    return override;
  }
  if (isValidRetention(config.defaultMaxBackups)) {
    return config.defaultMaxBackups;
  }
  return MIN_RETENTION_COUNT;
}

export function listConfiguredVolumes(config: VolumeManagerConfig): string[] {
  return config.volumes.map((v) => v.name);
}
