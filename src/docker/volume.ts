/**
 * Docker volume operations
 */

import type { VolumeContainer } from "../types";
import { logger } from "../utils/logger";
import { dockerRun } from "./client";

function splitLines(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

function readString(record: object, key: string): string {
  const value: unknown = Reflect.get(record, key);
  return typeof value === "string" ? value : "";
}

/**
 * Parse `docker ps --format '{{json .}}'` output
 */
export function parseContainerLines(stdout: string): VolumeContainer[] {
  const containers: VolumeContainer[] = [];

  for (const line of splitLines(stdout)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      logger.debug(`Failed to parse container JSON: ${line}`);
      continue;
    }

    if (typeof parsed !== "object" || parsed === null) continue;
    const id = readString(parsed, "ID");
    if (!id) continue;

    containers.push({
      id,
      name: readString(parsed, "Names") || id,
      state: readString(parsed, "State"),
    });
  }

  return containers;
}

/**
 * Parse whitespace-separated mount names, one inspected container per line
 */
export function parseMountNames(stdout: string): string[] {
  const names = new Set<string>();
  for (const token of stdout.split(/\s+/)) {
    if (token) names.add(token);
  }
  return [...names].sort();
}

/**
 * List all Docker volume names
 */
export async function listVolumeNames(): Promise<string[]> {
  const result = await dockerRun(["volume", "ls", "--format", "{{.Name}}"]);

  if (!result.success) {
    logger.error("Failed to list Docker volumes", result.stderr);
    return [];
  }

  return splitLines(result.stdout);
}

/**
 * Named volumes mounted by running containers
 */
export async function listRunningVolumeNames(): Promise<string[]> {
  const ps = await dockerRun(["ps", "--format", "{{.ID}}"]);
  if (!ps.success) {
    logger.error("Failed to list running containers", ps.stderr);
    return [];
  }

  const ids = splitLines(ps.stdout);
  if (ids.length === 0) {
    return [];
  }

  const inspect = await dockerRun([
    "inspect",
    "--format",
    '{{range .Mounts}}{{if eq .Type "volume"}}{{.Name}} {{end}}{{end}}',
    ...ids,
  ]);
  if (!inspect.success) {
    logger.error("Failed to inspect running containers", inspect.stderr);
    return [];
  }

  return parseMountNames(inspect.stdout);
}

/**
 * Check if a volume exists
 */
export async function volumeExists(name: string): Promise<boolean> {
  const result = await dockerRun(["volume", "inspect", name]);
  return result.success;
}

/**
 * Get containers (running and stopped) that reference a volume
 */
export async function getVolumeContainers(volumeName: string): Promise<VolumeContainer[]> {
  const result = await dockerRun([
    "ps",
    "-a",
    "--filter",
    `volume=${volumeName}`,
    "--format",
    "{{json .}}",
  ]);

  if (!result.success) {
    logger.error(`Failed to get containers for volume ${volumeName}`, result.stderr);
    return [];
  }

  return parseContainerLines(result.stdout);
}

export async function createVolume(name: string): Promise<boolean> {
  const result = await dockerRun(["volume", "create", name]);
  if (!result.success) {
    logger.error(`Failed to create volume ${name}: ${result.stderr}`);
  }
  return result.success;
}

export async function removeVolume(name: string): Promise<boolean> {
  const result = await dockerRun(["volume", "rm", name]);
  if (!result.success) {
    logger.error(`Failed to remove volume ${name}: ${result.stderr}`);
  }
  return result.success;
}
