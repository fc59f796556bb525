/**
 * Shared state handed to every CLI command
 */

import { GzipIntegrityChecker } from "../core";
import { DockerArchiver, DockerRuntime } from "../docker/runtime";
import type { VolumeServices } from "../types";

export interface CommandContext {
  /** Explicit --config path */
  configPath?: string;
  /** Directory searched for a config file */
  cwd: string;
  verbose: boolean;
  services: VolumeServices;
}

export function createDockerServices(): VolumeServices {
  return {
    runtime: new DockerRuntime(),
    archiver: new DockerArchiver(),
    integrity: new GzipIntegrityChecker(),
  };
}
