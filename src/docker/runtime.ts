/**
 * Docker-backed implementations of the runtime and archiver capabilities
 */

import * as path from "node:path";
import type { Archiver, ArchiverResult, ContainerRuntime, VolumeContainer } from "../types";
import {
  ensureImage,
  runContainer,
  startContainerWithRetry,
  stopContainer,
  type VolumeMount,
} from "./client";
import {
  createVolume,
  getVolumeContainers,
  listRunningVolumeNames,
  listVolumeNames,
  removeVolume,
  volumeExists,
} from "./volume";

export const ARCHIVER_IMAGE = "alpine:latest";

const VOLUME_MOUNT = "/volume_data";
const BACKUP_MOUNT = "/backup";

export interface DockerRuntimeOptions {
  /** Seconds allowed for a graceful stop (default: 30) */
  stopTimeout?: number;
  /** Start attempts per container (default: 3) */
  restartRetries?: number;
  /** Milliseconds between start attempts (default: 1000) */
  restartRetryDelay?: number;
}

export class DockerRuntime implements ContainerRuntime {
  private readonly stopTimeout: number;
  private readonly restartRetries: number;
  private readonly restartRetryDelay: number;

  constructor(options: DockerRuntimeOptions = {}) {
    this.stopTimeout = options.stopTimeout ?? 30;
    this.restartRetries = options.restartRetries ?? 3;
    this.restartRetryDelay = options.restartRetryDelay ?? 1000;
  }

  listVolumeNames(): Promise<string[]> {
    return listVolumeNames();
  }

  listRunningVolumeNames(): Promise<string[]> {
    return listRunningVolumeNames();
  }

  volumeExists(name: string): Promise<boolean> {
    return volumeExists(name);
  }

  containersUsingVolume(name: string): Promise<VolumeContainer[]> {
    return getVolumeContainers(name);
  }

  stopContainer(id: string): Promise<boolean> {
    return stopContainer(id, this.stopTimeout);
  }

  startContainer(id: string): Promise<boolean> {
    return startContainerWithRetry(id, this.restartRetries, this.restartRetryDelay);
  }

  createVolume(name: string): Promise<boolean> {
    return createVolume(name);
  }

  removeVolume(name: string): Promise<boolean> {
    return removeVolume(name);
  }
}

function helperName(kind: "backup" | "restore"): string {
  return `volume_${kind}_helper_${Date.now()}_${Math.floor(Math.random() * 100000)}`;
}

/**
 * tar inside a throwaway Alpine container
 */
export class DockerArchiver implements Archiver {
  constructor(private readonly image: string = ARCHIVER_IMAGE) {}

  async compress(volumeName: string, targetDir: string, archiveName: string): Promise<ArchiverResult> {
    return this.run("backup", {
      command: ["tar", "-czf", `${BACKUP_MOUNT}/${archiveName}`, "-C", VOLUME_MOUNT, "."],
      volumes: [
        { source: volumeName, target: VOLUME_MOUNT, readonly: true },
        { source: path.resolve(targetDir), target: BACKUP_MOUNT },
      ],
    });
  }

  async extract(volumeName: string, sourceDir: string, archiveName: string): Promise<ArchiverResult> {
    return this.run("restore", {
      command: ["tar", "-xzf", `${BACKUP_MOUNT}/${archiveName}`, "-C", VOLUME_MOUNT],
      volumes: [
        { source: volumeName, target: VOLUME_MOUNT },
        { source: path.resolve(sourceDir), target: BACKUP_MOUNT, readonly: true },
      ],
    });
  }

  private async run(
    kind: "backup" | "restore",
    options: { command: string[]; volumes: VolumeMount[] },
  ): Promise<ArchiverResult> {
    if (!(await ensureImage(this.image))) {
      return { success: false, exitCode: -1, message: `Docker image ${this.image} is not available` };
    }

    const result = await runContainer({
      image: this.image,
      name: helperName(kind),
      command: options.command,
      volumes: options.volumes,
    });

    return {
      success: result.success,
      exitCode: result.exitCode,
      message: result.stderr || result.stdout,
    };
  }
}
