/**
 * Docker CLI client wrapper
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { logger } from "../utils/logger";

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export interface DockerRunResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface VolumeMount {
  source: string;
  target: string;
  readonly?: boolean;
}

function readOutput(error: object, key: "stdout" | "stderr"): string {
  if (key in error) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === "string") return value.trim();
    if (Buffer.isBuffer(value)) return value.toString().trim();
  }
  return "";
}

/**
 * Run a Docker command and return the result
 */
export async function dockerRun(args: string[]): Promise<DockerRunResult> {
  try {
    const { stdout, stderr } = await execFileAsync("docker", args, { maxBuffer: MAX_OUTPUT_BYTES });
    return {
      success: true,
      stdout: stdout.trim(),
      stderr: stderr.trim(),
      exitCode: 0,
    };
  } catch (error) {
    // execFile rejects on non-zero exit codes; a string code (ENOENT) means docker itself is missing
    if (error && typeof error === "object" && "code" in error && typeof error.code === "number") {
      return {
        success: false,
        stdout: readOutput(error, "stdout"),
        stderr: readOutput(error, "stderr"),
        exitCode: error.code,
      };
    }
    throw error;
  }
}

/**
 * Check if Docker is available and running
 */
export async function isDockerAvailable(): Promise<boolean> {
  try {
    const result = await dockerRun(["info"]);
    return result.success;
  } catch (error) {
    logger.debug("Docker CLI could not be executed", error);
    return false;
  }
}

export function formatMountSpec(mount: VolumeMount): string {
  return mount.readonly ? `${mount.source}:${mount.target}:ro` : `${mount.source}:${mount.target}`;
}

/**
 * Arguments for `docker run`
 */
export function buildRunArgs(options: {
  image: string;
  command: string[];
  volumes?: VolumeMount[];
  remove?: boolean;
  name?: string;
}): string[] {
  const args: string[] = ["run"];

  if (options.remove !== false) {
    args.push("--rm");
  }

  if (options.name) {
    args.push("--name", options.name);
  }

  for (const vol of options.volumes ?? []) {
    args.push("-v", formatMountSpec(vol));
  }

  args.push(options.image, ...options.command);
  return args;
}

/**
 * Run a container with the specified options
 */
export async function runContainer(options: {
  image: string;
  command: string[];
  volumes?: VolumeMount[];
  remove?: boolean;
  name?: string;
}): Promise<DockerRunResult> {
  const args = buildRunArgs(options);
  logger.debug(`Running Docker container: docker ${args.join(" ")}`);
  return dockerRun(args);
}

/**
 * Pull a Docker image if not present
 */
export async function ensureImage(image: string): Promise<boolean> {
  const inspectResult = await dockerRun(["image", "inspect", image]);
  if (inspectResult.success) {
    return true;
  }

  logger.info(`Pulling Docker image: ${image}`);
  const pullResult = await dockerRun(["pull", image]);
  return pullResult.success;
}

/**
 * Stop a container with the specified timeout
 * @param timeout - seconds allowed for a graceful stop
 */
export async function stopContainer(containerId: string, timeout: number = 30): Promise<boolean> {
  logger.debug(`Stopping container ${containerId} with timeout ${timeout}s`);
  const result = await dockerRun(["stop", "-t", timeout.toString(), containerId]);
  if (!result.success) {
    logger.error(`Failed to stop container ${containerId}: ${result.stderr}`);
  }
  return result.success;
}

/**
 * Start a container with retry logic
 * @param retryDelay - milliseconds between attempts
 */
export async function startContainerWithRetry(
  containerId: string,
  retries: number = 3,
  retryDelay: number = 1000,
): Promise<boolean> {
  for (let attempt = 1; attempt <= retries; attempt++) {
    const result = await dockerRun(["start", containerId]);
    if (result.success) {
      logger.debug(`Container ${containerId} started successfully`);
      return true;
    }

    if (attempt < retries) {
      logger.warn(
        `Failed to start container ${containerId} (attempt ${attempt}/${retries}), retrying in ${retryDelay}ms...`,
      );
      await new Promise((resolve) => setTimeout(resolve, retryDelay));
    }
  }

  logger.error(`Failed to start container ${containerId} after ${retries} attempts`);
  return false;
}
