/**
 * Volume restore state machine
 *
 *   start -> exists-check -> existing -> has-dependents -> stopping -> removing
 *                                     -> no-dependents  ------------> removing
 *                         -> not-existing ---------------------------> creating
 *   removing -> creating -> extracting -> verify -> restarting -> done
 *
 * Every destructive step is gated by a confirmation. "cancelled" is reached
 * before anything is stopped or removed.
 */

import { stat } from "node:fs/promises";
import * as path from "node:path";
import type { Archiver, ArchiverResult, ConfirmFn, ContainerRuntime, VolumeContainer } from "../../types";
import { logger } from "../../utils/logger";
import {
  ArchiveNotFoundError,
  ContainerRuntimeError,
  RestoreFailedError,
  type VolumeManagerError,
} from "../errors";

export type RestoreState =
  | "start"
  | "exists-check"
  | "existing"
  | "not-existing"
  | "has-dependents"
  | "no-dependents"
  | "stopping"
  | "removing"
  | "creating"
  | "extracting"
  | "verify"
  | "restarting"
  | "done"
  | "cancelled"
  | "failed";

export type RestoreOutcome = Extract<RestoreState, "done" | "cancelled" | "failed">;

const TERMINAL_STATES: ReadonlySet<RestoreState> = new Set<RestoreState>(["done", "cancelled", "failed"]);

export interface RestoreRequest {
  volumeName: string;
  archivePath: string;
}

export interface RestoreSession {
  volumeName: string;
  archivePath: string;
  state: RestoreState;
  priorVolumeExisted: boolean;
  /** Containers referencing the volume when the session began, in runtime order */
  dependents: VolumeContainer[];
  /** Containers this session stopped; the only ones it may start again */
  stoppedContainers: VolumeContainer[];
  restartedContainers: VolumeContainer[];
  failedToRestart: VolumeContainer[];
  /** Every state visited, terminal state last */
  history: RestoreState[];
  error?: VolumeManagerError;
}

export function isTerminal(state: RestoreState): state is RestoreOutcome {
  return TERMINAL_STATES.has(state);
}

function names(containers: VolumeContainer[]): string {
  return containers.map((c) => c.name).join(", ");
}

export class RestoreCoordinator {
  private extraction: ArchiverResult | null = null;

  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly archiver: Archiver,
    private readonly confirm: ConfirmFn,
  ) {}

  /**
   * Drive one restore from "start" to a terminal state
   */
  async restore(request: RestoreRequest): Promise<RestoreSession> {
    const session: RestoreSession = {
      volumeName: request.volumeName,
      archivePath: request.archivePath,
      state: "start",
      priorVolumeExisted: false,
      dependents: [],
      stoppedContainers: [],
      restartedContainers: [],
      failedToRestart: [],
      history: ["start"],
    };
    this.extraction = null;

    logger.info(
      `Starting restore for volume '${session.volumeName}' from '${path.basename(session.archivePath)}'`,
    );

    while (!isTerminal(session.state)) {
      session.state = await this.step(session);
      session.history.push(session.state);
    }

    return session;
  }

  private async step(session: RestoreSession): Promise<RestoreState> {
    const volume = session.volumeName;

    switch (session.state) {
      case "start": {
        const found = await stat(session.archivePath).then(
          (info) => info.isFile(),
          () => false,
        );
        if (!found) {
          return this.fail(session, new ArchiveNotFoundError(session.archivePath, volume));
        }
        return "exists-check";
      }

      case "exists-check":
        session.priorVolumeExisted = await this.runtime.volumeExists(volume);
        if (!session.priorVolumeExisted) {
          logger.info(`Volume '${volume}' does not exist. It will be created.`);
          return "not-existing";
        }
        logger.info(`Volume '${volume}' exists.`);
        return "existing";

      case "existing":
        session.dependents = await this.runtime.containersUsingVolume(volume);
        return session.dependents.length > 0 ? "has-dependents" : "no-dependents";

      case "has-dependents": {
        logger.warn(`The following containers use volume '${volume}': ${names(session.dependents)}`);
        const proceed = await this.confirm(
          `Stop ${names(session.dependents)} and remove volume '${volume}' to restore?`,
        );
        return proceed ? "stopping" : this.cancel();
      }

      case "no-dependents": {
        const proceed = await this.confirm(
          `Volume '${volume}' exists but is not currently used. Remove and recreate it?`,
        );
        return proceed ? "removing" : this.cancel();
      }

      case "stopping":
        for (const container of session.dependents) {
          if (container.state !== "running") {
            logger.debug(`Container '${container.name}' is ${container.state || "not running"}; leaving it`);
            continue;
          }
          logger.info(`Stopping container '${container.name}'...`);
          if (!(await this.runtime.stopContainer(container.id))) {
            await this.restartStopped(session);
            return this.fail(
              session,
              new ContainerRuntimeError(`Failed to stop container '${container.name}'`, volume),
            );
          }
          session.stoppedContainers.push(container);
        }
        return "removing";

      case "removing":
        logger.info(`Removing existing volume '${volume}'...`);
        if (!(await this.runtime.removeVolume(volume))) {
          // the volume is untouched, so the stopped containers can safely come back
          await this.restartStopped(session);
          return this.fail(session, new ContainerRuntimeError(`Failed to remove volume '${volume}'`, volume));
        }
        return "creating";

      case "not-existing":
        return "creating";

      case "creating":
        logger.info(`Creating volume '${volume}'...`);
        if (!(await this.runtime.createVolume(volume))) {
          return this.fail(session, new ContainerRuntimeError(`Failed to create volume '${volume}'`, volume));
        }
        return "extracting";

      case "extracting":
        logger.info("Restoring data...");
        this.extraction = await this.archiver.extract(
          volume,
          path.dirname(session.archivePath),
          path.basename(session.archivePath),
        );
        return "verify";

      case "verify":
        if (!this.extraction?.success) {
          const detail = this.extraction?.message ? `: ${this.extraction.message}` : "";
          if (session.stoppedContainers.length > 0) {
            logger.warn(
              `Containers left stopped for manual recovery: ${names(session.stoppedContainers)}`,
            );
          }
          return this.fail(
            session,
            new RestoreFailedError(`Failed to restore volume '${volume}'${detail}`, volume),
          );
        }
        logger.info(`Successfully restored volume '${volume}'`);
        return session.stoppedContainers.length > 0 ? "restarting" : "done";

      case "restarting":
        logger.info("Restarting previously stopped containers...");
        await this.restartStopped(session);
        return "done";

      case "done":
      case "cancelled":
      case "failed":
        return session.state;
    }
  }

  private async restartStopped(session: RestoreSession): Promise<void> {
    for (const container of session.stoppedContainers) {
      if (await this.runtime.startContainer(container.id)) {
        session.restartedContainers.push(container);
      } else {
        logger.warn(`Failed to restart container '${container.name}'. You may need to start it manually.`);
        session.failedToRestart.push(container);
      }
    }
  }

  private cancel(): RestoreState {
    logger.info("Restore cancelled by user.");
    return "cancelled";
  }

  private fail(session: RestoreSession, error: VolumeManagerError): RestoreState {
    logger.error(error.message);
    session.error = error;
    return "failed";
  }
}
