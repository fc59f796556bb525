/**
 * Capabilities the backup and restore logic depends on.
 * Docker implementations live in src/docker; tests substitute fakes.
 */

export interface VolumeContainer {
  id: string;
  name: string;
  state: string;
}

export interface ContainerRuntime {
  /** All volume names known to the runtime */
  listVolumeNames(): Promise<string[]>;
  /** Volumes mounted by at least one running container, sorted and unique */
  listRunningVolumeNames(): Promise<string[]>;
  volumeExists(name: string): Promise<boolean>;
  /** Containers (running or not) that reference the volume, in runtime order */
  containersUsingVolume(name: string): Promise<VolumeContainer[]>;
  stopContainer(id: string): Promise<boolean>;
  startContainer(id: string): Promise<boolean>;
  createVolume(name: string): Promise<boolean>;
  removeVolume(name: string): Promise<boolean>;
}

export interface ArchiverResult {
  success: boolean;
  exitCode: number;
  message: string;
}

export interface Archiver {
  /**
   * Write `archiveName` into `targetDir` from the volume's contents.
   * The volume is mounted read-only.
   */
  compress(volumeName: string, targetDir: string, archiveName: string): Promise<ArchiverResult>;
  /**
   * Unpack `sourceDir/archiveName` into the volume.
   */
  extract(volumeName: string, sourceDir: string, archiveName: string): Promise<ArchiverResult>;
}

export interface IntegrityChecker {
  verify(archivePath: string): Promise<boolean>;
}

export type ConfirmFn = (message: string) => Promise<boolean>;

/**
 * Collaborators for backup and restore
 */
export interface VolumeServices {
  runtime: ContainerRuntime;
  archiver: Archiver;
  integrity: IntegrityChecker;
  /** Clock used for archive timestamps */
  now?: () => Date;
}
