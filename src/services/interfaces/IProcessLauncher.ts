/**
 * @file IProcessLauncher - Process launch contract
 * @description Starts viewer, editor and build processes with an explicit lifetime policy
 */

export interface LaunchOptions {
  /**
   * true: the child gets its own process group, no stdio, and is not awaited;
   * it keeps running after the coordinator exits.
   */
  detach: boolean;
  /** Working directory, defaults to the coordinator's. */
  cwd?: string;
}

export interface ProcessRecord {
  pid: number;
  command: readonly string[];
  detached: boolean;
  /** Every record describes a process this coordinator started. */
  launchedBy: 'coordinator';
  /** Exit code (null when killed by a signal); null for detached children. */
  exited: Promise<number | null> | null;
}

export interface IProcessLauncher {
  /**
   * @throws {LaunchError} when the executable cannot be resolved or the OS refuses
   */
  spawn(command: readonly string[], options: LaunchOptions): Promise<ProcessRecord>;
}
