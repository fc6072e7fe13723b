/**
 * @file ProcessLauncher - Viewer, editor and build process creation
 * @description Spawns argument lists without a shell; detached children outlive the coordinator
 * @depends cross-spawn, LoggerService
 */

import type { ChildProcess } from 'child_process';
import spawn from 'cross-spawn';
import { LaunchError } from './errors';
import type { IProcessLauncher, LaunchOptions, ProcessRecord } from './interfaces';
import { createLogger } from './LoggerService';

const logger = createLogger('ProcessLauncher');

export class ProcessLauncher implements IProcessLauncher {
  /**
   * Resolves once the OS has created the process, so a missing binary
   * (ENOENT) or a permission problem (EACCES) surfaces as LaunchError here
   * instead of as a stray 'error' event later. No retries.
   *
   * @sideeffect Starts one OS process
   */
  async spawn(command: readonly string[], options: LaunchOptions): Promise<ProcessRecord> {
    const [executable, ...args] = command;
    if (!executable) {
      throw new LaunchError(command, 'empty command');
    }

    logger.debug('Spawning process', { command, detach: options.detach, cwd: options.cwd });

    let child: ChildProcess;
    try {
      child = spawn(executable, args, {
        cwd: options.cwd,
        env: process.env,
        detached: options.detach,
        stdio: options.detach ? 'ignore' : 'inherit',
      });
    } catch (error) {
      throw new LaunchError(command, describeSpawnError(error), { cause: error });
    }

    const exited = options.detach ? null : waitForExit(child);
    await waitForSpawn(child, command);

    if (child.pid === undefined) {
      throw new LaunchError(command, 'the OS did not assign a process id');
    }

    if (options.detach) {
      child.unref();
    }

    logger.info(`Started ${executable} (pid ${child.pid}${options.detach ? ', detached' : ''})`);

    return {
      pid: child.pid,
      command: [...command],
      detached: options.detach,
      launchedBy: 'coordinator',
      exited,
    };
  }
}

function waitForSpawn(child: ChildProcess, command: readonly string[]): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off('error', onError);
      resolve();
    };
    const onError = (error: Error) => {
      child.off('spawn', onSpawn);
      reject(new LaunchError(command, describeSpawnError(error), { cause: error }));
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

function waitForExit(child: ChildProcess): Promise<number | null> {
  return new Promise((resolve) => {
    child.once('exit', (code) => resolve(code));
    // A failed spawn never exits; settle so nobody waits forever.
    child.once('error', () => resolve(null));
  });
}

function describeSpawnError(error: unknown): string {
  if (error instanceof Error && 'code' in error) {
    switch (error.code) {
      case 'ENOENT':
        return 'executable not found (check the command and PATH)';
      case 'EACCES':
        return 'permission denied';
    }
  }
  return error instanceof Error ? error.message : String(error);
}

export function createProcessLauncher(): IProcessLauncher {
  return new ProcessLauncher();
}
