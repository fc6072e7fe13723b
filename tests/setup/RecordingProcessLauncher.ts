/**
 * @file RecordingProcessLauncher.ts
 * @description Process launcher stand-in that records commands instead of starting processes
 * @depends IProcessLauncher
 */

import type { IProcessLauncher, LaunchOptions, ProcessRecord } from '../../src/services/interfaces';

export interface SpawnCall {
  command: string[];
  options: LaunchOptions;
}

export class RecordingProcessLauncher implements IProcessLauncher {
  readonly calls: SpawnCall[] = [];

  /** Return an error to make the matching spawn fail. */
  failWhen: ((command: readonly string[]) => Error | undefined) | null = null;
  /** Runs after a successful spawn, e.g. to let a fake viewer register. */
  onSpawn: ((command: readonly string[]) => void) | null = null;
  /** Exit promise handed out for non-detached children. */
  exitWith: () => Promise<number | null> = () => Promise.resolve(0);

  private nextPid = 4200;

  async spawn(command: readonly string[], options: LaunchOptions): Promise<ProcessRecord> {
    this.calls.push({ command: [...command], options });

    const failure = this.failWhen?.(command);
    if (failure) {
      throw failure;
    }

    this.onSpawn?.(command);

    return {
      pid: this.nextPid++,
      command: [...command],
      detached: options.detach,
      launchedBy: 'coordinator',
      exited: options.detach ? null : this.exitWith(),
    };
  }

  commands(): string[][] {
    return this.calls.map((call) => call.command);
  }
}
