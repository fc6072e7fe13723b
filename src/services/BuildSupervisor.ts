/**
 * @file BuildSupervisor - Continuous build hook
 * @description Starts a detached watch-and-rebuild process (latexmk -pvc by default) next to the source file
 * @depends ICommandTemplater, IProcessLauncher, LoggerService
 */

import path from 'path';
import { type Result, err, ok } from '../../shared/utils';
import { SyncBridgeError } from './errors';
import type {
  CommandTemplate,
  IBuildSupervisor,
  ICommandTemplater,
  IProcessLauncher,
  ProcessRecord,
} from './interfaces';
import { createLogger } from './LoggerService';

const logger = createLogger('BuildSupervisor');

export class BuildSupervisor implements IBuildSupervisor {
  constructor(
    private readonly templater: ICommandTemplater,
    private readonly launcher: IProcessLauncher,
    private readonly buildCommand: CommandTemplate
  ) {}

  /** @sideeffect Spawns the build tool, detached, in the source's directory */
  async startContinuousBuild(
    sourceFile: string | undefined
  ): Promise<Result<ProcessRecord | null, SyncBridgeError>> {
    if (!sourceFile) {
      return ok(null);
    }

    const source = path.resolve(sourceFile);

    try {
      const command = this.templater.expand(this.buildCommand, { file: source });
      const record = await this.launcher.spawn(command, {
        detach: true,
        cwd: path.dirname(source),
      });
      logger.info(`Continuous build running for ${source} (pid ${record.pid})`);
      return ok(record);
    } catch (error) {
      if (error instanceof SyncBridgeError) {
        logger.warn(`Continuous build not started: ${error.message}`);
        return err(error);
      }
      throw error;
    }
  }
}

export function createBuildSupervisor(
  templater: ICommandTemplater,
  launcher: IProcessLauncher,
  buildCommand: CommandTemplate
): IBuildSupervisor {
  return new BuildSupervisor(templater, launcher, buildCommand);
}
