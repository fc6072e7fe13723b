/**
 * @file init.ts - Initialize command
 * @description Writes a default ~/.synctex-bridge/config.json unless one exists
 * @depends commander, ConfigManager, logger
 */

import { Command } from 'commander';
import { ConfigManager } from '../../services/ConfigManager';
import { ExitCode } from '../../services/errors';
import { Logger } from '../logger';

export function createInitCommand(report: (code: ExitCode) => void, env?: NodeJS.ProcessEnv) {
  const command = new Command('init');

  command
    .description('Create a default configuration file')
    .option('--config <path>', 'configuration file to create')
    .action((cmdOptions: { config?: string }) => {
      const manager = new ConfigManager({ configPath: cmdOptions.config, env });
      const configPath = manager.getConfigPath();

      try {
        if (manager.ensureConfig()) {
          Logger.success(`Created ${configPath}`);
          Logger.info('Edit editor.command to choose the editor opened on Ctrl+Click (%f file, %l line, %c column)');
        } else {
          Logger.info(`Configuration already exists: ${configPath}`);
        }
        report(ExitCode.Success);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        Logger.error(`Initialization failed: ${message}`);
        report(ExitCode.Usage);
      }
    });

  return command;
}
