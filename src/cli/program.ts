/**
 * @file program.ts - Command-line definition
 * @description commander program for `synctex-bridge [options] <pdf> [editor-command]` plus `init`
 * @depends commander, runner, init
 */

import { Command, InvalidArgumentError } from 'commander';
import { ExitCode } from '../services/errors';
import type { ViewerLaunchStrategy } from '../services/interfaces';
import { createInitCommand } from './commands/init';
import { type RunContext, type SyncCommandOptions, runSyncBridge } from './runner';

export const VERSION = '0.1.0';

// ====== Argument Parsers ======

function positiveInt(label: string) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new InvalidArgumentError(`${label} must be a positive integer.`);
    }
    return parsed;
  };
}

function launchStrategy(value: string): ViewerLaunchStrategy {
  if (value === 'process' || value === 'daemon') {
    return value;
  }
  throw new InvalidArgumentError('Allowed choices are process, daemon.');
}

// ====== Program ======

export interface ProgramContext extends RunContext {
  /** Receives the exit code of whichever command ran. */
  report: (code: ExitCode) => void;
}

export function createProgram(context: ProgramContext): Command {
  const program = new Command('synctex-bridge');

  program
    .description('Forward and backward SyncTeX search between a PDF viewer and your editor')
    .version(VERSION, '-V, --version')
    .enablePositionalOptions()
    .exitOverride()
    .argument('<pdf>', 'PDF document to show')
    .argument(
      '[editor-command]',
      'editor opened on Ctrl+Click, e.g. "vim %f +%l" (%f file, %l line, %c column, %% percent)'
    )
    .option('-f, --forward <line>', 'forward search to <line>, then exit', positiveInt('line'))
    .option('--column <column>', 'column for forward search', positiveInt('column'))
    .option('-s, --source <file>', 'source file for forward search (default: <pdf> with .tex)')
    .option('-b, --build <source>', 'start a continuous build of <source> first')
    .option('--viewer <command>', 'viewer command (default: evince)')
    .option('--launch <strategy>', 'how to start a missing viewer: process | daemon', launchStrategy)
    .option('--timeout <ms>', 'viewer registration timeout', positiveInt('timeout'))
    .option('--poll-interval <ms>', 'viewer registration poll interval', positiveInt('poll interval'))
    .option('-w, --wait', 'wait for the editor to exit before handling the next click')
    .option('--config <path>', 'configuration file (default: ~/.synctex-bridge/config.json)')
    .option('--verbose', 'debug logging')
    .action(async (pdf: string, editorCommand: string | undefined, options: SyncCommandOptions) => {
      context.report(await runSyncBridge(pdf, editorCommand, options, context));
    });

  const init = createInitCommand(context.report, context.env);
  init.copyInheritedSettings(program);
  program.addCommand(init);

  return program;
}
