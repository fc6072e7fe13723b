#!/usr/bin/env node

/**
 * @file index.ts - synctex-bridge CLI entry point
 * @description Parses arguments, turns SIGINT/SIGTERM into cancellation and exits with the command's code
 * @depends commander, program
 */

import { CommanderError } from 'commander';
import { CancellationTokenSource } from '../../shared/utils';
import { ExitCode } from '../services/errors';
import { createProgram } from './program';

export async function main(argv: string[] = process.argv): Promise<ExitCode> {
  const cancellation = new CancellationTokenSource();
  const onSignal = () => cancellation.cancel();
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  let exitCode: ExitCode = ExitCode.Success;
  const program = createProgram({
    token: cancellation.token,
    report: (code) => {
      exitCode = code;
    },
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      throw error;
    }
    // commander has already printed help, version or the usage message
    exitCode =
      error.code === 'commander.helpDisplayed' || error.code === 'commander.version'
        ? ExitCode.Success
        : ExitCode.Usage;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    cancellation.dispose();
  }

  return exitCode;
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(error);
      process.exit(ExitCode.Unexpected);
    }
  );
}
