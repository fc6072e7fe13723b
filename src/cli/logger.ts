/**
 * @file logger.ts - Terminal status lines
 * @description Coloured user-facing output for the CLI
 * @depends chalk
 */

import chalk from 'chalk';

export class Logger {
  static info(message: string): void {
    console.log(chalk.blue('ℹ'), message);
  }

  static success(message: string): void {
    console.log(chalk.green('✓'), message);
  }

  static error(message: string): void {
    console.error(chalk.red('✖'), message);
  }

  static warning(message: string): void {
    console.warn(chalk.yellow('⚠'), message);
  }
}
