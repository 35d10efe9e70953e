/**
 * @arch fmtkit.cli.barrel
 */
import { Command } from 'commander';
import { createFormatCommand } from './commands/format.js';

export const VERSION = '0.3.0';

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('fmtkit')
    .description('Incremental Java and JavaScript source formatter')
    .version(VERSION);
  [createFormatCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}

export { runFormat } from './commands/format.js';
export type { FormatOptions, FormatCommandResult } from './commands/format.js';
