/**
 * sft-distill CLI
 * Builds a prompt/reply fine-tuning dataset from a chat archive export
 */

import { Command } from 'commander';
import { version } from '../version.js';
import { configureDistillCommand } from './commands/index.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('sft-distill')
    .description('Build prompt/reply fine-tuning pairs for one author from a chat archive export')
    .version(version);

  configureDistillCommand(program);

  return program;
}
