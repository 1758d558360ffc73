#!/usr/bin/env node

import { Command } from 'commander';
import { registerBuildCommand } from './commands/build';
import { registerValidateCommand } from './commands/validate';
import type { ProgramOptions } from './lib/context';

export type { ProgramOptions } from './lib/context';

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('scopeledger')
    .description('Validate microscope fleet ledgers and render the fleet dashboard')
    .version('0.1.0');

  registerValidateCommand(program, options);
  registerBuildCommand(program, options);

  return program;
}

export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void run();
}
