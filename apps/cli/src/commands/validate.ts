import { Command } from 'commander';
import { ValidationFailedError, formatValidationReport, validateLedgers } from '@scopeledger/ledger';
import { resolveLedgerPaths } from '../lib/config';
import type { LedgerPathOptions } from '../lib/config';
import { createCommandContext } from '../lib/context';
import type { ProgramOptions } from '../lib/context';

type ValidateOptions = LedgerPathOptions & {
  json?: boolean;
};

export function addLedgerPathOptions(command: Command): Command {
  return command
    .option('--root <dir>', 'Ledger repository root (default: current directory)')
    .option('--instruments-dir <dir>', 'Instrument registry directory')
    .option('--qc-dir <dir>', 'QC session ledger directory')
    .option('--maintenance-dir <dir>', 'Maintenance event ledger directory');
}

export function registerValidateCommand(program: Command, programOptions: ProgramOptions): void {
  addLedgerPathOptions(program.command('validate').description('Check the instrument registry and event ledgers'))
    .option('--json', 'Print issues as JSON on stdout')
    .action((options: ValidateOptions) => {
      const { config, cwd, logger } = createCommandContext(programOptions);
      const paths = resolveLedgerPaths(options, config, cwd);
      logger.debug(paths, 'Validating ledgers');

      const issues = validateLedgers(paths);
      logger.info({ issues: issues.length }, 'Validation finished');

      if (options.json) {
        console.log(JSON.stringify({ ok: issues.length === 0, issues }, null, 2));
      } else if (issues.length > 0) {
        console.error(formatValidationReport(issues));
      } else {
        console.log('Validation passed.');
      }

      if (issues.length > 0) {
        throw new ValidationFailedError(issues);
      }
    });
}
