import type { LedgerProblem } from './types';

export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerError';
  }
}

export class StrictModeError extends LedgerError {
  readonly code = 'LEDGER_STRICT_FAILURE';
  readonly problems: LedgerProblem[];

  constructor(problems: LedgerProblem[]) {
    super(`Strict mode: ${problems.length} ledger problem${problems.length === 1 ? '' : 's'} must be fixed before building`);
    this.name = 'StrictModeError';
    this.problems = problems;
  }
}

export class ValidationFailedError extends LedgerError {
  readonly code = 'LEDGER_VALIDATION_FAILED';
  readonly issues: LedgerProblem[];

  constructor(issues: LedgerProblem[]) {
    super(`Validation failed with ${issues.length} issue${issues.length === 1 ? '' : 's'}`);
    this.name = 'ValidationFailedError';
    this.issues = issues;
  }
}
