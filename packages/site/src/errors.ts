import { LedgerError } from '@scopeledger/ledger';

export class MetricNamesError extends LedgerError {
  readonly code = 'METRIC_NAMES_INVALID';

  constructor(message: string) {
    super(message);
    this.name = 'MetricNamesError';
  }
}
