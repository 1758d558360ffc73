import assert from 'node:assert/strict';
import path from 'node:path';
import test from 'node:test';
import { InvalidArgumentError } from 'commander';
import { EnvConfigError } from '@scopeledger/shared';
import { parseNonNegativeInteger } from '../src/commands/build';
import { loadLedgerEnvConfig, resolveLedgerPaths } from '../src/lib/config';

test('environment defaults describe the standard ledger layout', () => {
  assert.deepEqual(loadLedgerEnvConfig({}), {
    root: undefined,
    instrumentsDir: 'instruments',
    qcDir: 'qc/sessions',
    maintenanceDir: 'maintenance/events',
    assetsDir: 'assets',
    outputDir: 'dashboard_docs',
    strict: false,
    qcOverdueDays: 120,
    siteName: undefined,
    siteUrl: undefined,
    logLevel: 'info'
  });
});

test('environment values are parsed and normalized', () => {
  const config = loadLedgerEnvConfig({
    SCOPELEDGER_STRICT: 'on',
    SCOPELEDGER_QC_OVERDUE_DAYS: '0',
    SCOPELEDGER_LOG_LEVEL: ' WARN ',
    SCOPELEDGER_SITE_NAME: ' Core Facility '
  });
  assert.equal(config.strict, true);
  assert.equal(config.qcOverdueDays, 0);
  assert.equal(config.logLevel, 'warn');
  assert.equal(config.siteName, 'Core Facility');
});

test('unknown log levels and negative windows are rejected together', () => {
  assert.throws(
    () => loadLedgerEnvConfig({ SCOPELEDGER_LOG_LEVEL: 'verbose', SCOPELEDGER_QC_OVERDUE_DAYS: '-1' }),
    (error: unknown) => {
      assert(error instanceof EnvConfigError);
      const lines = error.message.split('\n');
      assert.equal(lines[0], '[scopeledger] Invalid environment configuration');
      assert.equal(lines[1], '  • SCOPELEDGER_QC_OVERDUE_DAYS: SCOPELEDGER_QC_OVERDUE_DAYS must be >= 0');
      assert.ok(lines[2]?.startsWith('  • SCOPELEDGER_LOG_LEVEL: '));
      return true;
    }
  );
});

test('resolveLedgerPaths prefers options and resolves against the root', () => {
  const config = loadLedgerEnvConfig({ SCOPELEDGER_ROOT: 'ledger', SCOPELEDGER_QC_DIR: 'qc' });
  const cwd = path.resolve('/work');

  assert.deepEqual(resolveLedgerPaths({}, config, cwd), {
    root: path.resolve('/work/ledger'),
    instrumentsDir: path.resolve('/work/ledger/instruments'),
    qcDir: path.resolve('/work/ledger/qc'),
    maintenanceDir: path.resolve('/work/ledger/maintenance/events')
  });

  const overridden = resolveLedgerPaths({ root: '/data', qcDir: '/elsewhere/qc' }, config, cwd);
  assert.equal(overridden.root, path.resolve('/data'));
  assert.equal(overridden.qcDir, path.resolve('/elsewhere/qc'));
  assert.equal(overridden.instrumentsDir, path.resolve('/data/instruments'));
});

test('parseNonNegativeInteger accepts whole days only', () => {
  assert.equal(parseNonNegativeInteger('0'), 0);
  assert.equal(parseNonNegativeInteger('45'), 45);
  assert.throws(() => parseNonNegativeInteger('-2'), InvalidArgumentError);
  assert.throws(() => parseNonNegativeInteger('1.5'), InvalidArgumentError);
  assert.throws(() => parseNonNegativeInteger('soon'), InvalidArgumentError);
});
