import path from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS, booleanVar, integerVar, loadEnvConfig, stringVar } from '@scopeledger/shared';
import type { EnvSource, LogLevel } from '@scopeledger/shared';
import { DEFAULT_QC_OVERDUE_DAYS } from '@scopeledger/ledger';

export type LedgerEnvConfig = {
  root?: string;
  instrumentsDir: string;
  qcDir: string;
  maintenanceDir: string;
  assetsDir: string;
  outputDir: string;
  strict: boolean;
  qcOverdueDays: number;
  siteName?: string;
  siteUrl?: string;
  logLevel: LogLevel;
};

const ledgerEnvSchema = z
  .object({
    SCOPELEDGER_ROOT: stringVar(),
    SCOPELEDGER_INSTRUMENTS_DIR: stringVar({ defaultValue: 'instruments' }),
    SCOPELEDGER_QC_DIR: stringVar({ defaultValue: 'qc/sessions' }),
    SCOPELEDGER_MAINTENANCE_DIR: stringVar({ defaultValue: 'maintenance/events' }),
    SCOPELEDGER_ASSETS_DIR: stringVar({ defaultValue: 'assets' }),
    SCOPELEDGER_OUTPUT_DIR: stringVar({ defaultValue: 'dashboard_docs' }),
    SCOPELEDGER_STRICT: booleanVar({ defaultValue: false }),
    SCOPELEDGER_QC_OVERDUE_DAYS: integerVar({ defaultValue: DEFAULT_QC_OVERDUE_DAYS, min: 0 }),
    SCOPELEDGER_SITE_NAME: stringVar(),
    SCOPELEDGER_SITE_URL: stringVar(),
    SCOPELEDGER_LOG_LEVEL: z
      .string()
      .optional()
      .transform((value) => (value?.trim() || 'info').toLowerCase())
      .pipe(z.enum(LOG_LEVELS))
  })
  .transform(
    (env): LedgerEnvConfig => ({
      root: env.SCOPELEDGER_ROOT,
      instrumentsDir: env.SCOPELEDGER_INSTRUMENTS_DIR ?? 'instruments',
      qcDir: env.SCOPELEDGER_QC_DIR ?? 'qc/sessions',
      maintenanceDir: env.SCOPELEDGER_MAINTENANCE_DIR ?? 'maintenance/events',
      assetsDir: env.SCOPELEDGER_ASSETS_DIR ?? 'assets',
      outputDir: env.SCOPELEDGER_OUTPUT_DIR ?? 'dashboard_docs',
      strict: env.SCOPELEDGER_STRICT ?? false,
      qcOverdueDays: env.SCOPELEDGER_QC_OVERDUE_DAYS ?? DEFAULT_QC_OVERDUE_DAYS,
      siteName: env.SCOPELEDGER_SITE_NAME,
      siteUrl: env.SCOPELEDGER_SITE_URL,
      logLevel: env.SCOPELEDGER_LOG_LEVEL
    })
  );

export function loadLedgerEnvConfig(env?: EnvSource): LedgerEnvConfig {
  return loadEnvConfig(ledgerEnvSchema, { env, context: 'scopeledger' });
}

export type LedgerPathOptions = {
  root?: string;
  instrumentsDir?: string;
  qcDir?: string;
  maintenanceDir?: string;
};

export type LedgerPaths = {
  root: string;
  instrumentsDir: string;
  qcDir: string;
  maintenanceDir: string;
};

/** Options win over environment values; relative directories resolve against the root. */
export function resolveLedgerPaths(options: LedgerPathOptions, config: LedgerEnvConfig, cwd: string): LedgerPaths {
  const root = path.resolve(cwd, options.root ?? config.root ?? '.');
  return {
    root,
    instrumentsDir: path.resolve(root, options.instrumentsDir ?? config.instrumentsDir),
    qcDir: path.resolve(root, options.qcDir ?? config.qcDir),
    maintenanceDir: path.resolve(root, options.maintenanceDir ?? config.maintenanceDir)
  };
}
