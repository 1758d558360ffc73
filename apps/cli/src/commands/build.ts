import path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import {
  LedgerError,
  StrictModeError,
  buildFleet,
  formatValidationReport,
  toPosix,
  validateLedgers
} from '@scopeledger/ledger';
import type { LedgerProblem } from '@scopeledger/ledger';
import { loadMetricNames, renderSite, writeSiteConfig } from '@scopeledger/site';
import { resolveLedgerPaths } from '../lib/config';
import type { LedgerPathOptions } from '../lib/config';
import { createCommandContext } from '../lib/context';
import type { ProgramOptions } from '../lib/context';
import { addLedgerPathOptions } from './validate';

type BuildOptions = LedgerPathOptions & {
  assetsDir?: string;
  output?: string;
  configFile?: string;
  strict?: boolean;
  qcOverdueDays?: number;
  siteName?: string;
  siteUrl?: string;
  metricNames?: string;
};

export function parseNonNegativeInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function containsPath(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return !relative.startsWith('..') && !path.isAbsolute(relative);
}

/** The output directory is wiped before rendering, so it must not hold any ledger input. */
export function assertSafeOutputDir(outputDir: string, inputs: Record<string, string>): void {
  for (const [label, dir] of Object.entries(inputs)) {
    if (containsPath(outputDir, dir)) {
      throw new LedgerError(`Refusing to write the site into ${outputDir}: it contains the ${label} (${dir}).`);
    }
  }
}

export function registerBuildCommand(program: Command, programOptions: ProgramOptions): void {
  addLedgerPathOptions(program.command('build').description('Validate the ledgers and render the dashboard site'))
    .option('--assets-dir <dir>', 'Static assets copied into the site')
    .option('--output <dir>', 'Directory the Markdown pages are written to')
    .option('--config-file <file>', 'Where mkdocs.yml is written (default: <root>/mkdocs.yml)')
    .option('--strict', 'Fail on any validation issue and reject instruments without a valid id')
    .option('--no-strict', 'Build permissively even when SCOPELEDGER_STRICT is set')
    .option(
      '--qc-overdue-days <days>',
      'Days after which a passing QC session counts as overdue (0 disables)',
      parseNonNegativeInteger
    )
    .option('--site-name <name>', 'Site title')
    .option('--site-url <url>', 'Public site URL')
    .option('--metric-names <file>', 'JSON file of metric display names merged over the bundled ones')
    .action(async (options: BuildOptions) => {
      const { config, cwd, now, logger } = createCommandContext(programOptions);
      const paths = resolveLedgerPaths(options, config, cwd);
      const strict = options.strict ?? config.strict;
      const outputDir = path.resolve(paths.root, options.output ?? config.outputDir);
      const assetsDir = path.resolve(paths.root, options.assetsDir ?? config.assetsDir);
      const configFile = path.resolve(paths.root, options.configFile ?? 'mkdocs.yml');
      const siteName = options.siteName ?? config.siteName;

      assertSafeOutputDir(outputDir, {
        'ledger root': paths.root,
        'instruments directory': paths.instrumentsDir,
        'QC directory': paths.qcDir,
        'maintenance directory': paths.maintenanceDir,
        'assets directory': assetsDir
      });

      const issues = validateLedgers(paths);
      if (issues.length > 0) {
        console.error(formatValidationReport(issues));
        logger.warn({ issues: issues.length, strict }, 'Ledger validation reported issues');
      }

      const fleet = buildFleet({
        ...paths,
        imagesDir: path.join(assetsDir, 'images'),
        identityMode: strict ? 'strict' : 'permissive',
        qcOverdueDays: options.qcOverdueDays ?? config.qcOverdueDays,
        now
      });
      logger.info(
        { instruments: fleet.stats.total, loadErrors: fleet.loadErrors.length, rejected: fleet.rejected.length },
        'Fleet assembled'
      );

      if (strict) {
        // validator issues already cover unreadable and rejected registry files
        const problems: LedgerProblem[] = issues.length > 0 ? issues : [...fleet.loadErrors, ...fleet.rejected];
        if (problems.length > 0) {
          throw new StrictModeError(problems);
        }
      }

      const metricNames = loadMetricNames(options.metricNames ? path.resolve(paths.root, options.metricNames) : undefined);
      const { pages, assetsCopied } = await renderSite(fleet, { outputDir, assetsDir, metricNames, siteName });
      await writeSiteConfig(configFile, {
        siteName,
        siteUrl: options.siteUrl ?? config.siteUrl,
        docsDir: toPosix(path.relative(path.dirname(configFile), outputDir)),
        instruments: fleet.instruments
      });
      logger.info({ pages: pages.length, assetsCopied, outputDir, configFile }, 'Site written');

      const shownOutput = toPosix(path.relative(cwd, outputDir)) || '.';
      console.log(`Wrote ${pages.length} pages for ${fleet.stats.total} instruments to ${shownOutput}`);
    });
}
