import { existsSync } from 'node:fs';
import { cp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { stringify as stringifyYaml } from 'yaml';
import { HARDWARE_CATEGORIES, extractLogDate, toRecord, trimmedString } from '@scopeledger/ledger';
import type { Fleet, FleetInstrument, HardwareCategory, HardwareRow, LedgerEvent, YamlMapping } from '@scopeledger/ledger';
import type { MetricNames } from './metricNames';
import { DEFAULT_SITE_NAME } from './siteConfig';
import { createTemplateEngine } from './templates';

const HARDWARE_TITLES: Record<HardwareCategory, string> = {
  light_sources: 'Light sources',
  detectors: 'Detectors',
  objectives: 'Objectives',
  splitters: 'Beam splitters',
  filters: 'Filters'
};

const RECORD_LABELS: Record<string, string> = {
  qc_session: 'QC session',
  maintenance_event: 'Maintenance event'
};

export type RenderSiteOptions = {
  outputDir: string;
  metricNames: MetricNames;
  /** Copied to `<outputDir>/assets` when it exists. */
  assetsDir?: string;
  siteName?: string;
  templatesDir?: string;
  /** Remove `outputDir` before writing. Defaults to true. */
  clean?: boolean;
};

export type RenderSiteResult = {
  /** Written pages, relative to `outputDir`, in write order. */
  pages: string[];
  assetsCopied: boolean;
};

export type EvaluationResultRow = {
  metric_id: string;
  status: string;
  threshold: unknown;
  message: string;
};

export type EventPageContext = {
  label: string;
  record_type: string;
  date: string;
  actor: string;
  provider: string;
  reason: string;
  action: string;
  status_after: string;
  summary: string;
  overall_status: string;
  results: EvaluationResultRow[];
};

function firstText(payload: YamlMapping, fields: readonly string[]): string {
  for (const field of fields) {
    const value = trimmedString(payload[field]);
    if (value) {
      return value;
    }
  }
  return '';
}

function evaluationResults(evaluation: YamlMapping | null): EvaluationResultRow[] {
  if (!evaluation || !Array.isArray(evaluation.results)) {
    return [];
  }
  const rows: EvaluationResultRow[] = [];
  for (const entry of evaluation.results) {
    const result = toRecord(entry);
    if (!result || typeof result.metric_id !== 'string' || typeof result.status !== 'string') {
      continue;
    }
    rows.push({
      metric_id: result.metric_id,
      status: result.status,
      threshold: result.threshold ?? '',
      message: trimmedString(result.message)
    });
  }
  return rows;
}

export function eventPageContext(event: LedgerEvent): EventPageContext {
  const payload = event.data;
  const isQc = event.record_type === 'qc_session';
  const evaluation = isQc ? toRecord(payload.evaluation) : null;

  return {
    label: RECORD_LABELS[event.record_type] ?? 'Event',
    record_type: event.record_type,
    date: extractLogDate(payload),
    actor: firstText(payload, ['performed_by', 'service_provider', 'company']),
    provider: firstText(payload, ['company', 'service_provider']),
    reason: trimmedString(payload.reason),
    action: trimmedString(payload.action),
    status_after: trimmedString(payload.microscope_status_after),
    summary: trimmedString(payload.summary),
    overall_status: evaluation ? trimmedString(evaluation.overall_status) : '',
    results: evaluationResults(evaluation)
  };
}

export function hardwareSections(instrument: FleetInstrument): Array<{ title: string; rows: HardwareRow[] }> {
  return HARDWARE_CATEGORIES.filter((category) => instrument.hardware[category].length > 0).map((category) => ({
    title: HARDWARE_TITLES[category],
    rows: instrument.hardware[category]
  }));
}

async function rawYaml(event: LedgerEvent): Promise<string> {
  try {
    return (await readFile(event.source_path, 'utf8')).trimEnd();
  } catch {
    return stringifyYaml(event.data).trimEnd();
  }
}

/**
 * Writes the fleet overview, the health page, two pages per instrument and one page per
 * event below `outputDir`.
 */
export async function renderSite(fleet: Fleet, options: RenderSiteOptions): Promise<RenderSiteResult> {
  const outputDir = path.resolve(options.outputDir);
  if (options.clean ?? true) {
    await rm(outputDir, { recursive: true, force: true });
  }
  await mkdir(outputDir, { recursive: true });

  let assetsCopied = false;
  if (options.assetsDir && existsSync(options.assetsDir)) {
    await cp(options.assetsDir, path.join(outputDir, 'assets'), { recursive: true });
    assetsCopied = true;
  }

  const engine = createTemplateEngine({ metricNames: options.metricNames, templatesDir: options.templatesDir });
  const pages: string[] = [];
  const writePage = async (relativePath: string, template: string, context: Record<string, unknown>) => {
    const target = path.join(outputDir, ...relativePath.split('/'));
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, await engine.renderFile(template, context), 'utf8');
    pages.push(relativePath);
  };

  const metricNamesJson = JSON.stringify(options.metricNames);

  for (const instrument of fleet.instruments) {
    const chartContext = {
      has_charts: Object.keys(instrument.charts).length > 0,
      charts_json: JSON.stringify(instrument.charts),
      metric_names_json: metricNamesJson
    };

    await writePage(`instruments/${instrument.id}/index.md`, 'instrument', {
      instrument,
      hardware_sections: hardwareSections(instrument),
      ...chartContext
    });
    await writePage(`instruments/${instrument.id}/history.md`, 'history', { instrument, ...chartContext });

    for (const event of [...instrument.qc_events, ...instrument.maintenance_events]) {
      await writePage(`events/${instrument.id}/${event.stem}.md`, 'event', {
        instrument,
        event_id: event.stem,
        event: eventPageContext(event),
        raw_yaml: await rawYaml(event)
      });
    }
  }

  await writePage('index.md', 'index', {
    site_name: options.siteName ?? DEFAULT_SITE_NAME,
    instruments: fleet.instruments,
    modalities: fleet.modalities,
    stats: fleet.stats
  });
  await writePage('status.md', 'status', {
    attention: fleet.attention,
    load_errors: fleet.loadErrors
  });

  return { pages, assetsCopied };
}
