import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { MetricNamesError } from './errors';

export const DEFAULT_METRIC_NAMES_PATH = path.resolve(__dirname, '..', 'data', 'metric-names.json');

const metricNamesSchema = z.record(z.string().min(1), z.string());

export type MetricNames = Record<string, string>;

function readMetricNames(filePath: string): MetricNames {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MetricNamesError(`Failed to read metric names from ${filePath}: ${reason}`);
  }
  const parsed = metricNamesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MetricNamesError(`Metric names in ${filePath} must map metric ids to display names`);
  }
  return parsed.data;
}

/** Bundled display names, with entries from `overridePath` taking precedence. */
export function loadMetricNames(overridePath?: string): MetricNames {
  const names = readMetricNames(DEFAULT_METRIC_NAMES_PATH);
  if (!overridePath) {
    return names;
  }
  return { ...names, ...readMetricNames(overridePath) };
}

export function metricDisplayName(names: MetricNames, metricId: string): string {
  return Object.prototype.hasOwnProperty.call(names, metricId) ? names[metricId] : metricId;
}
