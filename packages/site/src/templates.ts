import path from 'node:path';
import { Liquid } from 'liquidjs';
import { metricDisplayName } from './metricNames';
import type { MetricNames } from './metricNames';

export const TEMPLATES_DIR = path.resolve(__dirname, '..', 'templates');

function scalarText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

/** Makes a value safe inside a Markdown table cell. */
export function tableCell(value: unknown): string {
  return scalarText(value).replace(/\r?\n/g, ' ').replace(/\|/g, '\\|').trim();
}

const ATTRIBUTE_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function htmlAttribute(value: unknown): string {
  return scalarText(value).replace(/[&<>"']/g, (char) => ATTRIBUTE_ESCAPES[char] ?? char);
}

/** `key: value` pairs of a hardware row, in source order. */
export function hardwareSummary(row: unknown): string {
  if (!row || typeof row !== 'object' || Array.isArray(row)) {
    return '';
  }
  return Object.entries(row)
    .map(([key, value]) => `${key.replace(/_/g, ' ')}: ${scalarText(value)}`)
    .join(', ');
}

export type TemplateEngineOptions = {
  metricNames: MetricNames;
  templatesDir?: string;
};

export function createTemplateEngine(options: TemplateEngineOptions): Liquid {
  const engine = new Liquid({
    root: options.templatesDir ?? TEMPLATES_DIR,
    extname: '.liquid',
    cache: false,
    strictFilters: true,
    strictVariables: false
  });
  engine.registerFilter('attr', (value: unknown) => htmlAttribute(value));
  engine.registerFilter('cell', (value: unknown) => tableCell(value));
  engine.registerFilter('hardware_summary', (value: unknown) => hardwareSummary(value));
  engine.registerFilter('metric_name', (value: unknown) => metricDisplayName(options.metricNames, scalarText(value)));
  return engine;
}
