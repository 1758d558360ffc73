import { formatDate } from './timestamps';
import type { ChartSeries, LedgerEvent, MetricValue } from './types';
import { isNonEmptyString, isNumeric, toRecord } from './values';

export function metricsList(metricsComputed: unknown): MetricValue[] {
  if (!Array.isArray(metricsComputed)) {
    return [];
  }
  const metrics: MetricValue[] = [];
  for (const entry of metricsComputed) {
    const record = toRecord(entry);
    if (!record || !isNonEmptyString(record.metric_id)) {
      continue;
    }
    metrics.push({
      metric_id: record.metric_id,
      value: record.value,
      unit: typeof record.unit === 'string' ? record.unit : '',
      details: typeof record.details === 'string' ? record.details : ''
    });
  }
  return metrics;
}

/**
 * Pivots time-ordered QC sessions into one label/value series per metric id. Every
 * series spans every session; a session without a numeric value contributes null.
 * Metrics that never carry a number are left out.
 */
export function buildChartSeries(qcEvents: readonly LedgerEvent[]): ChartSeries {
  const metricIds = new Set<string>();
  const points = qcEvents.map((event) => {
    const values = new Map<string, unknown>();
    for (const metric of metricsList(event.data.metrics_computed)) {
      metricIds.add(metric.metric_id);
      values.set(metric.metric_id, metric.value);
    }
    const label = event.timestamp.source === 'sentinel' ? '' : formatDate(event.timestamp.value);
    return { label, values };
  });

  const charts: ChartSeries = {};
  for (const metricId of [...metricIds].sort()) {
    const values = points.map((point) => {
      const value = point.values.get(metricId);
      return isNumeric(value) ? value : null;
    });
    if (values.some((value) => value !== null)) {
      charts[metricId] = { labels: points.map((point) => point.label), values };
    }
  }
  return charts;
}
