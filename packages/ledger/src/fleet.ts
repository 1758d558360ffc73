import { buildChartSeries, metricsList } from './charts';
import { loadEventLedger } from './events';
import { loadInstrumentRegistry } from './instruments';
import type { IdentityMode } from './instruments';
import { evaluateInstrumentStatus } from './status';
import type { StatusOptions } from './status';
import { extractLogDate } from './timestamps';
import type {
  ChartSeries,
  FleetStatus,
  Instrument,
  LedgerEvent,
  LoadError,
  MetricValue,
  StatusColor,
  ValidationIssue,
  YamlMapping
} from './types';
import { isNonEmptyString, toRecord, trimmedString } from './values';

export interface QcHistoryRow {
  event_id: string;
  date: string;
  reason: string;
  operator: string;
  overall_status: string;
}

export interface MaintenanceHistoryRow {
  event_id: string;
  date: string;
  reason: string;
  provider: string;
  status_after: string;
}

export interface FleetInstrument extends Instrument {
  status: FleetStatus;
  qc_events: LedgerEvent[];
  maintenance_events: LedgerEvent[];
  qc_history: QcHistoryRow[];
  maintenance_history: MaintenanceHistoryRow[];
  latest_metrics: MetricValue[];
  latest_qc_overall: string;
  charts: ChartSeries;
}

export interface FleetStats {
  total: number;
  green: number;
  yellow: number;
  red: number;
}

export interface Fleet {
  instruments: FleetInstrument[];
  stats: FleetStats;
  modalities: string[];
  /** Red and yellow instruments, red first. */
  attention: FleetInstrument[];
  loadErrors: LoadError[];
  /** Instruments left out of the registry by strict identity checks. */
  rejected: ValidationIssue[];
}

export interface BuildFleetOptions extends StatusOptions {
  instrumentsDir: string;
  qcDir: string;
  maintenanceDir: string;
  imagesDir?: string;
  identityMode?: IdentityMode;
}

function firstText(payload: YamlMapping, fields: readonly string[]): string {
  for (const field of fields) {
    if (isNonEmptyString(payload[field])) {
      return trimmedString(payload[field]);
    }
  }
  return '';
}

export function qcHistoryRow(event: LedgerEvent): QcHistoryRow {
  const evaluation = toRecord(event.data.evaluation);
  return {
    event_id: event.stem,
    date: extractLogDate(event.data),
    reason: trimmedString(event.data.reason),
    operator: trimmedString(event.data.performed_by),
    overall_status: evaluation ? trimmedString(evaluation.overall_status) : ''
  };
}

export function maintenanceHistoryRow(event: LedgerEvent): MaintenanceHistoryRow {
  return {
    event_id: event.stem,
    date: extractLogDate(event.data),
    reason: trimmedString(event.data.reason),
    provider: firstText(event.data, ['company', 'service_provider']),
    status_after: trimmedString(event.data.microscope_status_after)
  };
}

function compareNames(a: FleetInstrument, b: FleetInstrument): number {
  const left = a.display_name.toLowerCase();
  const right = b.display_name.toLowerCase();
  if (left !== right) {
    return left < right ? -1 : 1;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

const ATTENTION_ORDER: Record<StatusColor, number> = { red: 0, yellow: 1, green: 2 };

export function assembleFleetInstrument(
  instrument: Instrument,
  qcEvents: LedgerEvent[],
  maintenanceEvents: LedgerEvent[],
  options: StatusOptions = {}
): FleetInstrument {
  const latestQc = qcEvents.at(-1);
  const latestMaintenance = maintenanceEvents.at(-1);
  const evaluation = toRecord(latestQc?.data.evaluation);

  return {
    ...instrument,
    status: evaluateInstrumentStatus(latestQc, latestMaintenance, options),
    qc_events: qcEvents,
    maintenance_events: maintenanceEvents,
    qc_history: qcEvents.map(qcHistoryRow),
    maintenance_history: maintenanceEvents.map(maintenanceHistoryRow),
    latest_metrics: latestQc ? metricsList(latestQc.data.metrics_computed) : [],
    latest_qc_overall: evaluation ? trimmedString(evaluation.overall_status) : '',
    charts: buildChartSeries(qcEvents)
  };
}

export function summarizeFleet(instruments: readonly FleetInstrument[]): FleetStats {
  const stats: FleetStats = { total: instruments.length, green: 0, yellow: 0, red: 0 };
  for (const instrument of instruments) {
    stats[instrument.status.color] += 1;
  }
  return stats;
}

/**
 * Loads the registry and both event ledgers, then derives status, history, charts and
 * fleet counts for every instrument.
 */
export function buildFleet(options: BuildFleetOptions): Fleet {
  const registry = loadInstrumentRegistry(options.instrumentsDir, {
    imagesDir: options.imagesDir,
    identityMode: options.identityMode
  });
  const qcLedger = loadEventLedger(options.qcDir);
  const maintenanceLedger = loadEventLedger(options.maintenanceDir);

  const instruments = registry.instruments
    .map((instrument) =>
      assembleFleetInstrument(
        instrument,
        qcLedger.byInstrument.get(instrument.id) ?? [],
        maintenanceLedger.byInstrument.get(instrument.id) ?? [],
        options
      )
    )
    .sort(compareNames);

  const modalities = [...new Set(instruments.flatMap((instrument) => instrument.modalities))].sort((a, b) => {
    const left = a.toLowerCase();
    const right = b.toLowerCase();
    if (left === right) {
      return a < b ? -1 : a > b ? 1 : 0;
    }
    return left < right ? -1 : 1;
  });

  const attention = instruments
    .filter((instrument) => instrument.status.color !== 'green')
    .sort((a, b) => ATTENTION_ORDER[a.status.color] - ATTENTION_ORDER[b.status.color] || compareNames(a, b));

  return {
    instruments,
    stats: summarizeFleet(instruments),
    modalities,
    attention,
    loadErrors: [...registry.errors, ...qcLedger.errors, ...maintenanceLedger.errors],
    rejected: registry.rejected
  };
}
