import { z } from 'zod';

export const instrumentIdSchema = z
  .string()
  .regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, 'Instrument id must be a lowercase slug (letters, digits, single hyphens)');

export const recordTypeSchema = z.enum(['qc_session', 'maintenance_event']);
export type RecordType = z.infer<typeof recordTypeSchema>;

export const maintenanceStatusSchema = z.enum(['in_service', 'limited', 'out_of_service']);
export type MaintenanceStatus = z.infer<typeof maintenanceStatusSchema>;

export const qcOverallStatusSchema = z.enum(['ok', 'warn', 'fail']);
export type QcOverallStatus = z.infer<typeof qcOverallStatusSchema>;

export type YamlMapping = Record<string, unknown>;

/** A load error or validation issue; both are reported, never thrown. */
export interface LedgerProblem {
  code: string;
  path: string;
  message: string;
}

export interface LoadError extends LedgerProblem {
  code: 'yaml_parse_error';
}

export type ValidationIssue = LedgerProblem;

export type TimestampSource = 'payload' | 'filename' | 'sentinel';

export interface ResolvedTimestamp {
  value: Date;
  /** ISO-8601 in UTC, empty for the sentinel. */
  iso: string;
  source: TimestampSource;
  field?: string;
}

export interface SoftwareEntry {
  component: string;
  name: string;
  version: string;
  url: string;
}

export type HardwareCategory = 'light_sources' | 'detectors' | 'objectives' | 'splitters' | 'filters';

export type HardwareRow = Record<string, string>;

export type Hardware = Record<HardwareCategory, HardwareRow[]>;

export type NotesFields = Record<string, string | string[]>;

export interface Instrument {
  id: string;
  display_name: string;
  manufacturer: string;
  model: string;
  stand_orientation: string;
  location: string;
  booking_url: string;
  notes: string;
  notes_fields: NotesFields;
  contacts: string[];
  modalities: string[];
  modules: string[];
  software: SoftwareEntry[];
  hardware: Hardware;
  image_filename: string;
  source_path: string;
}

export interface LedgerEvent {
  source_path: string;
  filename: string;
  stem: string;
  microscope: string;
  record_type: string;
  timestamp: ResolvedTimestamp;
  data: YamlMapping;
}

export type StatusColor = 'red' | 'yellow' | 'green';

export interface FleetStatus {
  color: StatusColor;
  badge: string;
  reason: string;
  last_qc_date: string;
  last_maint_date: string;
}

export interface MetricValue {
  metric_id: string;
  value: unknown;
  unit: string;
  details: string;
}

export interface ChartSeriesEntry {
  labels: string[];
  values: Array<number | null>;
}

export type ChartSeries = Record<string, ChartSeriesEntry>;
