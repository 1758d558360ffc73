import path from 'node:path';
import { checkInstrumentIdentity, RETIRED_SEGMENT } from './instruments';
import { hasPathSegment, scanYamlFiles } from './scanner';
import { maintenanceStatusSchema, recordTypeSchema } from './types';
import type { RecordType, ValidationIssue, YamlMapping } from './types';
import { isNonEmptyString, toPosix } from './values';
import { loadYamlMapping } from './yaml';

export const DEFAULT_ALLOWED_RECORD_TYPES: readonly string[] = recordTypeSchema.options;
export const ALLOWED_MAINTENANCE_STATUSES: readonly string[] = maintenanceStatusSchema.options;

const REQUIRED_MAINTENANCE_FIELDS = ['started_utc', 'service_provider', 'reason_details', 'action'] as const;
const MAINTENANCE_STATUS_FIELDS = ['microscope_status_before', 'microscope_status_after'] as const;

const YEAR_PATTERN = /^\d{4}$/;
const ISO_YEAR_PATTERN = /^(\d{4})-/;
const FILENAME_DATE_PATTERN = /^(\d{4})-\d{2}-\d{2}(?:_|$)/;

interface PathDisplayOptions {
  /** Issue paths are reported relative to this directory when given. */
  root?: string;
}

export interface InstrumentValidationOptions extends PathDisplayOptions {
  instrumentsDir: string;
}

export interface InstrumentValidationResult {
  instrumentIds: Set<string>;
  issues: ValidationIssue[];
}

export interface EventValidationOptions extends PathDisplayOptions {
  instrumentIds: ReadonlySet<string>;
  qcDir: string;
  maintenanceDir: string;
  allowedRecordTypes?: readonly string[];
}

export type LedgerValidationOptions = Omit<InstrumentValidationOptions & EventValidationOptions, 'instrumentIds'>;

function displayPath(filePath: string, root: string | undefined): string {
  return toPosix(root ? path.relative(root, filePath) : filePath);
}

function compareKeys(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function sortedEntries(map: Map<string, string[]>): Array<[string, string[]]> {
  return [...map.entries()].sort(([a], [b]) => compareKeys(a, b));
}

function addSource(map: Map<string, string[]>, key: string, source: string): void {
  const sources = map.get(key);
  if (sources) {
    sources.push(source);
  } else {
    map.set(key, [source]);
  }
}

/** Registry checks: parse errors, identity, and ids claimed by more than one file. */
export function validateInstrumentLedgers(options: InstrumentValidationOptions): InstrumentValidationResult {
  const issues: ValidationIssue[] = [];
  const instrumentIds = new Set<string>();
  const idSources = new Map<string, string[]>();

  for (const filePath of scanYamlFiles(options.instrumentsDir)) {
    if (hasPathSegment(path.relative(options.instrumentsDir, filePath), RETIRED_SEGMENT)) {
      continue;
    }
    const shownPath = displayPath(filePath, options.root);
    const loaded = loadYamlMapping(filePath);
    if (!loaded.ok) {
      issues.push({ ...loaded.error, path: shownPath });
      continue;
    }

    const identity = checkInstrumentIdentity(loaded.data, shownPath);
    if (!identity.ok) {
      issues.push(identity.issue);
      continue;
    }

    instrumentIds.add(identity.id);
    addSource(idSources, identity.id, shownPath);
  }

  for (const [instrumentId, sources] of sortedEntries(idSources)) {
    if (sources.length <= 1) {
      continue;
    }
    issues.push({
      code: 'duplicate_instrument_id',
      path: instrumentId,
      message: `Duplicate instrument.instrument_id '${instrumentId}' defined in: ${[...sources].sort(compareKeys).join(', ')}.`
    });
  }

  return { instrumentIds, issues };
}

/** The event year from `started_utc`, else from a `YYYY-MM-DD` filename prefix. */
export function deriveEventYear(payload: YamlMapping, filePath: string): string | null {
  const started = payload.started_utc;
  if (typeof started === 'string') {
    const match = ISO_YEAR_PATTERN.exec(started.trim());
    if (match) {
      return match[1];
    }
  }
  const stem = path.basename(filePath, path.extname(filePath));
  const filenameMatch = FILENAME_DATE_PATTERN.exec(stem);
  return filenameMatch ? filenameMatch[1] : null;
}

function checkPathAgreement(
  payload: YamlMapping,
  microscope: string,
  relParts: string[],
  context: { filePath: string; shownPath: string; baseLabel: string },
  issues: ValidationIssue[]
): void {
  const { filePath, shownPath, baseLabel } = context;
  if (relParts.length < 3) {
    issues.push({
      code: 'invalid_event_path_structure',
      path: shownPath,
      message: `Expected event path under '${baseLabel}' to follow '<microscope>/<YYYY>/<file>.yaml'.`
    });
    return;
  }

  const [pathMicroscope, pathYear] = relParts;
  if (microscope !== pathMicroscope) {
    issues.push({
      code: 'microscope_mismatch_with_path',
      path: shownPath,
      message: `Path microscope '${pathMicroscope}' does not match payload microscope '${microscope}'.`
    });
  }

  if (!YEAR_PATTERN.test(pathYear)) {
    issues.push({
      code: 'invalid_event_year_folder',
      path: shownPath,
      message: `Invalid year folder '${pathYear}'. Expected a 4-digit year like '2026'.`
    });
    return;
  }

  const eventYear = deriveEventYear(payload, filePath);
  if (eventYear === null) {
    issues.push({
      code: 'missing_event_year_source',
      path: shownPath,
      message: 'Could not derive event year from payload.started_utc or filename date prefix (YYYY-MM-DD_...).'
    });
  } else if (eventYear !== pathYear) {
    issues.push({
      code: 'year_mismatch_with_path',
      path: shownPath,
      message: `Path year '${pathYear}' does not match derived event year '${eventYear}' from started_utc/filename.`
    });
  }
}

function checkRecordType(
  payload: YamlMapping,
  expectedType: RecordType,
  allowedTypes: ReadonlySet<string>,
  context: { shownPath: string; baseLabel: string },
  issues: ValidationIssue[]
): void {
  const recordType = payload.record_type;
  if (!isNonEmptyString(recordType)) {
    issues.push({
      code: 'missing_record_type',
      path: context.shownPath,
      message: "Missing required 'record_type' field."
    });
  } else if (!allowedTypes.has(recordType)) {
    issues.push({
      code: 'invalid_record_type',
      path: context.shownPath,
      message: `Invalid record_type '${recordType}'. Allowed values: ${[...allowedTypes].sort(compareKeys).join(', ')}.`
    });
  } else if (recordType !== expectedType) {
    issues.push({
      code: 'unexpected_record_type_for_location',
      path: context.shownPath,
      message: `record_type '${recordType}' does not match expected value '${expectedType}' for files under '${context.baseLabel}'.`
    });
  }
}

function checkMaintenanceFields(payload: YamlMapping, shownPath: string, issues: ValidationIssue[]): void {
  for (const field of REQUIRED_MAINTENANCE_FIELDS) {
    if (isNonEmptyString(payload[field])) {
      continue;
    }
    issues.push({
      code: 'missing_maintenance_field',
      path: shownPath,
      message: `Missing required maintenance field '${field}' (must be a non-empty string).`
    });
  }

  const hasMaintenanceId = isNonEmptyString(payload.maintenance_id);
  const hasEventId = isNonEmptyString(payload.event_id);
  if (hasMaintenanceId === hasEventId) {
    issues.push({
      code: 'invalid_maintenance_id_shape',
      path: shownPath,
      message: "Maintenance events must include exactly one ID field: either 'maintenance_id' or 'event_id'."
    });
  }

  const allowed = ALLOWED_MAINTENANCE_STATUSES.join(', ');
  for (const field of MAINTENANCE_STATUS_FIELDS) {
    const raw = payload[field];
    if (raw === undefined || raw === null) {
      continue;
    }
    if (!isNonEmptyString(raw)) {
      issues.push({
        code: 'invalid_maintenance_status',
        path: shownPath,
        message: `Invalid ${field}: expected one of ${allowed}.`
      });
      continue;
    }
    if (!maintenanceStatusSchema.safeParse(raw.trim()).success) {
      issues.push({
        code: 'invalid_maintenance_status',
        path: shownPath,
        message: `Invalid ${field} '${raw}'. Use normalized lowercase values from: ${allowed}.`
      });
    }
  }
}

/**
 * Event checks over the QC and maintenance trees. Every file is checked fully; one
 * problem never hides another.
 */
export function validateEventLedgers(options: EventValidationOptions): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const outputSources = new Map<string, string[]>();
  const allowedTypes = new Set(
    (options.allowedRecordTypes ?? DEFAULT_ALLOWED_RECORD_TYPES).map((value) => value.trim()).filter(Boolean)
  );
  const knownIds = [...options.instrumentIds].sort(compareKeys).join(', ');

  const sources: Array<[string, RecordType]> = [
    [options.qcDir, 'qc_session'],
    [options.maintenanceDir, 'maintenance_event']
  ];

  for (const [baseDir, expectedType] of sources) {
    const baseLabel = displayPath(baseDir, options.root);
    for (const filePath of scanYamlFiles(baseDir)) {
      const shownPath = displayPath(filePath, options.root);
      const relParts = path.relative(baseDir, filePath).split(/[\\/]+/).filter(Boolean);

      const loaded = loadYamlMapping(filePath);
      if (!loaded.ok) {
        issues.push({ ...loaded.error, path: shownPath });
        continue;
      }
      const payload = loaded.data;

      const microscope = payload.microscope;
      if (!isNonEmptyString(microscope)) {
        issues.push({
          code: 'missing_microscope',
          path: shownPath,
          message: "Missing required 'microscope' field."
        });
        continue;
      }

      if (!options.instrumentIds.has(microscope)) {
        issues.push({
          code: 'unknown_microscope',
          path: shownPath,
          message: `Unknown microscope '${microscope}'. Expected one of instrument IDs in registry: ${knownIds}.`
        });
      }

      checkPathAgreement(payload, microscope, relParts, { filePath, shownPath, baseLabel }, issues);
      checkRecordType(payload, expectedType, allowedTypes, { shownPath, baseLabel }, issues);

      if (payload.record_type === 'maintenance_event') {
        checkMaintenanceFields(payload, shownPath, issues);
      }

      addSource(outputSources, eventOutputPath(microscope, filePath), shownPath);
    }
  }

  for (const [outputPath, files] of sortedEntries(outputSources)) {
    if (files.length <= 1) {
      continue;
    }
    issues.push({
      code: 'duplicate_event_output_path',
      path: outputPath,
      message: `Duplicate generated event path '${outputPath}' from: ${[...files].sort(compareKeys).join(', ')}.`
    });
  }

  return issues;
}

/** Where the site renders an event page, relative to the docs root. */
export function eventOutputPath(microscope: string, filePath: string): string {
  const stem = path.basename(filePath, path.extname(filePath));
  return `events/${microscope}/${stem}.md`;
}

export function validateLedgers(options: LedgerValidationOptions): ValidationIssue[] {
  const registry = validateInstrumentLedgers(options);
  const eventIssues = validateEventLedgers({ ...options, instrumentIds: registry.instrumentIds });
  return [...registry.issues, ...eventIssues];
}

/** The numbered plain-text report; empty when there is nothing to report. */
export function formatValidationReport(issues: readonly ValidationIssue[]): string {
  if (issues.length === 0) {
    return '';
  }
  const lines = ['Validation failures detected:'];
  issues.forEach((issue, index) => {
    lines.push(`  ${index + 1}. [${issue.code}] ${issue.path}`);
    lines.push(`     ${issue.message}`);
  });
  lines.push('', `Total validation failures: ${issues.length}`);
  return lines.join('\n');
}
