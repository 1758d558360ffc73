export * from './types';
export * from './errors';
export { scanYamlFiles, hasPathSegment } from './scanner';
export { loadYamlMapping, parseYamlMapping } from './yaml';
export type { YamlLoadResult } from './yaml';
export {
  MIN_TIMESTAMP,
  TIMESTAMP_FIELDS,
  extractLogDate,
  formatDate,
  parseIsoTimestamp,
  resolveEventTimestamp,
  timestampFromFilename
} from './timestamps';
export { isMapping, isNonEmptyString, toPosix, toRecord, trimmedString } from './values';
export { FALLBACK_SLUG, isValidInstrumentId, slugify } from './slug';
export { notesField, parseCompactNotes } from './notes';
export {
  HARDWARE_CATEGORIES,
  IMAGE_EXTENSIONS,
  LOCATION_SEPARATOR,
  PLACEHOLDER_IMAGE,
  RETIRED_SEGMENT,
  checkInstrumentIdentity,
  findImageFilename,
  formatContacts,
  formatLocation,
  loadInstrumentRegistry,
  normalizeHardware,
  normalizeInstrument,
  normalizeSoftware
} from './instruments';
export type {
  IdentityMode,
  IdentityResult,
  InstrumentRegistry,
  NormalizeInstrumentOptions,
  NormalizeInstrumentResult
} from './instruments';
export { compareEvents, eventInstrumentId, loadEventLedger, loadInstrumentEvents } from './events';
export type { EventLedger, LoadEventsOptions } from './events';
export {
  DEFAULT_QC_OVERDUE_DAYS,
  STATUS_BADGES,
  evaluateInstrumentStatus,
  maintenanceStatusAfter,
  qcOverallStatus
} from './status';
export type { StatusOptions } from './status';
export { buildChartSeries, metricsList } from './charts';
export {
  ALLOWED_MAINTENANCE_STATUSES,
  DEFAULT_ALLOWED_RECORD_TYPES,
  deriveEventYear,
  eventOutputPath,
  formatValidationReport,
  validateEventLedgers,
  validateInstrumentLedgers,
  validateLedgers
} from './validator';
export type {
  EventValidationOptions,
  InstrumentValidationOptions,
  InstrumentValidationResult,
  LedgerValidationOptions
} from './validator';
export {
  assembleFleetInstrument,
  buildFleet,
  maintenanceHistoryRow,
  qcHistoryRow,
  summarizeFleet
} from './fleet';
export type {
  BuildFleetOptions,
  Fleet,
  FleetInstrument,
  FleetStats,
  MaintenanceHistoryRow,
  QcHistoryRow
} from './fleet';
