import { existsSync } from 'node:fs';
import path from 'node:path';
import { parseCompactNotes, notesField } from './notes';
import { hasPathSegment, scanYamlFiles } from './scanner';
import { isValidInstrumentId, slugify } from './slug';
import type {
  Hardware,
  HardwareCategory,
  HardwareRow,
  Instrument,
  LoadError,
  SoftwareEntry,
  ValidationIssue,
  YamlMapping
} from './types';
import { isNonEmptyString, stringList, toPosix, toRecord, trimmedString } from './values';
import { loadYamlMapping } from './yaml';

export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.webp', '.svg'] as const;
export const PLACEHOLDER_IMAGE = 'placeholder.svg';
export const LOCATION_SEPARATOR = ' · ';
export const RETIRED_SEGMENT = 'retired';

/**
 * `strict` rejects an instrument whose id is missing or not a slug; `permissive`
 * synthesizes `scope-<slug of display name>` instead.
 */
export type IdentityMode = 'strict' | 'permissive';

export const HARDWARE_CATEGORIES: readonly HardwareCategory[] = [
  'light_sources',
  'detectors',
  'objectives',
  'splitters',
  'filters'
];

const HARDWARE_ALIASES: Record<HardwareCategory, readonly string[]> = {
  light_sources: ['light_sources', 'lasers'],
  detectors: ['detectors', 'cameras'],
  objectives: ['objectives'],
  splitters: ['splitters', 'beam_splitters'],
  filters: ['filters']
};

export type IdentityResult =
  | { ok: true; id: string }
  | { ok: false; issue: ValidationIssue };

/** Checks `instrument.instrument_id`; shared by the normalizer and the validator. */
export function checkInstrumentIdentity(payload: YamlMapping, sourcePath: string): IdentityResult {
  const section = toRecord(payload.instrument);
  if (!section) {
    return {
      ok: false,
      issue: {
        code: 'missing_instrument_section',
        path: sourcePath,
        message: "Missing required top-level mapping key 'instrument'."
      }
    };
  }

  const rawId = section.instrument_id;
  if (!isNonEmptyString(rawId)) {
    return {
      ok: false,
      issue: {
        code: 'missing_instrument_id',
        path: sourcePath,
        message: 'Missing required instrument.instrument_id (must be a non-empty string).'
      }
    };
  }

  const id = rawId.trim();
  if (!isValidInstrumentId(id)) {
    return {
      ok: false,
      issue: {
        code: 'invalid_instrument_id',
        path: sourcePath,
        message:
          'Invalid instrument.instrument_id; expected URL-safe slug (lowercase letters, numbers, and single hyphens only).'
      }
    };
  }

  return { ok: true, id };
}

export function formatLocation(raw: unknown): string {
  if (isNonEmptyString(raw)) {
    return raw.trim();
  }
  const record = toRecord(raw);
  if (!record) {
    return '';
  }
  return ['site', 'building', 'room']
    .map((key) => trimmedString(record[key]))
    .filter(Boolean)
    .join(LOCATION_SEPARATOR);
}

function locationFromNotes(notes: string, fields: Record<string, string | string[]>): string {
  const declared = notesField(fields, 'location') || notesField(fields, 'room');
  if (declared) {
    return declared;
  }
  const labelled = /\blocation\s*[:=]\s*([^|,;\n]+)/i.exec(notes);
  if (labelled) {
    return labelled[1].trim();
  }
  const room = /\b(room\s+[^|,;\n]+)/i.exec(notes);
  return room ? room[1].trim() : '';
}

function formatContact(entry: unknown): string | null {
  if (isNonEmptyString(entry)) {
    return entry.trim();
  }
  const record = toRecord(entry);
  if (!record) {
    return null;
  }
  const name = trimmedString(record.name);
  const email = trimmedString(record.email);
  const role = trimmedString(record.role);
  if (!name && !email) {
    return null;
  }

  let label = name && email ? `${name} <${email}>` : name || email;
  if (role) {
    label = `${label} (${role})`;
  }
  return label;
}

export function formatContacts(raw: unknown): string[] {
  const entries = Array.isArray(raw) ? raw : toRecord(raw) ? [raw] : [];
  const contacts: string[] = [];
  for (const entry of entries) {
    const label = formatContact(entry);
    if (label) {
      contacts.push(label);
    }
  }
  return contacts;
}

function softwareEntry(component: string, entry: unknown): SoftwareEntry | null {
  if (isNonEmptyString(entry)) {
    return { component, name: entry.trim(), version: '', url: '' };
  }
  const record = toRecord(entry);
  if (!record || !isNonEmptyString(record.name)) {
    return null;
  }
  return {
    component,
    name: record.name.trim(),
    version: trimmedString(record.version),
    url: trimmedString(record.url)
  };
}

/**
 * Accepts `{ component: entry | entry[] }` or a flat list of entries that name their
 * own component.
 */
export function normalizeSoftware(raw: unknown): SoftwareEntry[] {
  const rows: SoftwareEntry[] = [];
  const push = (component: string, entry: unknown) => {
    const row = softwareEntry(component, entry);
    if (row) {
      rows.push(row);
    }
  };

  if (Array.isArray(raw)) {
    for (const item of raw) {
      const record = toRecord(item);
      if (!record) {
        continue;
      }
      const component = isNonEmptyString(record.component) ? record.component.trim() : 'software';
      push(component, record);
    }
    return rows;
  }

  const record = toRecord(raw);
  if (!record) {
    return rows;
  }
  for (const [component, entry] of Object.entries(record)) {
    if (Array.isArray(entry)) {
      for (const item of entry) {
        push(component, item);
      }
    } else {
      push(component, entry);
    }
  }
  return rows;
}

function scalarText(value: unknown): string | null {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

function hardwareRow(entry: unknown): HardwareRow | null {
  const record = toRecord(entry);
  if (!record) {
    return null;
  }
  const row: HardwareRow = {};
  for (const [key, value] of Object.entries(record)) {
    const scalar = scalarText(value);
    if (scalar !== null) {
      row[key] = scalar;
      continue;
    }
    if (Array.isArray(value)) {
      const parts = value.map(scalarText).filter((part): part is string => part !== null && part.length > 0);
      if (parts.length > 0) {
        row[key] = parts.join(', ');
      }
    }
  }
  return row;
}

export function emptyHardware(): Hardware {
  return { light_sources: [], detectors: [], objectives: [], splitters: [], filters: [] };
}

export function normalizeHardware(raw: unknown): Hardware {
  const hardware = emptyHardware();
  const record = toRecord(raw);
  if (!record) {
    return hardware;
  }

  for (const category of HARDWARE_CATEGORIES) {
    const key = HARDWARE_ALIASES[category].find((alias) => record[alias] !== undefined && record[alias] !== null);
    if (!key) {
      continue;
    }
    const value = record[key];
    const entries = Array.isArray(value) ? value : [value];
    for (const entry of entries) {
      const row = hardwareRow(entry);
      if (row) {
        hardware[category].push(row);
      }
    }
  }
  return hardware;
}

export function findImageFilename(imagesDir: string | undefined, instrumentId: string): string {
  if (!imagesDir) {
    return PLACEHOLDER_IMAGE;
  }
  for (const ext of IMAGE_EXTENSIONS) {
    const filename = `${instrumentId}${ext}`;
    if (existsSync(path.join(imagesDir, filename))) {
      return filename;
    }
  }
  return PLACEHOLDER_IMAGE;
}

export interface NormalizeInstrumentOptions {
  imagesDir?: string;
  identityMode?: IdentityMode;
}

export type NormalizeInstrumentResult =
  | { ok: true; instrument: Instrument }
  | { ok: false; issue: ValidationIssue };

export function normalizeInstrument(
  payload: YamlMapping,
  sourcePath: string,
  options: NormalizeInstrumentOptions = {}
): NormalizeInstrumentResult {
  const posixPath = toPosix(sourcePath);
  const identity = checkInstrumentIdentity(payload, posixPath);
  if (!identity.ok && options.identityMode === 'strict') {
    return { ok: false, issue: identity.issue };
  }

  const section: YamlMapping = toRecord(payload.instrument) ?? {};
  const stem = path.basename(sourcePath, path.extname(sourcePath));
  const displayName = trimmedString(section.display_name) || stem;
  const id = identity.ok ? identity.id : `scope-${slugify(displayName)}`;

  const notes = trimmedString(section.notes);
  const notesFields = parseCompactNotes(notes);
  const location = formatLocation(section.location) || locationFromNotes(notes, notesFields);

  const booking = toRecord(section.booking);
  const bookingUrl = trimmedString(section.booking_url) || trimmedString(booking?.url);

  return {
    ok: true,
    instrument: {
      id,
      display_name: displayName,
      manufacturer: trimmedString(section.manufacturer),
      model: trimmedString(section.model),
      stand_orientation: trimmedString(section.stand_orientation),
      location,
      booking_url: bookingUrl,
      notes,
      notes_fields: notesFields,
      contacts: formatContacts(section.contacts),
      modalities: stringList(payload.modalities),
      modules: stringList(payload.modules),
      software: normalizeSoftware(payload.software),
      hardware: normalizeHardware(payload.hardware),
      image_filename: findImageFilename(options.imagesDir, id),
      source_path: posixPath
    }
  };
}

export interface InstrumentRegistry {
  instruments: Instrument[];
  errors: LoadError[];
  /** Identity problems that kept an instrument out of a strict registry. */
  rejected: ValidationIssue[];
}

function disambiguate(id: string, sourcePath: string, taken: Set<string>): string {
  const stem = path.basename(sourcePath, path.extname(sourcePath));
  const base = `${id}-${slugify(stem)}`;
  let candidate = base;
  let suffix = 2;
  while (taken.has(candidate)) {
    candidate = `${base}-${suffix}`;
    suffix += 1;
  }
  return candidate;
}

/**
 * Loads every registry file in scan order. A repeated id keeps its first owner; later
 * files get `<id>-<slug of file stem>` so no record is overwritten.
 */
export function loadInstrumentRegistry(
  instrumentsDir: string,
  options: NormalizeInstrumentOptions = {}
): InstrumentRegistry {
  const registry: InstrumentRegistry = { instruments: [], errors: [], rejected: [] };
  const taken = new Set<string>();

  for (const filePath of scanYamlFiles(instrumentsDir)) {
    if (hasPathSegment(path.relative(instrumentsDir, filePath), RETIRED_SEGMENT)) {
      continue;
    }
    const loaded = loadYamlMapping(filePath);
    if (!loaded.ok) {
      registry.errors.push(loaded.error);
      continue;
    }

    const result = normalizeInstrument(loaded.data, filePath, options);
    if (!result.ok) {
      registry.rejected.push(result.issue);
      continue;
    }

    const instrument = result.instrument;
    if (taken.has(instrument.id)) {
      const id = disambiguate(instrument.id, filePath, taken);
      instrument.id = id;
      instrument.image_filename = findImageFilename(options.imagesDir, id);
    }
    taken.add(instrument.id);
    registry.instruments.push(instrument);
  }

  return registry;
}
