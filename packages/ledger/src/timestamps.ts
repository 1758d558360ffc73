import path from 'node:path';
import type { ResolvedTimestamp, YamlMapping } from './types';

/** Sorts before every real timestamp. */
export const MIN_TIMESTAMP = new Date(-8_640_000_000_000_000);

export const TIMESTAMP_FIELDS = ['started_utc', 'timestamp_utc', 'date'] as const;

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/;

function parseOffsetMinutes(offset: string): number | null {
  if (offset === 'Z') {
    return 0;
  }
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number.parseInt(digits.slice(0, 2), 10);
  const minutes = digits.length > 2 ? Number.parseInt(digits.slice(2, 4), 10) : 0;
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return sign * (hours * 60 + minutes);
}

/**
 * Parses an ISO-8601-like timestamp and normalizes it to UTC. Values without an
 * offset are taken as UTC. Returns null for anything unparseable or calendar-invalid.
 */
export function parseIsoTimestamp(raw: unknown): Date | null {
  if (typeof raw !== 'string') {
    return null;
  }
  const value = raw.trim();
  if (!value) {
    return null;
  }
  const match = ISO_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [, yearRaw, monthRaw, dayRaw, hourRaw, minuteRaw, secondRaw, fractionRaw, offsetRaw] = match;
  const year = Number.parseInt(yearRaw, 10);
  const month = Number.parseInt(monthRaw, 10);
  const day = Number.parseInt(dayRaw, 10);
  const hour = hourRaw ? Number.parseInt(hourRaw, 10) : 0;
  const minute = minuteRaw ? Number.parseInt(minuteRaw, 10) : 0;
  const second = secondRaw ? Number.parseInt(secondRaw, 10) : 0;
  const millis = fractionRaw ? Math.floor(Number.parseInt(fractionRaw.padEnd(9, '0'), 10) / 1_000_000) : 0;

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  if (offsetRaw) {
    const offsetMinutes = parseOffsetMinutes(offsetRaw);
    if (offsetMinutes === null) {
      return null;
    }
    return new Date(date.getTime() - offsetMinutes * 60_000);
  }
  return date;
}

/**
 * Reads a timestamp from the leading `_`-delimited token of a ledger filename, e.g.
 * `2026-03-04T09-15-00Z_psf.yaml` or `2026-11-23_post_repair.yaml`.
 */
export function timestampFromFilename(filePath: string): Date | null {
  const stem = path.basename(filePath, path.extname(filePath));
  const firstChunk = stem.split('_', 1)[0] ?? '';

  let candidate = firstChunk.replace(/Z$/, '+00:00');
  const separator = candidate.indexOf('T');
  if (separator !== -1) {
    const datePart = candidate.slice(0, separator);
    const timeWithOffset = candidate.slice(separator + 1);
    const offsetIndex = timeWithOffset.indexOf('+');
    const timePart = offsetIndex === -1 ? timeWithOffset : timeWithOffset.slice(0, offsetIndex);
    const offset = offsetIndex === -1 ? '' : timeWithOffset.slice(offsetIndex);
    // HH-MM-SS reads as HH:MM:SS
    const parts = timePart.split('-');
    if (parts.length >= 3) {
      candidate = `${datePart}T${parts.slice(0, 3).join(':')}${offset}`;
    }
  }

  return parseIsoTimestamp(candidate);
}

export function formatDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

/** Payload field, then filename, then the sentinel; first match wins. */
export function resolveEventTimestamp(payload: YamlMapping, filePath: string): ResolvedTimestamp {
  for (const field of TIMESTAMP_FIELDS) {
    const parsed = parseIsoTimestamp(payload[field]);
    if (parsed) {
      return { value: parsed, iso: parsed.toISOString(), source: 'payload', field };
    }
  }

  const fromFilename = timestampFromFilename(filePath);
  if (fromFilename) {
    return { value: fromFilename, iso: fromFilename.toISOString(), source: 'filename' };
  }

  return { value: MIN_TIMESTAMP, iso: '', source: 'sentinel' };
}

export function extractLogDate(payload: YamlMapping | null | undefined): string {
  if (!payload) {
    return '';
  }
  for (const field of TIMESTAMP_FIELDS) {
    const parsed = parseIsoTimestamp(payload[field]);
    if (parsed) {
      return formatDate(parsed);
    }
  }
  return '';
}
