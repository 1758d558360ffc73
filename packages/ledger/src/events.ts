import path from 'node:path';
import { scanYamlFiles } from './scanner';
import { resolveEventTimestamp } from './timestamps';
import type { LedgerEvent, LoadError, YamlMapping } from './types';
import { toPosix, trimmedString } from './values';
import { loadYamlMapping } from './yaml';

export interface EventLedger {
  /** Events per instrument id, each list in chronological order. */
  byInstrument: Map<string, LedgerEvent[]>;
  errors: LoadError[];
}

export interface LoadEventsOptions {
  /** Collects files that could not be loaded. */
  errors?: LoadError[];
}

/** `microscope`, falling back to the legacy `instrument_id` field. */
export function eventInstrumentId(payload: YamlMapping): string | null {
  if (typeof payload.microscope === 'string') {
    return payload.microscope;
  }
  return typeof payload.instrument_id === 'string' ? payload.instrument_id : null;
}

function toLedgerEvent(filePath: string, microscope: string, data: YamlMapping): LedgerEvent {
  const filename = path.basename(filePath);
  return {
    source_path: toPosix(filePath),
    filename,
    stem: path.basename(filename, path.extname(filename)),
    microscope,
    record_type: trimmedString(data.record_type),
    timestamp: resolveEventTimestamp(data, filePath),
    data
  };
}

/** Chronological; the source path breaks ties only. */
export function compareEvents(a: LedgerEvent, b: LedgerEvent): number {
  const delta = a.timestamp.value.getTime() - b.timestamp.value.getTime();
  if (delta !== 0) {
    return delta;
  }
  if (a.source_path === b.source_path) {
    return 0;
  }
  return a.source_path < b.source_path ? -1 : 1;
}

function readEvents(baseDir: string, errors: LoadError[], accept: (microscope: string) => boolean): LedgerEvent[] {
  const events: LedgerEvent[] = [];
  for (const filePath of scanYamlFiles(baseDir)) {
    const loaded = loadYamlMapping(filePath);
    if (!loaded.ok) {
      errors.push(loaded.error);
      continue;
    }
    const microscope = eventInstrumentId(loaded.data);
    if (microscope === null || !accept(microscope)) {
      continue;
    }
    events.push(toLedgerEvent(filePath, microscope, loaded.data));
  }
  return events.sort(compareEvents);
}

/**
 * Every event under `baseDir` that belongs to `instrumentId`, oldest first. A blank id
 * has no events.
 */
export function loadInstrumentEvents(
  baseDir: string,
  instrumentId: string,
  options: LoadEventsOptions = {}
): LedgerEvent[] {
  const target = instrumentId.trim();
  if (!target) {
    return [];
  }
  return readEvents(baseDir, options.errors ?? [], (microscope) => microscope === target);
}

/** Parses each file under `baseDir` once and groups the events by instrument. */
export function loadEventLedger(baseDir: string): EventLedger {
  const errors: LoadError[] = [];
  const byInstrument = new Map<string, LedgerEvent[]>();
  for (const event of readEvents(baseDir, errors, (microscope) => microscope.trim().length > 0)) {
    const bucket = byInstrument.get(event.microscope);
    if (bucket) {
      bucket.push(event);
    } else {
      byInstrument.set(event.microscope, [event]);
    }
  }
  return { byInstrument, errors };
}
