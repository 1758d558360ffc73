import type { NotesFields } from './types';

const RAW_KEY = 'raw';

function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    const last = trimmed[trimmed.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

function parseValue(value: string): string | string[] {
  const trimmed = value.trim();
  if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
    return trimmed
      .slice(1, -1)
      .split(',')
      .map(unquote)
      .filter((entry) => entry.length > 0);
  }
  return unquote(trimmed);
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/\s+/g, '_');
}

/**
 * Decomposes the legacy `key: value | key: value` notes notation into a mapping.
 * Text with neither a colon nor a pipe is kept verbatim under `raw`.
 */
export function parseCompactNotes(text: string): NotesFields {
  const trimmed = text.trim();
  if (!trimmed) {
    return {};
  }
  if (!trimmed.includes(':') && !trimmed.includes('|')) {
    return { [RAW_KEY]: trimmed };
  }

  const fields: NotesFields = {};
  const leftovers: string[] = [];

  for (const segment of trimmed.split('|')) {
    const part = segment.trim();
    if (!part) {
      continue;
    }
    const colon = part.indexOf(':');
    const key = colon === -1 ? '' : normalizeKey(part.slice(0, colon));
    if (!key) {
      leftovers.push(part);
      continue;
    }
    fields[key] = parseValue(part.slice(colon + 1));
  }

  if (leftovers.length > 0) {
    fields[RAW_KEY] = leftovers.join(' | ');
  }
  return fields;
}

export function notesField(fields: NotesFields, key: string): string {
  const value = fields[key];
  if (typeof value === 'string') {
    return value.trim();
  }
  return Array.isArray(value) ? value.join(', ') : '';
}
