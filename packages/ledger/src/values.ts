import path from 'node:path';
import type { YamlMapping } from './types';

export function isMapping(value: unknown): value is YamlMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toRecord(value: unknown): YamlMapping | null {
  return isMapping(value) ? value : null;
}

export function trimmedString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isNonEmptyString);
}

export function isNumeric(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function toPosix(value: string): string {
  return value.split(path.sep).join('/');
}
