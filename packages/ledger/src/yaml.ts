import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import type { LoadError, YamlMapping } from './types';
import { isMapping, toPosix } from './values';

export type YamlLoadResult =
  | { ok: true; path: string; data: YamlMapping }
  | { ok: false; path: string; error: LoadError };

function describeKind(value: unknown): string {
  if (Array.isArray(value)) {
    return 'list';
  }
  switch (typeof value) {
    case 'string':
      return 'str';
    case 'number':
      return Number.isInteger(value) ? 'int' : 'float';
    case 'boolean':
      return 'bool';
    default:
      return typeof value;
  }
}

function loadError(filePath: string, message: string): YamlLoadResult {
  const posixPath = toPosix(filePath);
  return {
    ok: false,
    path: posixPath,
    error: { code: 'yaml_parse_error', path: posixPath, message }
  };
}

/** Parses YAML text; only a top-level mapping counts as a ledger document. */
export function parseYamlMapping(filePath: string, contents: string): YamlLoadResult {
  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (err) {
    return loadError(filePath, err instanceof Error ? err.message : String(err));
  }

  if (parsed === null || parsed === undefined) {
    return loadError(filePath, 'YAML document is empty.');
  }
  if (!isMapping(parsed)) {
    return loadError(filePath, `Expected YAML mapping/object at top level, found ${describeKind(parsed)}.`);
  }

  return { ok: true, path: toPosix(filePath), data: parsed };
}

export function loadYamlMapping(filePath: string): YamlLoadResult {
  let contents: string;
  try {
    contents = readFileSync(filePath, 'utf8');
  } catch (err) {
    return loadError(filePath, err instanceof Error ? err.message : String(err));
  }
  return parseYamlMapping(filePath, contents);
}
