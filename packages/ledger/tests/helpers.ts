import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { resolveEventTimestamp } from '../src/timestamps';
import type { LedgerEvent, YamlMapping } from '../src/types';

export async function makeTempDir(prefix = 'scopeledger-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Writes `{ relativePath: contents }` below `root`. */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, contents] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, contents, 'utf8');
  }
}

export function makeEvent(data: YamlMapping, sourcePath = 'ledger/event.yaml'): LedgerEvent {
  const filename = path.basename(sourcePath);
  return {
    source_path: sourcePath,
    filename,
    stem: path.basename(filename, path.extname(filename)),
    microscope: typeof data.microscope === 'string' ? data.microscope : '',
    record_type: typeof data.record_type === 'string' ? data.record_type : '',
    timestamp: resolveEventTimestamp(data, sourcePath),
    data
  };
}

export const QC_EVENT = `microscope: scope-a
record_type: qc_session
started_utc: "2026-03-01T10:00:00Z"
`;

export const MAINTENANCE_EVENT = `microscope: scope-a
record_type: maintenance_event
started_utc: "2026-04-02T08:00:00Z"
service_provider: Vendor Service
reason_details: Laser alignment drift
action: Realigned laser
maintenance_id: MNT-0001
microscope_status_after: in_service
`;

export function instrumentYaml(id: string, displayName = id): string {
  return `instrument:
  instrument_id: ${id}
  display_name: ${displayName}
`;
}
