import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { createLogger } from '@scopeledger/shared';
import type { Logger } from '@scopeledger/shared';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'scopeledger-cli-'));
}

export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, contents] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, contents, 'utf8');
  }
}

export type CapturedOutput = {
  stdout: string[];
  stderr: string[];
  restore: () => void;
};

/** Replaces console.log and console.error until `restore` is called. */
export function captureConsole(): CapturedOutput {
  const originalLog = console.log;
  const originalError = console.error;
  const captured: CapturedOutput = {
    stdout: [],
    stderr: [],
    restore: () => {
      console.log = originalLog;
      console.error = originalError;
    }
  };
  console.log = (...args: unknown[]) => {
    captured.stdout.push(args.map(String).join(' '));
  };
  console.error = (...args: unknown[]) => {
    captured.stderr.push(args.map(String).join(' '));
  };
  return captured;
}

export function memoryLogger(): { logger: Logger; messages: string[] } {
  const messages: string[] = [];
  const logger = createLogger({
    name: 'scopeledger-test',
    level: 'info',
    destination: {
      write(line: string) {
        const entry: unknown = JSON.parse(line);
        const msg = entry && typeof entry === 'object' ? Reflect.get(entry, 'msg') : undefined;
        messages.push(typeof msg === 'string' ? msg : '');
      }
    }
  });
  return { logger, messages };
}

export const LEDGER_TREE: Record<string, string> = {
  'instruments/scope-a.yaml': 'instrument:\n  instrument_id: scope-a\n  display_name: Scope A\n',
  'instruments/scope-b.yaml': 'instrument:\n  instrument_id: scope-b\n  display_name: Scope B\n',
  'qc/sessions/scope-a/2026/2026-05-01_psf.yaml': [
    'microscope: scope-a',
    'record_type: qc_session',
    'started_utc: "2026-05-01T10:00:00Z"',
    'evaluation:',
    '  overall_status: ok',
    'metrics_computed:',
    '  - metric_id: psf.fwhm_x_um',
    '    value: 0.21',
    ''
  ].join('\n'),
  'maintenance/events/scope-a/2026/2026-04-02_align.yaml': [
    'microscope: scope-a',
    'record_type: maintenance_event',
    'started_utc: "2026-04-02T08:00:00Z"',
    'service_provider: Vendor Service',
    'reason_details: Laser alignment drift',
    'action: Realigned laser',
    'maintenance_id: MNT-0001',
    'microscope_status_after: in_service',
    ''
  ].join('\n'),
  'assets/images/scope-a.png': 'png'
};
