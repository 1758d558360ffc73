import { mkdir, mkdtemp, readFile, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export async function makeTempDir(prefix = 'scopeledger-site-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, contents] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, contents, 'utf8');
  }
}

export const SCOPE_A = `instrument:
  instrument_id: scope-a
  display_name: Scope A
  manufacturer: Zeiss
  location: { site: Turku, room: B2.14 }
modalities: [confocal]
hardware:
  lasers:
    - wavelength_nm: 488
      power_mw: 10
software:
  acquisition: { name: ZEN, version: "3.8" }
`;

export const SCOPE_B = `instrument:
  instrument_id: scope-b
  display_name: Beta Scope
`;

export const FAILING_QC = `microscope: scope-a
record_type: qc_session
started_utc: "2026-05-01T10:00:00Z"
performed_by: Ada
reason: routine
evaluation:
  overall_status: fail
  results:
    - metric_id: psf.fwhm_x_um
      status: fail
      threshold: 0.25
      message: PSF out of spec
metrics_computed:
  - metric_id: psf.fwhm_x_um
    value: 0.3
    unit: um
`;

export async function readLines(filePath: string): Promise<string[]> {
  return (await readFile(filePath, 'utf8')).split('\n');
}
