import assert from 'node:assert/strict';
import { rm } from 'node:fs/promises';
import path from 'node:path';
import { test } from 'node:test';
import type { TestContext } from 'node:test';
import { buildFleet } from '../src/fleet';
import { MAINTENANCE_EVENT, makeTempDir, writeTree } from './helpers';

const NOW = new Date('2026-06-01T00:00:00Z');

const FAILING_QC = `microscope: scope-a
record_type: qc_session
started_utc: "2026-05-01T10:00:00Z"
performed_by: Ada
reason: routine
evaluation:
  overall_status: fail
  results:
    - message: PSF out of spec
metrics_computed:
  - metric_id: psf_fwhm_x
    value: 0.3
    unit: um
`;

async function fleetRoot(t: TestContext, extra: Record<string, string> = {}): Promise<string> {
  const root = await makeTempDir();
  t.after(async () => rm(root, { recursive: true, force: true }));
  await writeTree(root, {
    'instruments/scope-a.yaml': 'instrument:\n  instrument_id: scope-a\n  display_name: Scope A\nmodalities: [confocal, Airyscan]\n',
    'instruments/scope-b.yaml': 'instrument:\n  instrument_id: scope-b\n  display_name: Beta Scope\nmodalities: [confocal, widefield]\n',
    'qc/sessions/scope-a/2026/2026-05-01_psf.yaml': FAILING_QC,
    'maintenance/events/scope-a/2026/2026-04-02_align.yaml': MAINTENANCE_EVENT,
    ...extra
  });
  return root;
}

function fleetOptions(root: string) {
  return {
    instrumentsDir: path.join(root, 'instruments'),
    qcDir: path.join(root, 'qc/sessions'),
    maintenanceDir: path.join(root, 'maintenance/events'),
    now: NOW
  };
}

test('buildFleet derives status and counts for every instrument', async (t) => {
  const root = await fleetRoot(t);
  const fleet = buildFleet(fleetOptions(root));

  assert.deepEqual(fleet.stats, { total: 2, green: 1, yellow: 0, red: 1 });
  assert.deepEqual(fleet.instruments.map((instrument) => instrument.id), ['scope-b', 'scope-a']);
  assert.deepEqual(fleet.attention.map((instrument) => instrument.id), ['scope-a']);
  assert.deepEqual(fleet.modalities, ['Airyscan', 'confocal', 'widefield']);
  assert.deepEqual(fleet.loadErrors, []);
  assert.deepEqual(fleet.rejected, []);

  const [idle, failing] = fleet.instruments;
  assert.equal(idle?.status.color, 'green');
  assert.deepEqual(idle?.charts, {});
  assert.deepEqual(idle?.qc_history, []);

  assert.equal(failing?.status.color, 'red');
  assert.equal(failing?.status.reason, 'Laser alignment drift');
  assert.equal(failing?.status.last_qc_date, '2026-05-01');
  assert.equal(failing?.status.last_maint_date, '2026-04-02');
  assert.equal(failing?.latest_qc_overall, 'fail');
  assert.deepEqual(failing?.latest_metrics, [{ metric_id: 'psf_fwhm_x', value: 0.3, unit: 'um', details: '' }]);
  assert.deepEqual(failing?.charts, { psf_fwhm_x: { labels: ['2026-05-01'], values: [0.3] } });
  assert.deepEqual(failing?.qc_history, [
    { event_id: '2026-05-01_psf', date: '2026-05-01', reason: 'routine', operator: 'Ada', overall_status: 'fail' }
  ]);
  assert.deepEqual(failing?.maintenance_history, [
    { event_id: '2026-04-02_align', date: '2026-04-02', reason: '', provider: 'Vendor Service', status_after: 'in_service' }
  ]);
});

test('buildFleet keeps unreadable ledger files as load errors', async (t) => {
  const root = await fleetRoot(t, { 'qc/sessions/broken.yaml': '- a\n- b\n' });
  const fleet = buildFleet(fleetOptions(root));

  assert.equal(fleet.stats.total, 2);
  assert.equal(fleet.loadErrors.length, 1);
  assert.equal(fleet.loadErrors[0]?.code, 'yaml_parse_error');
});

test('strict identity leaves invalid instruments out of the fleet', async (t) => {
  const root = await fleetRoot(t, { 'instruments/odd.yaml': 'instrument:\n  instrument_id: Odd Scope\n' });

  const permissive = buildFleet(fleetOptions(root));
  assert.deepEqual(
    permissive.instruments.map((instrument) => instrument.id),
    ['scope-b', 'scope-odd', 'scope-a']
  );

  const strict = buildFleet({ ...fleetOptions(root), identityMode: 'strict' });
  assert.equal(strict.stats.total, 2);
  assert.deepEqual(strict.rejected.map((issue) => issue.code), ['invalid_instrument_id']);
});
