import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  MIN_TIMESTAMP,
  extractLogDate,
  parseIsoTimestamp,
  resolveEventTimestamp,
  timestampFromFilename
} from '../src/timestamps';

test('parseIsoTimestamp normalizes to UTC', () => {
  assert.equal(parseIsoTimestamp('2026-03-04T10:15:00Z')?.toISOString(), '2026-03-04T10:15:00.000Z');
  assert.equal(parseIsoTimestamp('2026-03-04T12:15:00+02:00')?.toISOString(), '2026-03-04T10:15:00.000Z');
  assert.equal(parseIsoTimestamp('2026-03-04T05:15:00-0500')?.toISOString(), '2026-03-04T10:15:00.000Z');
  assert.equal(parseIsoTimestamp(' 2026-03-04T10:15:00.250 ')?.toISOString(), '2026-03-04T10:15:00.250Z');
  assert.equal(parseIsoTimestamp('2026-03-04 10:15')?.toISOString(), '2026-03-04T10:15:00.000Z');
  assert.equal(parseIsoTimestamp('2026-03-04')?.toISOString(), '2026-03-04T00:00:00.000Z');
});

test('parseIsoTimestamp rejects malformed values', () => {
  assert.equal(parseIsoTimestamp('2026-02-30'), null);
  assert.equal(parseIsoTimestamp('2026-13-01T00:00:00Z'), null);
  assert.equal(parseIsoTimestamp('2026-03-04T24:00:00'), null);
  assert.equal(parseIsoTimestamp('yesterday'), null);
  assert.equal(parseIsoTimestamp(''), null);
  assert.equal(parseIsoTimestamp(20260304), null);
  assert.equal(parseIsoTimestamp(undefined), null);
});

test('timestampFromFilename reads the leading token', () => {
  assert.equal(
    timestampFromFilename('qc/sessions/scope-a/2026/2026-11-23_post_repair.yaml')?.toISOString(),
    '2026-11-23T00:00:00.000Z'
  );
  assert.equal(
    timestampFromFilename('qc/sessions/scope-a/2026/2026-03-04T09-15-00Z_psf.yaml')?.toISOString(),
    '2026-03-04T09:15:00.000Z'
  );
  assert.equal(
    timestampFromFilename('qc/sessions/scope-a/2026/2026-03-04T09-15-00_psf.yml')?.toISOString(),
    '2026-03-04T09:15:00.000Z'
  );
  assert.equal(
    timestampFromFilename('2026-03-04T09:15:00+02:00_psf.yaml')?.toISOString(),
    '2026-03-04T07:15:00.000Z'
  );
  assert.equal(timestampFromFilename('qc/sessions/scope-a/2026/calibration.yaml'), null);
});

test('resolveEventTimestamp walks payload fields, then the filename, then the sentinel', () => {
  const fromStarted = resolveEventTimestamp(
    { started_utc: '2026-05-01T08:00:00Z', date: '2020-01-01' },
    'scope-a/2026/2026-11-23_post_repair.yaml'
  );
  assert.equal(fromStarted.iso, '2026-05-01T08:00:00.000Z');
  assert.equal(fromStarted.source, 'payload');
  assert.equal(fromStarted.field, 'started_utc');

  const fromDate = resolveEventTimestamp({ started_utc: 'unknown', date: '2026-02-02' }, 'scope-a/2026/x.yaml');
  assert.equal(fromDate.iso, '2026-02-02T00:00:00.000Z');
  assert.equal(fromDate.field, 'date');

  const fromFilename = resolveEventTimestamp({}, 'scope-a/2026/2026-11-23_post_repair.yaml');
  assert.equal(fromFilename.iso, '2026-11-23T00:00:00.000Z');
  assert.equal(fromFilename.source, 'filename');

  const sentinel = resolveEventTimestamp({}, 'scope-a/2026/undated.yaml');
  assert.equal(sentinel.source, 'sentinel');
  assert.equal(sentinel.iso, '');
  assert.equal(sentinel.value.getTime(), MIN_TIMESTAMP.getTime());
  assert.ok(sentinel.value.getTime() < fromFilename.value.getTime());
});

test('extractLogDate returns the UTC calendar date', () => {
  assert.equal(extractLogDate({ timestamp_utc: '2026-05-01T23:30:00-02:00' }), '2026-05-02');
  assert.equal(extractLogDate({ date: '2026-05-01' }), '2026-05-01');
  assert.equal(extractLogDate({ started_utc: 42 }), '');
  assert.equal(extractLogDate(null), '');
});
