import test from 'node:test';
import assert from 'node:assert/strict';
import { dedupeByMac, displayFields, mergeFilter, project, DEFAULT_FILTER } from '../../core/viewEngine';
import { makeRecord } from '../helpers/fakes';

test('text filter "fail" keeps only the failed record', () => {
  const failed = makeRecord({ mac: '', status: 'error: timeout', category: 'communication', port: 'COM5' });
  const good = makeRecord({ mac: 'aa:bb:cc:dd:ee:ff', port: 'COM6' });
  const out = project([failed, good], { query: 'fail', status: 'all', unique: false });
  assert.deepEqual(out, [failed]);
});

test('text filter is case-insensitive and spans all displayed fields', () => {
  const a = makeRecord({ mac: 'aa:bb:cc:dd:ee:01', port: 'COM5' });
  const b = makeRecord({ mac: 'aa:bb:cc:dd:ee:02', port: 'COM6' });
  assert.deepEqual(project([a, b], { query: '  EE:02 ', status: 'all', unique: false }), [b]);
  assert.deepEqual(project([a, b], { query: 'com5 aa:bb', status: 'all', unique: false }), [a]);
});

test('displayFields joins time, port, mac, result and status', () => {
  const r = makeRecord({ mac: '', port: 'COM9', status: 'mac not found', category: 'not-found' });
  assert.deepEqual(displayFields(r), ['2026-10-18 09:00:00', 'COM9', '', 'failure', 'mac not found']);
});

test('status filter buckets success and failure', () => {
  const a = makeRecord({ mac: 'aa:bb:cc:dd:ee:01' });
  const b = makeRecord({ mac: '', status: 'import error: esptool not found', category: 'setup' });
  const c = makeRecord({ mac: 'aa:bb:cc:dd:ee:03' });
  assert.deepEqual(project([a, b, c], { query: '', status: 'success', unique: false }), [a, c]);
  assert.deepEqual(project([a, b, c], { query: '', status: 'failure', unique: false }), [b]);
  assert.deepEqual(project([a, b, c], DEFAULT_FILTER), [a, b, c]);
});

test('dedupeByMac keeps first per identifier and every empty identifier', () => {
  const rows = [
    makeRecord({ mac: 'aa:00:00:00:00:01' }),
    makeRecord({ mac: '' }),
    makeRecord({ mac: 'aa:00:00:00:00:01' }),
    makeRecord({ mac: 'bb:00:00:00:00:02' }),
    makeRecord({ mac: '' })
  ];
  const out = dedupeByMac(rows);
  assert.deepEqual(
    out.map((r) => r.mac),
    ['aa:00:00:00:00:01', '', 'bb:00:00:00:00:02', '']
  );
  assert.equal(out[0], rows[0]);
});

test('unique projection deduplicates without touching the input', () => {
  const rows = [makeRecord({ mac: 'aa:00:00:00:00:01' }), makeRecord({ mac: 'aa:00:00:00:00:01' })];
  const before = rows.slice();
  const out = project(rows, { query: '', status: 'all', unique: true });
  assert.equal(out.length, 1);
  assert.deepEqual(rows, before);
});

test('mergeFilter normalizes patch values and keeps omitted fields', () => {
  const base = { query: 'com', status: 'success' as const, unique: false };
  assert.deepEqual(mergeFilter(base, { status: 'bogus' }), base);
  assert.deepEqual(mergeFilter(base, { query: 'x', unique: 'true' }), { query: 'x', status: 'success', unique: true });
  assert.deepEqual(mergeFilter(base, { status: 'failure', query: null }), { query: '', status: 'failure', unique: false });
});
