import assert from 'node:assert/strict';
import test from 'node:test';
import { ConnectedClientTracker } from './connected-clients.js';

void test('touch reports new addresses once and refreshes known ones', () => {
  let nowMs = 0;
  const tracker = new ConnectedClientTracker(10_000, () => nowMs);

  assert.equal(tracker.touch('192.168.1.20'), true);
  nowMs = 5_000;
  assert.equal(tracker.touch('192.168.1.20'), false);
  assert.equal(tracker.touch('::ffff:192.168.1.20'), false);
  assert.equal(tracker.count(), 1);
});

void test('sweep drops peers idle for longer than the stale window', () => {
  let nowMs = 0;
  const tracker = new ConnectedClientTracker(10_000, () => nowMs);

  tracker.touch('192.168.1.20');
  nowMs = 4_000;
  tracker.touch('192.168.1.21');

  nowMs = 10_000;
  assert.equal(tracker.sweep(), 2);

  nowMs = 12_000;
  assert.equal(tracker.sweep(), 1);
  assert.deepEqual(tracker.addresses(), ['192.168.1.21']);

  nowMs = 20_000;
  assert.equal(tracker.sweep(), 0);
});
