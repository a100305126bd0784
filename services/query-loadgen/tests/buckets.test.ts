import assert from 'node:assert/strict';
import { test } from 'node:test';

import { isEligible, resolveWindow, TimeBucketRegistry, type TimeBucket } from '../src/buckets';
import { ConfigurationError } from '../src/errors';

const recent: TimeBucket = { name: 'recent', ageMinMs: 0, ageMaxMs: 60_000 };
const mid: TimeBucket = { name: 'mid', ageMinMs: 60_000, ageMaxMs: 300_000 };

test('fromDefinitions reports every invalid bucket together', () => {
  assert.throws(
    () =>
      TimeBucketRegistry.fromDefinitions([
        { name: 'recent', ageMinMs: 0, ageMaxMs: 60_000 },
        { name: 'recent', ageMinMs: 0, ageMaxMs: 1_000 },
        { name: 'immediate', ageMinMs: 0, ageMaxMs: 1_000 },
        { name: 'bad', ageMinMs: 10, ageMaxMs: 5 },
        { name: 'negative', ageMinMs: -1, ageMaxMs: 5 }
      ]),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.deepEqual(error.issues, [
        "duplicate time bucket 'recent'",
        "time bucket name 'immediate' is reserved",
        "time bucket 'bad': ageEnd (5ms) must not be less than ageStart (10ms)",
        "time bucket 'negative': ageStart must be a non-negative duration"
      ]);
      return true;
    }
  );
});

test('a bucket becomes eligible once the run is as old as its far edge', () => {
  assert.equal(isEligible(recent, 59_999), false);
  assert.equal(isEligible(recent, 60_000), true);
  assert.equal(isEligible(mid, 120_000), false);
  assert.equal(isEligible(mid, 300_000), true);
});

test('resolveWindow without jitter spans the whole bucket', () => {
  const window = resolveWindow(mid, 1_000_000, { jitter: false });
  assert.equal(window.start.getTime(), 700_000);
  assert.equal(window.end.getTime(), 940_000);
});

test('jitter only moves the end of the window back', () => {
  const window = resolveWindow(mid, 1_000_000, { random: () => 0.5 });
  assert.equal(window.start.getTime(), 700_000);
  assert.equal(window.end.getTime(), 820_000);
});

test('jittered windows stay inside the bucket', () => {
  const now = 5_000_000;
  for (const value of [0, 0.1, 0.25, 0.5, 0.75, 0.999999]) {
    const window = resolveWindow(mid, now, { random: () => value });
    assert.equal(window.start.getTime(), now - mid.ageMaxMs);
    assert.ok(window.end.getTime() <= now - mid.ageMinMs);
    assert.ok(window.end.getTime() > window.start.getTime());
  }
});

test('zero-width buckets ignore jitter', () => {
  const window = resolveWindow({ name: 'point', ageMinMs: 30_000, ageMaxMs: 30_000 }, 100_000, { random: () => 0.9 });
  assert.equal(window.start.getTime(), 70_000);
  assert.equal(window.end.getTime(), 70_000);
});

test('resolve falls back or skips until a bucket is eligible', () => {
  const registry = TimeBucketRegistry.fromDefinitions([recent, mid], { jitter: false });

  assert.deepEqual(registry.resolve('mid', { nowMs: 1_000_000, elapsedMs: 90_000 }), {
    kind: 'immediate',
    requestedBucket: 'mid'
  });
  assert.deepEqual(registry.resolve('mid', { nowMs: 1_000_000, elapsedMs: 90_000, policy: 'skip' }), {
    kind: 'skip',
    requestedBucket: 'mid'
  });
  assert.deepEqual(registry.resolve('recent', { nowMs: 1_000_000, elapsedMs: 90_000 }), {
    kind: 'window',
    bucketName: 'recent',
    window: { start: new Date(940_000), end: new Date(1_000_000) }
  });
  assert.deepEqual(registry.resolve('immediate', { nowMs: 1_000_000, elapsedMs: 0 }), {
    kind: 'immediate',
    requestedBucket: 'immediate'
  });
});

test('resolve rejects names the registry does not know', () => {
  const registry = TimeBucketRegistry.fromDefinitions([recent]);
  assert.throws(() => registry.resolve('ancient', { nowMs: 0, elapsedMs: 0 }), /Unknown time bucket 'ancient'/);
  assert.equal(registry.has('immediate'), true);
  assert.equal(registry.has('ancient'), false);
  assert.deepEqual(registry.names(), ['recent']);
});
