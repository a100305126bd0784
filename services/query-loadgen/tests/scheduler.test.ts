import assert from 'node:assert/strict';
import { test } from 'node:test';
import pino from 'pino';

import type { Clock } from '../src/clock';
import type { LoadgenConfig } from '../src/config/loadgenConfig';
import { ConfigurationError } from '../src/errors';
import { planLoad, Scheduler } from '../src/scheduler';
import { FakeClock } from './support/fakeClock';
import { FakeBackend, RecordingSink } from './support/fakes';

const logger = pino({ level: 'silent' });

function makeConfig(overrides: Partial<LoadgenConfig> = {}): LoadgenConfig {
  return {
    tempo: { queryEndpoint: 'http://tempo.test:3200', insecureSkipVerify: false },
    namespace: 'perf',
    query: {
      concurrentQueries: 4,
      targetQPS: 10,
      timeoutMs: 60_000,
      limit: 500,
      timestampUnit: 'seconds',
      ineligibleBucketPolicy: 'immediate',
      jitter: false,
      startupJitterMs: 0
    },
    timeBuckets: [
      { name: 'recent', ageMinMs: 0, ageMaxMs: 60_000 },
      { name: 'mid', ageMinMs: 60_000, ageMaxMs: 300_000 }
    ],
    queries: [
      { name: 'errors', queryExpression: '{ status = error }' },
      { name: 'slow', queryExpression: '{ duration > 2s }', concurrency: 2, targetQPS: 2.5 }
    ],
    executionPlan: [
      { queryName: 'errors', bucketName: 'recent' },
      { queryName: 'slow', bucketName: 'immediate' },
      { queryName: 'errors', bucketName: 'mid' }
    ],
    ...overrides
  };
}

test('templates without their own rate share the global rate', () => {
  const load = planLoad(
    makeConfig({
      queries: [
        { name: 'errors', queryExpression: '{ status = error }' },
        { name: 'slow', queryExpression: '{ duration > 2s }', concurrency: 2, targetQPS: 2.5 },
        { name: 'all', queryExpression: '{ }' }
      ],
      executionPlan: [
        { queryName: 'errors', bucketName: 'recent' },
        { queryName: 'slow', bucketName: 'immediate' },
        { queryName: 'all', bucketName: 'mid' }
      ],
      query: { ...makeConfig().query, targetQPS: 12 }
    })
  );

  assert.deepEqual(
    load.executors.map((executor) => [executor.template.name, executor.targetRate, executor.concurrency]),
    [
      ['errors', 4, 4],
      ['slow', 2.5, 2],
      ['all', 4, 4]
    ]
  );
});

test('the plan summary counts entries per bucket', () => {
  const load = planLoad(makeConfig());
  const errors = load.executors[0];
  assert.equal(errors.planEntries, 2);
  assert.deepEqual([...errors.distribution], [
    ['recent', 1],
    ['mid', 1]
  ]);
});

test('dangling references fail before anything starts', () => {
  const config = makeConfig({
    executionPlan: [
      { queryName: 'errors', bucketName: 'ancient' },
      { queryName: 'slow', bucketName: 'immediate' }
    ]
  });
  const backend = new FakeBackend();

  assert.throws(
    () => Scheduler.create(config, { backend, sink: new RecordingSink(), logger }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.deepEqual(error.issues, [
        "executionPlan[0] references undefined time bucket 'ancient'",
        "query 'errors' has no execution plan entries"
      ]);
      return true;
    }
  );
  assert.equal(backend.calls.length, 0);
});

test('scheduler runs one executor per template until stopped', async () => {
  const clock = new FakeClock(1_700_000_000_000);
  const backend = new FakeBackend();
  const sink = new RecordingSink();
  const scheduler = Scheduler.create(makeConfig(), { backend, sink, logger, clock });

  assert.equal(scheduler.running, false);
  assert.deepEqual(
    scheduler.executors().map((executor) => [executor.template.name, executor.concurrency, executor.targetRate]),
    [
      ['errors', 4, 5],
      ['slow', 2, 2.5]
    ]
  );

  scheduler.start();
  await clock.advance(1_000);
  assert.equal(scheduler.running, true);

  const stats = scheduler.stats();
  assert.deepEqual(
    stats.map((entry) => [entry.queryName, entry.dispatched]),
    [
      ['errors', 6],
      ['slow', 3]
    ]
  );
  assert.deepEqual(
    backend.calls.filter((call) => call.query === '{ duration > 2s }').map((call) => call.range),
    [null, null, null]
  );
  assert.ok(backend.calls.every((call) => call.limit === 500));

  await scheduler.stop();
  await scheduler.done();
  assert.equal(scheduler.running, false);
  assert.deepEqual(
    scheduler.stats().map((entry) => entry.activeWorkers),
    [0, 0]
  );
});

test('a crashed worker is logged and rejects done()', async () => {
  const lines: string[] = [];
  const capture = pino({ level: 'error' }, { write: (line: string) => void lines.push(line) });
  const brokenClock: Clock = {
    now: () => 1_700_000_000_000,
    sleep: () => Promise.reject(new Error('timer backend failed'))
  };
  const scheduler = Scheduler.create(makeConfig(), {
    backend: new FakeBackend(),
    sink: new RecordingSink(),
    logger: capture,
    clock: brokenClock
  });

  scheduler.start();
  await assert.rejects(scheduler.done(), /timer backend failed/);

  assert.ok(lines.some((line) => line.includes('"msg":"Query scheduler failed"')));
  assert.ok(lines.some((line) => line.includes('"msg":"Worker stopped unexpectedly"')));
});
