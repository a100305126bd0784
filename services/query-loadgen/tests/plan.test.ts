import assert from 'node:assert/strict';
import { test } from 'node:test';

import { ConfigurationError } from '../src/errors';
import { ExecutionPlan, PlanSequence, type PlanEntry } from '../src/plan';

const hasBucket = (name: string) => ['recent', 'mid', 'old'].includes(name);

const q1Entries: PlanEntry[] = [
  { queryName: 'q1', bucketName: 'recent' },
  { queryName: 'q1', bucketName: 'mid' },
  { queryName: 'q1', bucketName: 'old' }
];

test('fromEntries collects dangling references and empty queries', () => {
  assert.throws(
    () =>
      ExecutionPlan.fromEntries(
        [
          { queryName: 'q1', bucketName: 'recent' },
          { queryName: 'q2', bucketName: 'recent' },
          { queryName: 'q1', bucketName: 'missing' }
        ],
        { queryNames: ['q1', 'q3'], hasBucket }
      ),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.deepEqual(error.issues, [
        "executionPlan[1] references undefined query 'q2'",
        "executionPlan[2] references undefined time bucket 'missing'",
        "query 'q3' has no execution plan entries"
      ]);
      return true;
    }
  );
});

test('entries are partitioned per query in declaration order', () => {
  const plan = ExecutionPlan.fromEntries(
    [
      { queryName: 'q1', bucketName: 'recent' },
      { queryName: ' q2 ', bucketName: 'immediate' },
      { queryName: 'q1', bucketName: 'old' },
      { queryName: 'q1', bucketName: 'recent' }
    ],
    { queryNames: ['q1', 'q2'], hasBucket }
  );

  assert.deepEqual(plan.queryNames(), ['q1', 'q2']);
  assert.deepEqual(
    plan.entriesFor('q1').map((entry) => entry.bucketName),
    ['recent', 'old', 'recent']
  );
  assert.deepEqual(plan.entriesFor('q2'), [{ queryName: 'q2', bucketName: 'immediate' }]);
  assert.deepEqual([...plan.distribution('q1')], [
    ['recent', 2],
    ['old', 1]
  ]);
});

test('a sequence wraps around and reports its cycle', () => {
  const sequence = new PlanSequence('q1', q1Entries);
  const dispatches = Array.from({ length: 7 }, () => sequence.next());

  assert.deepEqual(
    dispatches.map((dispatch) => dispatch.entry.bucketName),
    ['recent', 'mid', 'old', 'recent', 'mid', 'old', 'recent']
  );
  assert.deepEqual(
    dispatches.map((dispatch) => dispatch.cycle),
    [0, 0, 0, 1, 1, 1, 2]
  );
  assert.deepEqual(
    dispatches.map((dispatch) => dispatch.position),
    [0, 1, 2, 0, 1, 2, 0]
  );
  assert.equal(sequence.dispatched, 7);
  assert.equal(sequence.peek().bucketName, 'mid');
});

test('every entry is dispatched equally often over whole cycles', () => {
  const sequence = new PlanSequence('q1', [...q1Entries, { queryName: 'q1', bucketName: 'recent' }]);
  const counts = new Map<number, number>();
  for (let i = 0; i < 4 * 25; i += 1) {
    const { position } = sequence.next();
    counts.set(position, (counts.get(position) ?? 0) + 1);
  }
  assert.deepEqual([...counts.values()], [25, 25, 25, 25]);
});

test('concurrent consumers never share or skip an index', async () => {
  const sequence = new PlanSequence('q1', q1Entries);
  const seen: number[] = [];
  const consumer = async () => {
    for (let i = 0; i < 50; i += 1) {
      await Promise.resolve();
      seen.push(sequence.next().index);
    }
  };
  await Promise.all(Array.from({ length: 8 }, () => consumer()));

  assert.equal(seen.length, 400);
  assert.deepEqual(
    [...seen].sort((a, b) => a - b),
    Array.from({ length: 400 }, (_, index) => index)
  );
});

test('sequences from the same plan advance independently', () => {
  const plan = ExecutionPlan.fromEntries(q1Entries, { queryNames: ['q1'], hasBucket });
  const first = plan.sequence('q1');
  const second = plan.sequence('q1');
  first.next();
  first.next();
  assert.equal(second.next().entry.bucketName, 'recent');
  assert.equal(first.next().entry.bucketName, 'old');
});

test('a sequence needs at least one entry', () => {
  assert.throws(() => new PlanSequence('q1', []), ConfigurationError);
});
