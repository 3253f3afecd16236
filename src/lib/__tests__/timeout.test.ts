import test from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';

import { withTimeout } from '../timeout';

const ignore = () => undefined;

test('withTimeout: resolves with the value when the task finishes in time', async () => {
  const result = await withTimeout(async () => 'done', 1000, ignore);
  assert.deepEqual(result, { timedOut: false, value: 'done' });
});

test('withTimeout: reports a timeout and aborts the signal', async () => {
  const signals: AbortSignal[] = [];
  const result = await withTimeout(
    async (signal) => {
      signals.push(signal);
      await sleep(200);
      return 'late';
    },
    10,
    ignore
  );

  assert.deepEqual(result, { timedOut: true });
  assert.equal(signals.length, 1);
  assert.equal(signals[0].aborted, true);
});

test('withTimeout: a rejection before the deadline propagates', async () => {
  await assert.rejects(
    withTimeout(
      async () => {
        throw new Error('extractor down');
      },
      1000,
      ignore
    ),
    /extractor down/
  );
});

test('withTimeout: a rejection after the deadline goes to the callback', async () => {
  const abandoned: unknown[] = [];
  const result = await withTimeout(
    async () => {
      await sleep(30);
      throw new Error('too late');
    },
    5,
    (error) => abandoned.push(error)
  );

  assert.deepEqual(result, { timedOut: true });
  await sleep(60);
  assert.equal(abandoned.length, 1);
  assert.ok(abandoned[0] instanceof Error);
});
