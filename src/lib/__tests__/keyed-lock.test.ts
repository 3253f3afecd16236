import test from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';

import { KeyedLock } from '../keyed-lock';

test('keyed lock: work under the same key runs one at a time', async () => {
  const lock = new KeyedLock();
  const events: string[] = [];

  const first = lock.runExclusive('draft-1', async () => {
    events.push('first:start');
    await sleep(20);
    events.push('first:end');
  });
  const second = lock.runExclusive('draft-1', async () => {
    events.push('second:start');
    events.push('second:end');
  });

  await Promise.all([first, second]);
  assert.deepEqual(events, ['first:start', 'first:end', 'second:start', 'second:end']);
  assert.equal(lock.activeKeys, 0);
});

test('keyed lock: different keys do not wait for each other', async () => {
  const lock = new KeyedLock();
  const events: string[] = [];

  const slow = lock.runExclusive('a', async () => {
    await sleep(20);
    events.push('a');
  });
  const fast = lock.runExclusive('b', async () => {
    events.push('b');
  });

  await Promise.all([slow, fast]);
  assert.deepEqual(events, ['b', 'a']);
});

test('keyed lock: a failing holder releases the key', async () => {
  const lock = new KeyedLock();

  await assert.rejects(
    lock.runExclusive('a', async () => {
      throw new Error('boom');
    }),
    /boom/
  );
  assert.equal(await lock.runExclusive('a', async () => 'next'), 'next');
  assert.equal(lock.activeKeys, 0);
});
