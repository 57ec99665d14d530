import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AsyncLock, LazySingleton } from './async-lock.js';
import { sleep } from '../reliability/timeout-guard.js';

describe('AsyncLock', () => {
  it('runs critical sections one at a time in arrival order', async () => {
    const lock = new AsyncLock();
    const events: string[] = [];
    const task = (name: string, ms: number) => lock.runExclusive(async () => {
      events.push(`${name}:start`);
      await sleep(ms);
      events.push(`${name}:end`);
      return name;
    });

    const results = await Promise.all([task('a', 20), task('b', 0), task('c', 5)]);

    assert.deepEqual(results, ['a', 'b', 'c']);
    assert.deepEqual(events, ['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('releases the lock when a section throws', async () => {
    const lock = new AsyncLock();

    await assert.rejects(lock.runExclusive(async () => { throw new Error('boom'); }), /boom/);

    assert.equal(await lock.runExclusive(async () => 42), 42);
    assert.equal(lock.isLocked(), false);
  });
});

describe('LazySingleton', () => {
  it('initializes once for many concurrent first callers', async () => {
    let inits = 0;
    const singleton = new LazySingleton(async () => {
      inits++;
      await sleep(10);
      return { id: inits };
    });

    const results = await Promise.all(Array.from({ length: 25 }, () => singleton.get()));

    assert.equal(inits, 1);
    for (const result of results) {
      assert.strictEqual(result, results[0]);
    }
  });

  it('moves from UNINITIALIZED through INITIALIZING to READY', async () => {
    const singleton = new LazySingleton(async () => {
      await sleep(5);
      return 'value';
    });
    assert.equal(singleton.state, 'UNINITIALIZED');

    const pending = singleton.get();
    assert.equal(singleton.state, 'INITIALIZING');

    assert.equal(await pending, 'value');
    assert.equal(singleton.state, 'READY');
  });

  it('uses the first caller argument and ignores later ones', async () => {
    const singleton = new LazySingleton<string, string>(async (arg) => {
      await sleep(5);
      return arg;
    });

    const [first, second] = await Promise.all([singleton.get('first'), singleton.get('second')]);

    assert.equal(first, 'first');
    assert.equal(second, 'first');
    assert.equal(await singleton.get('third'), 'first');
  });

  it('publishes nothing when init fails so the next caller retries', async () => {
    let inits = 0;
    const singleton = new LazySingleton(async () => {
      inits++;
      if (inits === 1) throw new Error('init failed');
      return inits;
    });

    await assert.rejects(singleton.get(), /init failed/);
    assert.equal(singleton.state, 'UNINITIALIZED');

    assert.equal(await singleton.get(), 2);
    assert.equal(await singleton.get(), 2);
    assert.equal(inits, 2);
  });
});
