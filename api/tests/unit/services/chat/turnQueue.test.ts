import { describe, it, expect } from 'vitest';
import { KeyedSerialQueue } from '@/services/chat/turnQueue';
import { deferred } from '../../../helpers/fakes';

describe('KeyedSerialQueue', () => {
  it('runs tasks with the same key one at a time in submission order', async () => {
    const queue = new KeyedSerialQueue();
    const events: string[] = [];
    const gate = deferred();

    const first = queue.run('session-1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = queue.run('session-1', async () => {
      events.push('second:start');
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('runs tasks with different keys concurrently', async () => {
    const queue = new KeyedSerialQueue();
    const gate = deferred();
    const events: string[] = [];

    const blocked = queue.run('session-1', async () => {
      await gate.promise;
      events.push('session-1');
    });
    await queue.run('session-2', async () => {
      events.push('session-2');
    });

    expect(events).toEqual(['session-2']);
    gate.resolve();
    await blocked;
    expect(events).toEqual(['session-2', 'session-1']);
  });

  it('keeps going after a failed task and passes the failure to its caller', async () => {
    const queue = new KeyedSerialQueue();

    const failing = queue.run('session-1', async () => {
      throw new Error('boom');
    });
    const next = queue.run('session-1', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('forgets a key once its work drains', async () => {
    const queue = new KeyedSerialQueue();

    await queue.run('session-1', async () => 'done');
    await new Promise((resolve) => setImmediate(resolve));

    expect(queue.activeKeys).toBe(0);
  });
});
