import { describe, expect, test } from '@jest/globals';
import { RoomQueue } from '../roomQueue';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('RoomQueue', () => {
  test('runs tasks for one room in order, one at a time', async () => {
    const queue = new RoomQueue();
    const log: string[] = [];

    const slow = queue.run('R1', async () => {
      log.push('slow:start');
      await tick();
      await tick();
      log.push('slow:end');
      return 1;
    });
    const fast = queue.run('R1', () => {
      log.push('fast');
      return 2;
    });

    await expect(Promise.all([slow, fast])).resolves.toEqual([1, 2]);
    expect(log).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  test('does not hold one room behind another', async () => {
    const queue = new RoomQueue();
    const log: string[] = [];
    let unblock: () => void = () => undefined;
    const blocker = new Promise<void>((resolve) => {
      unblock = resolve;
    });

    const blocked = queue.run('A', async () => {
      await blocker;
      log.push('A');
    });
    await queue.run('B', () => {
      log.push('B');
    });

    expect(log).toEqual(['B']);
    unblock();
    await blocked;
    expect(log).toEqual(['B', 'A']);
  });

  test('a failing task does not stop the queue', async () => {
    const queue = new RoomQueue();

    const failed = queue.run('R1', () => {
      throw new Error('nope');
    });
    const next = queue.run('R1', () => 'ok');

    await expect(failed).rejects.toThrow('nope');
    await expect(next).resolves.toBe('ok');
  });
});
