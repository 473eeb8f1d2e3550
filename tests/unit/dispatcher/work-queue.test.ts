import { describe, expect, test } from 'vitest';

import { WorkQueue } from '../../../src/dispatcher/work-queue.js';
import {
  QueueFullError,
  RejectedError,
} from '../../../src/errors/app-error.js';

describe('WorkQueue', () => {
  test('rejects a non-positive capacity', () => {
    expect(() => new WorkQueue<number>(0)).toThrow(RangeError);
  });

  test('delivers items in FIFO order', async () => {
    const queue = new WorkQueue<number>(3);
    queue.tryEnqueue(1);
    queue.tryEnqueue(2);
    queue.tryEnqueue(3);

    expect(queue.depth).toBe(3);
    expect(await queue.dequeue()).toBe(1);
    expect(await queue.dequeue()).toBe(2);
    expect(await queue.dequeue()).toBe(3);
    expect(queue.depth).toBe(0);
  });

  test('tryEnqueue reports a full queue', () => {
    const queue = new WorkQueue<string>(1);

    expect(queue.tryEnqueue('a')).toBe(true);
    expect(queue.tryEnqueue('b')).toBe(false);
    expect(queue.depth).toBe(1);
  });

  test('hands items straight to a waiting consumer', async () => {
    const queue = new WorkQueue<string>(1);
    const waiting = queue.dequeue();
    expect(queue.waitingConsumers).toBe(1);

    expect(queue.tryEnqueue('direct')).toBe(true);

    expect(await waiting).toBe('direct');
    expect(queue.depth).toBe(0);
  });

  test('enqueue with no timeout fails at once when full', async () => {
    const queue = new WorkQueue<number>(1);
    queue.tryEnqueue(1);

    const error = await queue
      .enqueue(2, { timeoutMs: 0 })
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(QueueFullError);
    expect(queue.blockedProducers).toBe(0);
  });

  test('a blocked producer is admitted when space frees up', async () => {
    const queue = new WorkQueue<number>(1);
    queue.tryEnqueue(1);

    const blocked = queue.enqueue(2, { timeoutMs: 1000 });
    expect(queue.blockedProducers).toBe(1);

    expect(await queue.dequeue()).toBe(1);
    await blocked;

    expect(queue.blockedProducers).toBe(0);
    expect(await queue.dequeue()).toBe(2);
  });

  test('a blocked producer gives up after its timeout', async () => {
    const queue = new WorkQueue<number>(1);
    queue.tryEnqueue(1);

    await expect(queue.enqueue(2, { timeoutMs: 20 })).rejects.toBeInstanceOf(
      QueueFullError
    );
    expect(queue.blockedProducers).toBe(0);
    expect(queue.depth).toBe(1);
  });

  test('close wakes idle consumers with null', async () => {
    const queue = new WorkQueue<number>(2);
    const waiting = queue.dequeue();

    queue.close();

    expect(await waiting).toBeNull();
    expect(queue.closed).toBe(true);
  });

  test('queued items remain dequeueable after close', async () => {
    const queue = new WorkQueue<number>(2);
    queue.tryEnqueue(7);
    queue.close();

    expect(await queue.dequeue()).toBe(7);
    expect(await queue.dequeue()).toBeNull();
  });

  test('close keeps blocked producers and rejects later enqueues', async () => {
    const queue = new WorkQueue<number>(1);
    queue.tryEnqueue(1);
    const blocked = queue.enqueue(2, { timeoutMs: 1000 });

    queue.close();

    expect(queue.blockedProducers).toBe(1);
    expect(() => queue.tryEnqueue(3)).toThrow(RejectedError);
    await expect(queue.enqueue(3, { timeoutMs: 10 })).rejects.toMatchObject({
      reason: 'closed',
    });

    await expect(queue.dequeue()).resolves.toBe(1);
    await expect(blocked).resolves.toBeUndefined();
    await expect(queue.dequeue()).resolves.toBe(2);
    await expect(queue.dequeue()).resolves.toBeNull();
  });

  test('drain pulls through producers blocked before close', async () => {
    const queue = new WorkQueue<number>(1);
    queue.tryEnqueue(1);
    const blocked = queue.enqueue(2, { timeoutMs: 1000 });
    queue.close();

    expect(queue.drain()).toEqual([1, 2]);
    await expect(blocked).resolves.toBeUndefined();
    expect(queue.blockedProducers).toBe(0);
  });

  test('drain removes everything still queued', () => {
    const queue = new WorkQueue<number>(5);
    queue.tryEnqueue(1);
    queue.tryEnqueue(2);
    queue.tryEnqueue(3);

    expect(queue.drain()).toEqual([1, 2, 3]);
    expect(queue.depth).toBe(0);
  });

  test('keeps order across many enqueue and dequeue cycles', async () => {
    const queue = new WorkQueue<number>(4);
    const received: number[] = [];

    for (let value = 0; value < 3000; value += 1) {
      queue.tryEnqueue(value);
      if (value % 2 === 1) {
        const first = await queue.dequeue();
        const second = await queue.dequeue();
        if (first !== null) received.push(first);
        if (second !== null) received.push(second);
      }
    }

    expect(received).toHaveLength(3000);
    expect(received.every((value, index) => value === index)).toBe(true);
  });
});
