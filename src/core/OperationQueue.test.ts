/**
 * Unit tests for OperationQueue
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { OperationQueue } from './OperationQueue.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('OperationQueue', () => {
  let queue: OperationQueue;

  beforeEach(() => {
    queue = new OperationQueue();
  });

  describe('enqueue', () => {
    it('executes a single operation and returns result', async () => {
      const result = await queue.enqueue(async () => 'hello');
      expect(result).toBe('hello');
    });

    it('executes operations sequentially', async () => {
      const order: number[] = [];

      const op1 = queue.enqueue(async () => {
        await delay(20);
        order.push(1);
      });
      const op2 = queue.enqueue(async () => {
        order.push(2);
      });
      const op3 = queue.enqueue(async () => {
        order.push(3);
      });

      await Promise.all([op1, op2, op3]);

      expect(order).toEqual([1, 2, 3]);
    });

    it('does not start the next operation before the previous one settles', async () => {
      let running = 0;
      let maxRunning = 0;
      const job = async (): Promise<void> => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await delay(5);
        running--;
      };

      await Promise.all([queue.enqueue(job), queue.enqueue(job), queue.enqueue(job)]);

      expect(maxRunning).toBe(1);
    });

    it('propagates errors', async () => {
      await expect(
        queue.enqueue(async () => {
          throw new Error('test error');
        })
      ).rejects.toThrow('test error');
    });

    it('wraps non-Error rejections', async () => {
      await expect(queue.enqueue(() => Promise.reject('plain'))).rejects.toThrow('plain');
    });

    it('continues processing after error', async () => {
      const op1 = queue
        .enqueue(async () => {
          throw new Error('error');
        })
        .catch((e: unknown) => e);
      const op2 = queue.enqueue(async () => 'success');

      const [r1, r2] = await Promise.all([op1, op2]);
      expect(r1).toBeInstanceOf(Error);
      expect(r2).toBe('success');
    });

    it('turns a synchronous throw into a rejection', async () => {
      await expect(
        queue.enqueue(() => {
          throw new Error('sync');
        })
      ).rejects.toThrow('sync');
    });
  });

  describe('busy-change', () => {
    it('reports busy while an operation runs and idle afterwards', async () => {
      const events: boolean[] = [];
      queue.on('busy-change', (busy) => events.push(busy));
      let release: () => void = () => {};
      const op = queue.enqueue(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          })
      );

      expect(events).toEqual([true]);
      await delay(0);
      release();
      await op;
      await delay(0);

      expect(events).toEqual([true, false]);
    });

    it('emits once per transition for a burst of operations', async () => {
      const events: boolean[] = [];
      queue.on('busy-change', (busy) => events.push(busy));

      await Promise.all([
        queue.enqueue(async () => 1),
        queue.enqueue(async () => 2),
        queue.enqueue(async () => 3),
      ]);
      await delay(0);

      expect(events).toEqual([true, false]);
    });
  });
});
