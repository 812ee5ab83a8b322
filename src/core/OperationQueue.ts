/**
 * OperationQueue - Runs async jobs strictly one after another.
 *
 * Every key event goes through this queue, so a keypress that arrives while
 * a git call is in flight waits until the previous job has finished and the
 * state it produced is in place.
 */

import { EventEmitter } from 'node:events';

type QueueEventMap = {
  'busy-change': [boolean];
};

export class OperationQueue extends EventEmitter<QueueEventMap> {
  private queue: Array<() => Promise<void>> = [];
  private isProcessing = false;
  private busy = false;

  /**
   * Enqueue a job. Resolves or rejects with the job's own outcome.
   */
  enqueue<T>(operation: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() =>
        Promise.resolve()
          .then(operation)
          .then(resolve, (error: unknown) => {
            reject(error instanceof Error ? error : new Error(String(error)));
          })
      );
      this.processNext();
    });
  }

  private processNext(): void {
    if (this.isProcessing) return;

    const job = this.queue.shift();
    if (!job) {
      this.setBusy(false);
      return;
    }

    this.isProcessing = true;
    this.setBusy(true);

    // job() never rejects: its outcome is routed to the enqueue() promise
    void job().finally(() => {
      this.isProcessing = false;
      this.processNext();
    });
  }

  private setBusy(busy: boolean): void {
    if (this.busy !== busy) {
      this.busy = busy;
      this.emit('busy-change', busy);
    }
  }
}
