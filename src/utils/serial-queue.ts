/**
 * Single-consumer task queue.
 *
 * Tasks run one at a time in submission order. A rejected task never breaks
 * the chain: its error goes to the caller's promise and the next task starts.
 */

import { createLogger } from './logger.js';

const log = createLogger('queue');

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  /**
   * Enqueue a task. The returned promise settles with the task's outcome.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);

    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );

    return result;
  }

  /**
   * Resolves once every task enqueued so far has settled.
   */
  async drain(): Promise<void> {
    let observed: Promise<void> | null = null;
    while (observed !== this.tail) {
      observed = this.tail;
      await observed;
    }
  }

  get size(): number {
    return this.pending;
  }

  private settle(): void {
    this.pending--;
    if (this.pending === 0) {
      log.debug(`${this.name}: queue idle`);
    }
  }
}
