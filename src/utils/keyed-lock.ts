import { Injectable } from '@nestjs/common';

/**
 * In-process async mutex keyed by string.
 *
 * Tasks sharing a key run one after another in arrival order; tasks with
 * different keys run concurrently. A rejected task releases the key for the
 * next waiter and its rejection reaches only its own caller.
 */
@Injectable()
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(() => task());
    const tail = result.then(
      () => undefined,
      () => undefined,
    );

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
