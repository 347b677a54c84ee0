import { Logger } from '../types/common';
import { truncateAddress } from './addresses';

/**
 * Runs tasks one at a time per key, in arrival order.
 *
 * Every operation that reads and writes a pair holds that pair's key for
 * its whole duration, so no two operations on the same pair interleave.
 * Tasks on unrelated keys run concurrently.
 */
export class SerialExecutor {
  private tails = new Map<string, Promise<void>>();
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Run `fn` while holding every key in `keys`.
   *
   * Keys are acquired in sorted order so that two tasks sharing several
   * keys cannot wait on each other.
   */
  async run<T>(keys: string[], fn: () => Promise<T>, label: string = 'task'): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const releases: Array<() => void> = [];

    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key, label));
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) release();
    }
  }

  /** Number of keys with a running or queued task. */
  get activeKeys(): number {
    return this.tails.size;
  }

  private async acquire(key: string, label: string): Promise<() => void> {
    const previous = this.tails.get(key);

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = (previous ?? Promise.resolve()).then(() => current);
    this.tails.set(key, tail);

    if (previous) {
      this.logger?.debug(`${label}: waiting for ${truncateAddress(key)}`);
      await previous;
    }

    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}
