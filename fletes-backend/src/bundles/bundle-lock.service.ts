import { Injectable } from '@nestjs/common';

/**
 * In-process keyed mutex. Writers on the same bundle id run one at a time;
 * the optimistic version check in the store covers other processes.
 */
@Injectable()
export class BundleLockService {
  private readonly tails = new Map<string, Promise<void>>();

  /** Run `task` holding every key; keys are taken in sorted order */
  async withLocks<T>(keys: readonly string[], task: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const releases: Array<() => void> = [];
    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await task();
    } finally {
      releases.reverse().forEach(release => release());
    }
  }

  withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    return this.withLocks([key], task);
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}
