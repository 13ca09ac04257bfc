import { Injectable } from '@nestjs/common';

/**
 * Per-session mutual exclusion. Turns for one session id run strictly one after
 * another; different ids never wait on each other.
 */
@Injectable()
export class SessionLockService {
  /** Tail of the queue per session id */
  private readonly tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(id: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(id) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(id, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(id) === tail) {
        this.tails.delete(id);
      }
    }
  }

  /** True while a turn for this id is running or queued */
  isBusy(id: string): boolean {
    return this.tails.has(id);
  }
}
