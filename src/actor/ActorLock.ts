/**
 * Readers/writer lock guarding one actor's state
 *
 * Shared holders run concurrently; an exclusive holder runs alone. Waiters
 * are granted strictly in arrival order, so a queued writer is never
 * starved by a stream of readers.
 */

type Waiter = {
  exclusive: boolean;
  grant: () => void;
};

export class ActorLock {
  private readers = 0;
  private writing = false;
  private waiters: Waiter[] = [];

  /**
   * Run `task` alongside other shared holders
   */
  async shared<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire(false);
    try {
      return await task();
    } finally {
      this.readers--;
      this.drain();
    }
  }

  /**
   * Run `task` with no other holder
   */
  async exclusive<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire(true);
    try {
      return await task();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  /**
   * Number of tasks waiting for the lock
   */
  get pending(): number {
    return this.waiters.length;
  }

  private acquire(exclusive: boolean): Promise<void> {
    if (this.waiters.length === 0 && this.compatible(exclusive)) {
      this.take(exclusive);
      return Promise.resolve();
    }

    return new Promise(resolve => {
      this.waiters.push({ exclusive, grant: resolve });
    });
  }

  private compatible(exclusive: boolean): boolean {
    if (this.writing) return false;
    return exclusive ? this.readers === 0 : true;
  }

  private take(exclusive: boolean): void {
    if (exclusive) {
      this.writing = true;
    } else {
      this.readers++;
    }
  }

  private drain(): void {
    while (this.waiters.length > 0 && this.compatible(this.waiters[0].exclusive)) {
      const next = this.waiters.shift();
      if (!next) return;
      this.take(next.exclusive);
      next.grant();
    }
  }
}
