/**
 * Reader/Writer Lock
 *
 * Readers share the lock; a writer holds it alone. Waiters are served in
 * arrival order, so a queued writer is not starved by later readers.
 */

type Waiter = {
  mode: 'read' | 'write';
  grant: () => void;
};

export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private readonly queue: Waiter[] = [];

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.activeReaders--;
      this.drain();
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.writerActive = false;
      this.drain();
    }
  }

  private acquire(mode: Waiter['mode']): Promise<void> {
    return new Promise((resolve) => {
      this.queue.push({ mode, grant: resolve });
      this.drain();
    });
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (next === undefined || this.writerActive) {
        return;
      }
      if (next.mode === 'write') {
        if (this.activeReaders > 0) {
          return;
        }
        this.queue.shift();
        this.writerActive = true;
        next.grant();
        return;
      }
      this.queue.shift();
      this.activeReaders++;
      next.grant();
    }
  }
}
