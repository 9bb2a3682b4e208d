export type Release = () => void;

type LockMode = 'read' | 'write';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

/**
 * Promise-based reader/writer lock. Any number of readers, or one writer.
 * Waiters are granted in arrival order, so a reader that arrives behind a
 * waiting writer waits for it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly queue: Waiter[] = [];

  get activeReaders(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  get pending(): number {
    return this.queue.length;
  }

  acquireRead(): Promise<Release> {
    return this.acquire('read');
  }

  acquireWrite(): Promise<Release> {
    return this.acquire('write');
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private acquire(mode: LockMode): Promise<Release> {
    return new Promise<Release>((resolve) => {
      this.queue.push({ mode, grant: () => resolve(this.releaser(mode)) });
      this.drain();
    });
  }

  private releaser(mode: LockMode): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (mode === 'write') {
        this.writing = false;
      } else {
        this.readers--;
      }
      this.drain();
    };
  }

  private drain() {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (this.writing) return;
      if (next.mode === 'write') {
        if (this.readers > 0) return;
        this.writing = true;
      } else {
        this.readers++;
      }
      this.queue.shift();
      next.grant();
    }
  }
}
