/**
 * Read-preferring shared/exclusive lock for async code.
 *
 * Any number of readers may hold the lock together. A writer waits until
 * in-flight readers have released it and then excludes everyone until it
 * releases. While no writer holds the lock, new readers are admitted even if a
 * writer is queued; readers queued behind an active writer are all released
 * together when it finishes.
 *
 * The lock is not reentrant: acquiring the write side from inside a read
 * section deadlocks.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly waitingReaders: Array<() => void> = [];
  private readonly waitingWriters: Array<() => void> = [];

  get activeReaders(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  get pendingWriters(): number {
    return this.waitingWriters.length;
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  private acquireRead(): Promise<void> {
    if (!this.writing) {
      this.readers += 1;
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.waitingReaders.push(() => {
        this.readers += 1;
        resolve();
      });
    });
  }

  private releaseRead(): void {
    this.readers -= 1;
    if (this.readers === 0) {
      this.grantNextWriter();
    }
  }

  private acquireWrite(): Promise<void> {
    if (!this.writing && this.readers === 0) {
      this.writing = true;
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.waitingWriters.push(() => {
        this.writing = true;
        resolve();
      });
    });
  }

  private releaseWrite(): void {
    this.writing = false;

    if (this.waitingReaders.length > 0) {
      const grants = this.waitingReaders.splice(0);
      for (const grant of grants) {
        grant();
      }
      return;
    }

    this.grantNextWriter();
  }

  private grantNextWriter(): void {
    if (this.writing || this.readers > 0) {
      return;
    }
    const grant = this.waitingWriters.shift();
    if (grant) {
      grant();
    }
  }
}
