/**
 * Promise-based mutual exclusion. Ownership is handed directly to the next
 * waiter on release, so acquisition order is FIFO.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  /** Take the lock if it is free. Returns a release function, or null when held. */
  tryAcquire(): (() => void) | null {
    if (this.locked) return null;
    this.locked = true;
    return this.releaser();
  }

  acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.releaser());
    }
    return new Promise((resolve) => {
      this.waiters.push(() => resolve(this.releaser()));
    });
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) next();
      else this.locked = false;
    };
  }
}
