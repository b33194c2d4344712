/**
 * Fair mutual exclusion over the shared channel
 *
 * Waiters are served strictly in arrival order: on release the lock is handed
 * straight to the oldest waiter, so a newcomer can never overtake it.
 */

export type Release = () => void;

export class ChannelLock {
  private locked = false;
  private readonly waiters: Array<(release: Release) => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Number of callers waiting for the lock
   */
  get queueLength(): number {
    return this.waiters.length;
  }

  /**
   * Resolve with a release function once the lock is held. Calling the
   * release function more than once has no effect.
   */
  acquire(): Promise<Release> {
    return new Promise((resolve) => {
      if (this.locked) {
        this.waiters.push(resolve);
        return;
      }
      this.locked = true;
      resolve(this.createRelease());
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const next = this.waiters.shift();
      if (next) {
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
