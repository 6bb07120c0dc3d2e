import { TimeoutError } from "../errors";

export type Release = () => void;

type Waiter = {
  grant: (release: Release) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
};

/** FIFO mutual exclusion; each waiter gives up after its own deadline. */
export class Mutex {
  private locked = false;
  private readonly queue: Waiter[] = [];

  get pending(): number {
    return this.queue.length;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  acquire(timeoutMs: number): Promise<Release> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.releaser());
    }
    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = {
        grant: resolve,
        reject,
        timer: setTimeout(() => {
          const at = this.queue.indexOf(waiter);
          if (at !== -1) this.queue.splice(at, 1);
          reject(new TimeoutError(`lock not acquired within ${timeoutMs}ms`, timeoutMs));
        }, timeoutMs),
      };
      this.queue.push(waiter);
    });
  }

  /** Reject everyone still queued; the current holder keeps the lock. */
  cancelAll(err: Error): void {
    for (const waiter of this.queue.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(err);
    }
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next === undefined) {
        this.locked = false;
        return;
      }
      clearTimeout(next.timer);
      next.grant(this.releaser());
    };
  }
}
