export type Release = () => void;

export class LockAbortedError extends Error {
  constructor() {
    super("lock wait aborted");
    this.name = "LockAbortedError";
  }
}

/** FIFO async mutex. The release function is idempotent. */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  acquire(signal?: AbortSignal): Promise<Release> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new LockAbortedError());
        return;
      }
      const grant = () => {
        signal?.removeEventListener("abort", onAbort);
        this.locked = true;
        resolve(this.releaser());
      };
      const onAbort = () => {
        const idx = this.waiters.indexOf(grant);
        if (idx !== -1) this.waiters.splice(idx, 1);
        reject(new LockAbortedError());
      };
      if (!this.locked) {
        grant();
        return;
      }
      this.waiters.push(grant);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  async runExclusive<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.locked = false;
      }
    };
  }
}

/** One mutex per exclusive hardware channel, e.g. "gpio:26". */
export class ChannelLocks {
  private locks = new Map<string, Mutex>();

  get(channel: string): Mutex {
    let lock = this.locks.get(channel);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(channel, lock);
    }
    return lock;
  }

  channels(): string[] {
    return Array.from(this.locks.keys()).sort();
  }
}
