import { StorageUnavailableError } from "../../common/errors";

export type Release = () => void;

export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  isLocked(): boolean {
    return this.locked || this.queue.length > 0;
  }

  /**
   * Resolves with a release function once the lock is held. When `timeoutMs`
   * elapses first, the waiter leaves the queue and the promise rejects with
   * StorageUnavailableError.
   */
  async lock(timeoutMs?: number): Promise<Release> {
    return new Promise((resolve, reject) => {
      const release = () => {
        const next = this.queue.shift();
        if (next) {
          next();
        } else {
          this.locked = false;
        }
      };

      if (!this.locked) {
        this.locked = true;
        resolve(release);
        return;
      }

      let timer: NodeJS.Timeout | undefined;
      const waiter = () => {
        if (timer) {
          clearTimeout(timer);
        }
        resolve(release);
      };
      this.queue.push(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const index = this.queue.indexOf(waiter);
          if (index !== -1) {
            this.queue.splice(index, 1);
            reject(
              new StorageUnavailableError(`Timed out after ${timeoutMs}ms waiting for account lock`)
            );
          }
        }, timeoutMs);
      }
    });
  }
}

export class MutexMap {
  private readonly map = new Map<string, { mutex: Mutex; lastUsed: number }>();
  private cleanupInterval: NodeJS.Timeout | null = null;
  private readonly TTL_MS = 5 * 60 * 1000;
  private destroyed = false;

  constructor() {
    this.cleanupInterval = setInterval(() => {
      if (!this.destroyed) {
        this.cleanup();
      }
    }, 60_000);
    this.cleanupInterval.unref();
  }

  get(accountNumber: string): Mutex {
    const existing = this.map.get(accountNumber);
    if (existing) {
      existing.lastUsed = Date.now();
      return existing.mutex;
    }
    const created = { mutex: new Mutex(), lastUsed: Date.now() };
    this.map.set(accountNumber, created);
    return created.mutex;
  }

  size(): number {
    return this.map.size;
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, value] of this.map.entries()) {
      if (now - value.lastUsed > this.TTL_MS && !value.mutex.isLocked()) {
        this.map.delete(key);
      }
    }
  }

  destroy(): void {
    this.destroyed = true;
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.map.clear();
  }
}
