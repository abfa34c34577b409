export interface KeyedLease {
  release(): void;
}

interface Waiter {
  grant: () => void;
}

/** FIFO mutex per key. Different keys never wait on each other. */
export class KeyedLock {
  private readonly owners = new Set<string>();
  private readonly queues = new Map<string, Waiter[]>();

  acquire(key: string): Promise<KeyedLease> {
    return new Promise((resolve) => {
      let released = false;
      const makeLease = (): KeyedLease => ({
        release: () => {
          if (released) return;
          released = true;
          const queue = this.queues.get(key);
          const next = queue?.shift();
          if (queue && queue.length === 0) this.queues.delete(key);
          if (next) {
            next.grant();
            return;
          }
          this.owners.delete(key);
        },
      });

      if (!this.owners.has(key)) {
        this.owners.add(key);
        resolve(makeLease());
        return;
      }
      const queue = this.queues.get(key) ?? [];
      queue.push({ grant: () => resolve(makeLease()) });
      this.queues.set(key, queue);
    });
  }

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const lease = await this.acquire(key);
    try {
      return await task();
    } finally {
      lease.release();
    }
  }

  isHeld(key: string): boolean {
    return this.owners.has(key);
  }
}
