import { QueueClosedError, QueueFullError } from "@incident-relay/shared";

type Waiter<T> = (item: T | null) => void;

/**
 * FIFO hand-off between `enqueue` callers and the worker loop.
 * Pushing past `capacity` throws instead of blocking the caller.
 */
export class SeedQueue<T = number> {
  private readonly items: T[] = [];
  private readonly waiters: Array<Waiter<T>> = [];
  private closed = false;

  public constructor(private readonly capacity: number = Number.POSITIVE_INFINITY) {}

  public get size(): number {
    return this.items.length;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public push(item: T): void {
    if (this.closed) {
      throw new QueueClosedError();
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }

    if (this.items.length >= this.capacity) {
      throw new QueueFullError(this.capacity);
    }

    this.items.push(item);
  }

  /** Next item, or null once the queue is closed or the signal aborts. */
  public async take(signal?: AbortSignal): Promise<T | null> {
    if (this.items.length > 0) {
      return this.items.shift() ?? null;
    }

    if (this.closed || signal?.aborted) {
      return null;
    }

    return new Promise<T | null>((resolve) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        resolve(null);
      };

      const waiter: Waiter<T> = (item) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(item);
      };

      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Wakes pending takers with null; queued items can still be drained. */
  public close(): void {
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }
}
