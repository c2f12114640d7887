import type { HookEvent } from "@usagebar/shared";
import type { SessionMonitor } from "./session-monitor.js";

/**
 * Unbounded single-consumer queue between whatever receives hook events and
 * the session monitor. `close` lets the consumer drain what is queued and
 * then finish.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly queue: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;
  private consumed = false;

  /** Returns false once the channel is closed */
  send(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) waiter({ value: item, done: false });
    else this.queue.push(item);
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter({ value: undefined, done: true });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.queue.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.consumed) throw new Error("EventChannel supports a single consumer");
    this.consumed = true;
    return {
      next: async (): Promise<IteratorResult<T>> => {
        if (this.queue.length > 0) {
          const value = this.queue.shift();
          if (value !== undefined) return { value, done: false };
        }
        if (this.closed) return { value: undefined, done: true };
        return new Promise<IteratorResult<T>>((resolve) => {
          this.waiters.push(resolve);
        });
      },
      return: async (): Promise<IteratorResult<T>> => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}

/** Feeds every event into the monitor until the channel closes; resolves with the count applied */
export async function consumeEvents(channel: EventChannel<HookEvent>, monitor: SessionMonitor): Promise<number> {
  let applied = 0;
  for await (const event of channel) {
    if (monitor.process(event)) applied += 1;
  }
  return applied;
}
