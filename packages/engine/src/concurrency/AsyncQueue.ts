import type { Seconds } from "@antiphon/contracts";

import { Deferred } from "./Deferred";
import { sleep } from "./clock";

/** Returned by `get` when its timeout elapses with the queue still empty. */
export const QUEUE_TIMEOUT: unique symbol = Symbol("queue-timeout");

/**
 * Unbounded FIFO whose `get` waits for an item.
 */
export class AsyncQueue<T> {
  private items: Array<{ item: T }> = [];
  private getters: Array<Deferred<T>> = [];

  put(item: T): void {
    const getter = this.getters.shift();
    if (getter) {
      getter.resolve(item);
    } else {
      this.items.push({ item });
    }
  }

  async get(timeout?: Seconds): Promise<T | typeof QUEUE_TIMEOUT> {
    const next = this.items.shift();
    if (next) {
      return next.item;
    }

    const getter = new Deferred<T>();
    this.getters.push(getter);

    if (timeout === undefined) {
      return getter.promise;
    }

    await sleep(timeout, getter.promise);
    if (getter.settled) {
      return getter.promise;
    }
    this.getters = this.getters.filter((g) => g !== getter);
    return QUEUE_TIMEOUT;
  }

  get size(): number {
    return this.items.length;
  }
}
