import type { Seconds } from "@antiphon/contracts";

import { Deferred } from "./Deferred";
import { sleep } from "./clock";

/**
 * Promise-based condition variable. Waiters are released by the next
 * notify, or when their timeout elapses.
 */
export class Condition {
  private waiters: Set<Deferred> = new Set();

  /**
   * Wait for a notify. With a timeout, resolves after `timeout` seconds at
   * the latest. Resolves true when notified.
   */
  async wait(timeout?: Seconds): Promise<boolean> {
    const waiter = new Deferred();
    this.waiters.add(waiter);

    if (timeout === undefined) {
      await waiter.promise;
      return true;
    }

    await sleep(timeout, waiter.promise);
    this.waiters.delete(waiter);
    return waiter.settled;
  }

  notifyAll(): void {
    const waiters = this.waiters;
    this.waiters = new Set();
    for (const waiter of waiters) waiter.resolve();
  }

  get waiting(): number {
    return this.waiters.size;
  }
}
