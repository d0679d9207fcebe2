import type { Seconds } from "@antiphon/contracts";

/** Current wall-clock time in seconds. */
export function now(): Seconds {
  return Date.now() / 1000;
}

/**
 * Sleep for `seconds`. Resolves early if `wake` settles first.
 */
export function sleep(seconds: Seconds, wake?: Promise<unknown>): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, Math.max(0, seconds) * 1000);
    if (wake) {
      void wake.then(
        () => {
          clearTimeout(timer);
          resolve();
        },
        () => {
          clearTimeout(timer);
          resolve();
        }
      );
    }
  });
}

/**
 * Sleep until wall-clock `time`. Timers may fire a little early, so this
 * re-arms until the deadline has really passed. Returns false if woken early.
 */
export async function sleepUntil(time: Seconds, wake?: Promise<unknown>): Promise<boolean> {
  let woken = false;
  void wake?.then(
    () => { woken = true; },
    () => { woken = true; }
  );
  while (!woken && now() < time) {
    await sleep(time - now(), wake);
  }
  return !woken;
}
