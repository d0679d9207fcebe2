import type { Seconds } from "@antiphon/contracts";

/**
 * Whole ticks to delay a response whose generation finished at `now`.
 *
 * Zero while less than a quarter tick has passed since the intended
 * start; otherwise enough ticks to land the start on the next tick
 * boundary after `now`.
 */
export function computePushBackTicks(now: Seconds, responseStartTime: Seconds, tickDuration: Seconds): number {
  const overrun = now - responseStartTime;
  if (tickDuration <= 0 || overrun < tickDuration / 4) return 0;
  return Math.floor(overrun / tickDuration) + 1;
}
