// ═══════════════════════════════════════════════════════════════════════════════
// CLOCK — Monotonic Time Source for Lifetime Evaluation
// ifaddr Address Model
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Supplies the current time in the units lifetimes are expressed in.
 */
export interface Clock {
  /** Milliseconds on a monotonic timeline */
  now(): number;
}

const NANOS_PER_MILLI = 1_000_000n;

/**
 * Monotonic milliseconds from `process.hrtime`. Unaffected by wall-clock
 * adjustments; the origin is arbitrary but fixed for the process lifetime.
 */
export const monotonicClock: Clock = {
  now: () => Number(process.hrtime.bigint() / NANOS_PER_MILLI),
};

/**
 * Clock frozen at one instant.
 */
export function fixedClock(now: number): Clock {
  return { now: () => now };
}
