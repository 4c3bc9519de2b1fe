/**
 * Monotonic millisecond clock. Injected wherever timing decisions are made so
 * tests can drive time explicitly.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => performance.now(),
};
