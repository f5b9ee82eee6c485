/** Returns microseconds from an arbitrary fixed origin. */
export type Clock = () => bigint;

/**
 * Monotonic microsecond clock, unaffected by wall-clock adjustments.
 */
export const monotonicNowUs: Clock = () => process.hrtime.bigint() / 1000n;
