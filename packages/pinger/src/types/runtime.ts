/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

/** Returns the current time in Unix milliseconds, like Date.now */
export type Clock = () => number;

/**
 * Suspends for `ms` milliseconds. Resolves early when `signal` aborts.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
