import { INTERVAL_DEFAULTS } from "@keepalive-pinger/shared";
import type { PingerConfig, RandomSource } from "../types/index.js";
import { uniform } from "../utils/index.js";

export type IntervalBounds = Pick<PingerConfig, "minIntervalMs" | "maxIntervalMs" | "jitterFraction">;

/**
 * Draw the wait before the next cycle.
 *
 * A base is drawn uniformly from [min, max], then the result uniformly from
 * base ± jitter. Never shorter than one second. Draws are independent of
 * previous intervals.
 */
export function computeNextIntervalMs(bounds: IntervalBounds, random: RandomSource): number {
	const base = uniform(bounds.minIntervalMs, bounds.maxIntervalMs, random);
	const jitter = base * bounds.jitterFraction;
	const value = uniform(base - jitter, base + jitter, random);
	return Math.max(INTERVAL_DEFAULTS.FLOOR_MS, value);
}
