import type { RandomSource } from "../types/index.js";

/**
 * Uniform pick from a non-empty list.
 */
export function pickOne<T>(items: readonly T[], random: RandomSource): T {
	if (items.length === 0) {
		throw new RangeError("Cannot pick from an empty list");
	}
	const index = Math.min(Math.floor(random() * items.length), items.length - 1);
	return items[index];
}

/**
 * Uniform integer in [min, max], both inclusive.
 */
export function randomInt(min: number, max: number, random: RandomSource): number {
	return min + Math.floor(random() * (max - min + 1));
}

/**
 * Uniform float in [min, max).
 */
export function uniform(min: number, max: number, random: RandomSource): number {
	return min + (max - min) * random();
}
