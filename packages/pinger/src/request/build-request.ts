import {
	ACCEPT_HEADER,
	type PingRequest,
	QUERY_PARAM_SUFFIX_MAX,
} from "@keepalive-pinger/shared";
import type { Clock, PingerConfig, RandomSource } from "../types/index.js";
import { pickOne, randomInt } from "../utils/index.js";

/**
 * The part of the configuration that shapes a request.
 */
export type RequestRandomization = Pick<PingerConfig, "userAgents" | "queryParamKeys" | "queryParamProbability">;

/**
 * Pick the target for a cycle.
 */
export function pickTarget(urls: readonly string[], random: RandomSource): string {
	return pickOne(urls, random);
}

/**
 * Maybe add one randomized query parameter to `url`.
 *
 * The value is `<unix seconds>_<1..99999>`. Existing parameters are kept
 * (one with the same name is replaced); scheme, host, path and fragment never change.
 */
export function randomizeUrl(
	url: string,
	options: Pick<RequestRandomization, "queryParamKeys" | "queryParamProbability">,
	random: RandomSource,
	clock: Clock,
): string {
	if (random() >= options.queryParamProbability) {
		return url;
	}

	const parsed = new URL(url);
	const key = pickOne(options.queryParamKeys, random);
	const unixSeconds = Math.floor(clock() / 1000);
	parsed.searchParams.set(key, `${unixSeconds}_${randomInt(1, QUERY_PARAM_SUFFIX_MAX, random)}`);
	return parsed.toString();
}

export function randomHeaders(userAgents: readonly string[], random: RandomSource): Record<string, string> {
	return {
		"User-Agent": pickOne(userAgents, random),
		"Accept": ACCEPT_HEADER,
	};
}

/**
 * Build a fresh request for one attempt at `target`.
 */
export function buildPingRequest(
	target: string,
	options: RequestRandomization,
	random: RandomSource,
	clock: Clock,
): PingRequest {
	return {
		headers: randomHeaders(options.userAgents, random),
		url: randomizeUrl(target, options, random, clock),
	};
}
