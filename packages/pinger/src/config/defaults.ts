/**
 * Default configuration values for the pinger.
 */

import {
	DEFAULT_LOG_FILE,
	DEFAULT_TARGET_URLS,
	DELIVERY_DEFAULTS,
	INTERVAL_DEFAULTS,
	QUERY_PARAM_KEYS,
	QUERY_PARAM_PROBABILITY,
	USER_AGENTS,
} from "@keepalive-pinger/shared";
import type { PingerConfig } from "../types/index.js";

export function getDefaultConfig(): PingerConfig {
	return {
		targetUrls: DEFAULT_TARGET_URLS,
		minIntervalMs: INTERVAL_DEFAULTS.MIN_INTERVAL_MS,
		maxIntervalMs: INTERVAL_DEFAULTS.MAX_INTERVAL_MS,
		jitterFraction: INTERVAL_DEFAULTS.JITTER_FRACTION,
		requestTimeoutMs: DELIVERY_DEFAULTS.REQUEST_TIMEOUT_MS,
		maxAttempts: DELIVERY_DEFAULTS.MAX_ATTEMPTS,
		baseBackoffMs: DELIVERY_DEFAULTS.BASE_BACKOFF_MS,
		loopErrorPauseMs: DELIVERY_DEFAULTS.LOOP_ERROR_PAUSE_MS,
		logFile: DEFAULT_LOG_FILE,
		userAgents: USER_AGENTS,
		queryParamKeys: QUERY_PARAM_KEYS,
		queryParamProbability: QUERY_PARAM_PROBABILITY,
	};
}
