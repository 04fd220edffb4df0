/**
 * Environment variable parsing utilities for pinger configuration.
 */

import { LOG_FILE_ENV } from "@keepalive-pinger/shared";

export function parseEnvNumber(key: string): number | undefined {
	const value = process.env[key];
	if (value === undefined) {
		return undefined;
	}
	const parsed = parseInt(value, 10);
	return isNaN(parsed) ? undefined : parsed;
}

/**
 * Read a duration given in (possibly fractional) seconds and return milliseconds.
 */
export function parseEnvSecondsAsMs(key: string): number | undefined {
	const value = process.env[key];
	if (value === undefined || value.trim() === "") {
		return undefined;
	}
	const seconds = Number(value);
	return Number.isFinite(seconds) ? Math.round(seconds * 1000) : undefined;
}

/**
 * Read a comma-separated list, dropping blank entries.
 */
export function parseEnvList(key: string): string[] | undefined {
	const value = process.env[key];
	if (value === undefined) {
		return undefined;
	}
	const items = value.split(",").map(item => item.trim()).filter(item => item !== "");
	return items.length > 0 ? items : undefined;
}

export interface ParsedEnv {
	targetUrls?: string[];
	minIntervalMs?: number;
	maxIntervalMs?: number;
	requestTimeoutMs?: number;
	maxAttempts?: number;
	baseBackoffMs?: number;
	logFile?: string;
}

export function parseEnvVars(): ParsedEnv {
	return {
		targetUrls: parseEnvList("KEEPALIVE_URLS"),
		minIntervalMs: parseEnvSecondsAsMs("KEEPALIVE_MIN_INTERVAL_SECONDS"),
		maxIntervalMs: parseEnvSecondsAsMs("KEEPALIVE_MAX_INTERVAL_SECONDS"),
		requestTimeoutMs: parseEnvSecondsAsMs("KEEPALIVE_REQUEST_TIMEOUT_SECONDS"),
		maxAttempts: parseEnvNumber("KEEPALIVE_MAX_RETRIES"),
		baseBackoffMs: parseEnvSecondsAsMs("KEEPALIVE_BACKOFF_BASE_SECONDS"),
		logFile: process.env[LOG_FILE_ENV],
	};
}
