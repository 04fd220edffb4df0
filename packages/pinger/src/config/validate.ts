import { MAX_TIMER_DELAY_MS } from "@keepalive-pinger/shared";
import { ConfigError } from "../errors/index.js";
import type { PingerConfig } from "../types/index.js";

function requirePositive(field: keyof PingerConfig, value: number): void {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigError(field, `expected a positive number, got ${value}`);
	}
}

function requireFraction(field: keyof PingerConfig, value: number): void {
	if (!Number.isFinite(value) || value < 0 || value > 1) {
		throw new ConfigError(field, `expected a value between 0 and 1, got ${value}`);
	}
}

function requireTimerRange(field: keyof PingerConfig, label: string, value: number): void {
	if (value > MAX_TIMER_DELAY_MS) {
		throw new ConfigError(field, `${label} ${value}ms exceeds the timer limit of ${MAX_TIMER_DELAY_MS}ms`);
	}
}

function requireHttpUrl(value: string): void {
	let parsed: URL;
	try {
		parsed = new URL(value);
	} catch {
		throw new ConfigError("targetUrls", `not a valid URL: ${value}`);
	}
	if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
		throw new ConfigError("targetUrls", `only http and https are supported: ${value}`);
	}
}

/**
 * Reject configuration the loop cannot run with.
 * @throws ConfigError naming the first offending field.
 */
export function validateConfig(config: PingerConfig): PingerConfig {
	if (config.targetUrls.length === 0) {
		throw new ConfigError("targetUrls", "at least one target URL is required");
	}
	config.targetUrls.forEach(requireHttpUrl);

	requirePositive("minIntervalMs", config.minIntervalMs);
	requirePositive("maxIntervalMs", config.maxIntervalMs);
	if (config.minIntervalMs > config.maxIntervalMs) {
		throw new ConfigError(
			"minIntervalMs",
			`minimum interval ${config.minIntervalMs}ms exceeds maximum ${config.maxIntervalMs}ms`,
		);
	}
	requireFraction("jitterFraction", config.jitterFraction);
	requireTimerRange(
		"maxIntervalMs",
		"maximum interval with jitter",
		Math.ceil(config.maxIntervalMs * (1 + config.jitterFraction)),
	);
	requirePositive("requestTimeoutMs", config.requestTimeoutMs);
	requireTimerRange("requestTimeoutMs", "request timeout", config.requestTimeoutMs);
	requirePositive("maxAttempts", config.maxAttempts);
	requirePositive("baseBackoffMs", config.baseBackoffMs);
	requirePositive("loopErrorPauseMs", config.loopErrorPauseMs);

	if (config.userAgents.length === 0) {
		throw new ConfigError("userAgents", "at least one User-Agent is required");
	}
	if (config.queryParamKeys.length === 0) {
		throw new ConfigError("queryParamKeys", "at least one query parameter key is required");
	}
	requireFraction("queryParamProbability", config.queryParamProbability);

	return config;
}
