/**
 * Pinger configuration module.
 *
 * Load pinger configuration from environment variables and defaults.
 * Priority: Environment > Defaults
 */

import type { PingerConfig } from "../types/index.js";
import { getDefaultConfig } from "./defaults.js";
import { parseEnvVars } from "./env-parser.js";
import { validateConfig } from "./validate.js";

export { getDefaultConfig } from "./defaults.js";
export { validateConfig } from "./validate.js";

/**
 * Load and validate pinger configuration.
 * @throws ConfigError when the merged configuration cannot drive the loop.
 */
export function loadConfig(): PingerConfig {
	const env = parseEnvVars();
	const defaults = getDefaultConfig();

	// Merge with priority: Environment > Defaults
	return validateConfig({
		...defaults,
		targetUrls: env.targetUrls ?? defaults.targetUrls,
		minIntervalMs: env.minIntervalMs ?? defaults.minIntervalMs,
		maxIntervalMs: env.maxIntervalMs ?? defaults.maxIntervalMs,
		requestTimeoutMs: env.requestTimeoutMs ?? defaults.requestTimeoutMs,
		maxAttempts: env.maxAttempts ?? defaults.maxAttempts,
		baseBackoffMs: env.baseBackoffMs ?? defaults.baseBackoffMs,
		logFile: env.logFile ?? defaults.logFile,
	});
}
