/**
 * CLI entry point for the pinger.
 * Runs the keepalive loop until SIGINT or SIGTERM.
 */

import "reflect-metadata";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig } from "./config/index.js";
import { createPinger } from "./di/index.js";
import { LoggerImpl, openLogSinks } from "./logger/index.js";

/**
 * Start the pinger with configuration from the environment.
 * Resolves once the loop has been stopped.
 */
export async function main(): Promise<void> {
	const config = loadConfig();
	const { sinks, warning } = openLogSinks(config.logFile);
	const logger = new LoggerImpl("main", sinks);

	if (warning !== null) {
		logger.warn(warning);
	}
	logger.info(`Starting keepalive pinger for ${config.targetUrls.length} target(s)`);

	const pinger = createPinger(config, sinks);

	let isShuttingDown = false;
	const shutdown = (signal: NodeJS.Signals): void => {
		if (isShuttingDown) return;
		isShuttingDown = true;

		pinger.stop();
		logger.info(`Stopped by interrupt (${signal})`);
		process.exit(0);
	};

	process.on("SIGINT", shutdown);
	process.on("SIGTERM", shutdown);

	await pinger.start();
}

/**
 * Check if this module is being run directly (as CLI entry point).
 */
function isMainModule(): boolean {
	const scriptPath = process.argv[1];
	if (!scriptPath) {
		return false;
	}
	return fileURLToPath(import.meta.url) === path.resolve(scriptPath);
}

if (isMainModule()) {
	main().catch((err: unknown) => {
		console.error("Pinger failed:", err);
		process.exit(1);
	});
}
