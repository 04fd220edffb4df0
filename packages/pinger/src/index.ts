/**
 * Pinger package public API
 *
 * This module exports the keepalive loop, its building blocks and configuration types.
 */

// Pinger
export { PingerImpl, initialCycleState } from "./pinger.js";
export type { Pinger } from "./types/pinger.js";

// Configuration
export { getDefaultConfig, loadConfig, validateConfig } from "./config/index.js";
export type { PingerConfig } from "./types/pinger-config.js";

// Errors
export { ConfigError, PingerError } from "./errors/index.js";

// Building blocks
export { HttpPingClient } from "./client/index.js";
export { buildPingRequest, pickTarget, randomHeaders, randomizeUrl } from "./request/index.js";
export { deliver, retryDelayMs, streakBackoffMs, transition } from "./retry/index.js";
export type { DeliveryContext, RetryPolicy } from "./retry/index.js";
export { computeNextIntervalMs } from "./schedule/index.js";

// Logging
export { ConsoleSink, FileSink, LoggerImpl, openLogSinks, setLogLevel } from "./logger/index.js";

// Interface types
export type { Clock, LogRecord, LogSink, Logger, PingClient, RandomSource, Sleep } from "./types/index.js";

// Dependency Injection
export {
	ContainerImpl,
	createContainer,
	createToken,
	createPinger,
	createPingerContainer,
	configureContainer,
	TOKENS,
} from "./di/index.js";
export type { Container, Factory, LoggerFactory, Token } from "./di/index.js";
