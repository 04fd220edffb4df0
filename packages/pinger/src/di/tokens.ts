/**
 * Injection tokens (identifiers) for all dependencies in the pinger package.
 * Uses inversify-style Symbol identifiers for type-safe dependency injection.
 */

import type {
	Clock,
	LogSink,
	Logger,
	PingClient,
	Pinger,
	PingerConfig,
	RandomSource,
	Sleep,
} from "../types/index.js";

/**
 * Token type for identifying dependencies in the container.
 * Using symbols ensures type safety and avoids string collision.
 */
export type Token<T> = symbol & { __type?: T };

/**
 * Creates a typed injection token using Symbol.for for consistency.
 */
export function createToken<T>(description: string): Token<T> {
	return Symbol.for(description) as Token<T>;
}

// ============================================================================
// Configuration
// ============================================================================

export const CONFIG = createToken<PingerConfig>("PingerConfig");

// ============================================================================
// Logging
// ============================================================================

/**
 * Token for the sinks every logger writes to (stdout, and the log file when it opened).
 */
export const LOG_SINKS = createToken<readonly LogSink[]>("LogSinks");

/**
 * Token for a logger factory that creates prefixed loggers.
 */
export type LoggerFactory = (prefix: string) => Logger;
export const LOGGER_FACTORY = createToken<LoggerFactory>("LoggerFactory");

export const LOGGER = createToken<Logger>("Logger");

// ============================================================================
// Runtime
// ============================================================================

export const RANDOM = createToken<RandomSource>("RandomSource");
export const CLOCK = createToken<Clock>("Clock");
export const SLEEP = createToken<Sleep>("Sleep");

// ============================================================================
// Core Services
// ============================================================================

export const PING_CLIENT = createToken<PingClient>("PingClient");
export const PINGER = createToken<Pinger>("Pinger");

// ============================================================================
// Token groups for documentation
// ============================================================================

export const TOKENS = {
	CONFIG,
	LOG_SINKS,
	LOGGER_FACTORY,
	LOGGER,
	RANDOM,
	CLOCK,
	SLEEP,
	PING_CLIENT,
	PINGER,
} as const;
