/**
 * Dependency Injection module exports.
 */

// Re-export reflect-metadata to ensure it's loaded
import "reflect-metadata";

export { ContainerImpl, createContainer, type Container, type Factory } from "./container.js";
export {
	CLOCK,
	CONFIG,
	LOGGER,
	LOGGER_FACTORY,
	LOG_SINKS,
	PINGER,
	PING_CLIENT,
	RANDOM,
	SLEEP,
	TOKENS,
	createToken,
	type LoggerFactory,
	type Token,
} from "./tokens.js";
export { configureContainer, createPinger, createPingerContainer } from "./composition-root.js";
