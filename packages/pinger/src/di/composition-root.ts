/**
 * Composition root for the pinger package.
 * Wires all dependencies together using the inversify-based DI container.
 */

import "reflect-metadata";
import type { LogSink, Pinger, PingerConfig } from "../types/index.js";
import { PingerImpl } from "../pinger.js";
import { ConsoleSink, LoggerImpl } from "../logger/index.js";
import { HttpPingClient } from "../client/index.js";
import { sleep } from "../utils/index.js";
import { type Container, createContainer } from "./container.js";
import {
	CLOCK,
	CONFIG,
	LOGGER,
	LOGGER_FACTORY,
	LOG_SINKS,
	type LoggerFactory,
	PINGER,
	PING_CLIENT,
	RANDOM,
	SLEEP,
} from "./tokens.js";

/**
 * Configure all dependencies in the container.
 * This is the single place where all wiring happens.
 */
export function configureContainer(
	container: Container,
	config: PingerConfig,
	sinks: readonly LogSink[] = [new ConsoleSink()],
): void {
	container.instance(CONFIG, config);
	container.instance(LOG_SINKS, sinks);

	container.singleton<LoggerFactory>(LOGGER_FACTORY, (c: Container) => {
		const logSinks = c.resolve(LOG_SINKS);
		return (prefix: string) => new LoggerImpl(prefix, logSinks);
	});

	container.singleton(LOGGER, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return factory("pinger");
	});

	container.instance(RANDOM, Math.random);
	container.instance(CLOCK, Date.now);
	container.instance(SLEEP, sleep);

	container.singleton(PING_CLIENT, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		const factory = c.resolve(LOGGER_FACTORY);
		return new HttpPingClient(cfg.requestTimeoutMs, factory("http"));
	});

	container.singleton(PINGER, (c: Container) => {
		return new PingerImpl(
			c.resolve(CONFIG),
			c.resolve(LOGGER),
			c.resolve(PING_CLIENT),
			c.resolve(RANDOM),
			c.resolve(CLOCK),
			c.resolve(SLEEP),
		);
	});
}

/**
 * Create and configure a container with all dependencies for the given config.
 */
export function createPingerContainer(config: PingerConfig, sinks?: readonly LogSink[]): Container {
	const container = createContainer();
	configureContainer(container, config, sinks);
	return container;
}

/**
 * Create and return the pinger from a fully configured container.
 */
export function createPinger(config: PingerConfig, sinks?: readonly LogSink[]): Pinger {
	return createPingerContainer(config, sinks).resolve(PINGER);
}
