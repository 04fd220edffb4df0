/**
 * Type definitions for the pinger package.
 */
export type { Logger, LogRecord, LogSink } from "./logger.js";
export type { PingClient } from "./ping-client.js";
export type { Pinger } from "./pinger.js";
export type { PingerConfig } from "./pinger-config.js";
export type { Clock, RandomSource, Sleep } from "./runtime.js";
