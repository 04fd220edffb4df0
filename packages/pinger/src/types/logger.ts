import type { LogLevel } from "../logger/log-level.js";

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

/**
 * One emitted log line before formatting.
 */
export interface LogRecord {
	timestamp: Date;
	level: Exclude<LogLevel, "silent">;
	prefix: string;
	message: string;
}

/**
 * Destination for log records (stdout, a file, or a test buffer).
 */
export interface LogSink {
	write(record: LogRecord): void;
}
