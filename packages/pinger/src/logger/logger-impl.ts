import type { LogRecord, LogSink, Logger } from "../types/index.js";
import { LOG_LEVELS, getCurrentLevel } from "./log-level.js";
import { ConsoleSink } from "./sinks.js";

export class LoggerImpl implements Logger {
	constructor(
		private readonly prefix: string,
		private readonly sinks: readonly LogSink[] = [new ConsoleSink()],
	) {}

	private log(level: LogRecord["level"], message: string): void {
		if (LOG_LEVELS[level] < LOG_LEVELS[getCurrentLevel()]) {
			return;
		}
		const record: LogRecord = {
			timestamp: new Date(),
			level,
			prefix: this.prefix,
			message,
		};
		for (const sink of this.sinks) {
			sink.write(record);
		}
	}

	debug(message: string): void {
		this.log("debug", message);
	}

	info(message: string): void {
		this.log("info", message);
	}

	warn(message: string): void {
		this.log("warn", message);
	}

	error(message: string): void {
		this.log("error", message);
	}
}
