import * as fs from "node:fs";
import type { LogRecord, LogSink } from "../types/index.js";
import { formatError } from "../utils/index.js";
import { formatLogLine } from "./format.js";

/**
 * Writes each record to stdout.
 */
export class ConsoleSink implements LogSink {
	write(record: LogRecord): void {
		console.log(formatLogLine(record));
	}
}

/**
 * Appends each record to a file opened once, synchronously, at startup.
 * After a failed write the sink reports the failure on stderr and goes quiet.
 */
export class FileSink implements LogSink {
	private fd: number | null;

	private constructor(readonly path: string, fd: number) {
		this.fd = fd;
	}

	/**
	 * Open `path` for appending. Throws when the file cannot be opened.
	 */
	static open(path: string): FileSink {
		return new FileSink(path, fs.openSync(path, "a"));
	}

	write(record: LogRecord): void {
		if (this.fd === null) {
			return;
		}
		try {
			fs.writeSync(this.fd, `${formatLogLine(record)}\n`);
		} catch (err) {
			console.error(`Log file ${this.path} is no longer writable: ${formatError(err)}`);
			this.close();
		}
	}

	close(): void {
		if (this.fd === null) {
			return;
		}
		const fd = this.fd;
		this.fd = null;
		try {
			fs.closeSync(fd);
		} catch (err) {
			console.error(`Failed to close log file ${this.path}: ${formatError(err)}`);
		}
	}
}

/**
 * Sinks opened for a run, plus the reason the file sink is missing, if it is.
 */
export interface OpenedLogSinks {
	sinks: LogSink[];
	warning: string | null;
}

/**
 * Open stdout and, best-effort, the log file.
 * A file that cannot be opened leaves stdout as the only sink.
 */
export function openLogSinks(logFile: string): OpenedLogSinks {
	const sinks: LogSink[] = [new ConsoleSink()];
	if (logFile === "") {
		return { sinks, warning: null };
	}

	try {
		sinks.push(FileSink.open(logFile));
		return { sinks, warning: null };
	} catch (err) {
		return {
			sinks,
			warning: `Could not open log file ${logFile}: ${formatError(err)}. Logging to stdout only.`,
		};
	}
}
