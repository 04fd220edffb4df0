import type { LogRecord } from "../types/index.js";

/**
 * Render a record as `[timestamp] [LEVEL] [prefix] message`.
 */
export function formatLogLine(record: LogRecord): string {
	const levelStr = record.level.toUpperCase().padEnd(5);
	return `[${record.timestamp.toISOString()}] [${levelStr}] [${record.prefix}] ${record.message}`;
}
