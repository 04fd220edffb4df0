export const LOG_LEVELS = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
	return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function levelFromEnv(value: string | undefined): LogLevel {
	const normalized = value?.toLowerCase();
	return normalized !== undefined && isLogLevel(normalized) ? normalized : "info";
}

let currentLevel: LogLevel = levelFromEnv(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
	currentLevel = level;
}

export function getCurrentLevel(): LogLevel {
	return currentLevel;
}
