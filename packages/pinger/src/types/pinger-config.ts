/**
 * Pinger configuration, read once at startup.
 * Values are populated from environment variables or defaults.
 */
export interface PingerConfig {
	targetUrls: readonly string[];
	minIntervalMs: number;
	maxIntervalMs: number;
	jitterFraction: number;
	requestTimeoutMs: number;
	maxAttempts: number;
	baseBackoffMs: number;
	loopErrorPauseMs: number;
	logFile: string;
	userAgents: readonly string[];
	queryParamKeys: readonly string[];
	queryParamProbability: number;
}
