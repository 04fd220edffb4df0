// =============================================================================
// Semantic Type Aliases
// =============================================================================

/** Duration in milliseconds */
export type DurationMs = number;

// =============================================================================
// Failure Kinds
// =============================================================================

/**
 * Ways a ping attempt can fail, as a const object.
 * Use these constants instead of string literals for type safety.
 */
export const PING_FAILURE = {
	TIMEOUT: "TIMEOUT",
	TRANSPORT: "TRANSPORT",
} as const;

/**
 * Kind of failed attempt.
 * - TIMEOUT: No response within the request timeout
 * - TRANSPORT: DNS, connection, TLS or stream error before a full response
 */
export type PingFailure = (typeof PING_FAILURE)[keyof typeof PING_FAILURE];

// =============================================================================
// Requests and Results
// =============================================================================

/**
 * A fully randomized request, ready to send.
 */
export interface PingRequest {
	/** Effective URL, including any injected query parameter */
	url: string;
	/** Headers for this attempt */
	headers: Record<string, string>;
}

/**
 * Outcome of an attempt that received an HTTP response.
 * The status code is recorded but never judged: any response keeps the target warm.
 */
export interface PingSuccess {
	ok: true;
	url: string;
	status: number;
	elapsedMs: DurationMs;
	/** Length of the response body in characters */
	bodyLength: number;
}

/**
 * Outcome of an attempt that never produced a response.
 */
export interface PingFailureResult {
	ok: false;
	url: string;
	failure: PingFailure;
	error: string;
	elapsedMs: DurationMs;
}

/**
 * Result of one ping attempt.
 */
export type PingResult = PingSuccess | PingFailureResult;
