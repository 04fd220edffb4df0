import type { DurationMs, PingSuccess } from "./ping.js";

/**
 * Retry state kinds as a const object.
 */
export const RETRY_STATE = {
	ATTEMPTING: "ATTEMPTING",
	SUCCEEDED: "SUCCEEDED",
	EXHAUSTED: "EXHAUSTED",
} as const;

/**
 * Delivery is in progress; `attempt` is the 1-indexed attempt about to run.
 */
export interface AttemptingState {
	kind: typeof RETRY_STATE.ATTEMPTING;
	attempt: number;
}

/**
 * A response was received on `attempt`.
 */
export interface SucceededState {
	kind: typeof RETRY_STATE.SUCCEEDED;
	attempt: number;
	result: PingSuccess;
}

/**
 * Every attempt failed. `failureStreak` already counts this cycle.
 */
export interface ExhaustedState {
	kind: typeof RETRY_STATE.EXHAUSTED;
	attempts: number;
	failureStreak: number;
}

/**
 * States of the per-cycle retry policy.
 * ATTEMPTING -> SUCCEEDED | ATTEMPTING(n+1) | EXHAUSTED
 */
export type RetryState = AttemptingState | SucceededState | ExhaustedState;

/**
 * States in which a delivery has finished.
 */
export type TerminalRetryState = SucceededState | ExhaustedState;

/**
 * A state change produced by one attempt, with the wait that must
 * happen before acting on the next state (0 after success).
 */
export interface RetryTransition {
	next: RetryState;
	delayMs: DurationMs;
}

// =============================================================================
// Cycle State
// =============================================================================

/**
 * State threaded from one cycle into the next.
 */
export interface CycleState {
	/** Fully exhausted cycles since the last successful delivery */
	failureStreak: number;
}

/**
 * What a single cycle did.
 */
export interface CycleReport {
	/** Configured URL picked for this cycle, before randomization */
	target: string;
	delivery: TerminalRetryState;
	state: CycleState;
	nextIntervalMs: DurationMs;
}
