import {
	type AttemptingState,
	type PingResult,
	RETRY_STATE,
	type RetryTransition,
} from "@keepalive-pinger/shared";

/**
 * Limits for one delivery.
 */
export interface RetryPolicy {
	maxAttempts: number;
	baseBackoffMs: number;
}

/**
 * Wait after failed attempt `attempt` (1-indexed) when attempts remain:
 * `base * 2^(attempt-1)`.
 */
export function retryDelayMs(attempt: number, baseBackoffMs: number): number {
	return baseBackoffMs * 2 ** (attempt - 1);
}

/**
 * Wait after a cycle exhausts its attempts, given the streak including that cycle:
 * `base * 2^(streak-1)`.
 */
export function streakBackoffMs(failureStreak: number, baseBackoffMs: number): number {
	return baseBackoffMs * 2 ** (failureStreak - 1);
}

export function startDelivery(): AttemptingState {
	return { kind: RETRY_STATE.ATTEMPTING, attempt: 1 };
}

/**
 * Advance the retry state machine with the result of the current attempt.
 *
 * A response of any status succeeds. A failure retries while attempts remain,
 * otherwise the delivery is exhausted and the failure streak grows by one.
 */
export function transition(
	state: AttemptingState,
	result: PingResult,
	policy: RetryPolicy,
	failureStreak: number,
): RetryTransition {
	if (result.ok) {
		return {
			next: { kind: RETRY_STATE.SUCCEEDED, attempt: state.attempt, result },
			delayMs: 0,
		};
	}

	if (state.attempt < policy.maxAttempts) {
		return {
			next: { kind: RETRY_STATE.ATTEMPTING, attempt: state.attempt + 1 },
			delayMs: retryDelayMs(state.attempt, policy.baseBackoffMs),
		};
	}

	const streak = failureStreak + 1;
	return {
		next: { kind: RETRY_STATE.EXHAUSTED, attempts: state.attempt, failureStreak: streak },
		delayMs: streakBackoffMs(streak, policy.baseBackoffMs),
	};
}
