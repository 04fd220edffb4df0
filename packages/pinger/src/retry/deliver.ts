import {
	type PingRequest,
	RETRY_STATE,
	type TerminalRetryState,
} from "@keepalive-pinger/shared";
import type { Logger, PingClient } from "../types/index.js";
import { type RetryPolicy, startDelivery, transition } from "./policy.js";

/**
 * Collaborators for one delivery.
 */
export interface DeliveryContext {
	pingClient: PingClient;
	logger: Logger;
	policy: RetryPolicy;
	/** Builds a fresh randomized request for each attempt */
	buildRequest: (target: string) => PingRequest;
	sleep: (ms: number) => Promise<void>;
}

/**
 * Deliver one keepalive ping to `target`, retrying with exponential backoff.
 *
 * Sleeps between failed attempts, and once more with the streak backoff when
 * every attempt fails, before abandoning the cycle.
 */
export async function deliver(
	target: string,
	failureStreak: number,
	context: DeliveryContext,
): Promise<TerminalRetryState> {
	const { pingClient, logger, policy } = context;
	let current = startDelivery();

	for (;;) {
		const result = await pingClient.ping(context.buildRequest(target));
		const { next, delayMs } = transition(current, result, policy, failureStreak);

		if (next.kind === RETRY_STATE.SUCCEEDED) {
			return next;
		}

		if (next.kind === RETRY_STATE.EXHAUSTED) {
			logger.warn(
				`Max retries reached for ${target}. Backoff ${delayMs / 1000}s ` +
				`(consecutive failures: ${next.failureStreak})`,
			);
			await context.sleep(delayMs);
			return next;
		}

		logger.info(`Retry ${current.attempt}/${policy.maxAttempts} after ${delayMs / 1000}s`);
		await context.sleep(delayMs);
		current = next;
	}
}
