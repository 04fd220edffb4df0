import { MAX_TIMER_DELAY_MS } from "@keepalive-pinger/shared";

/**
 * Sleep for a specified number of milliseconds.
 * Waits longer than one timer allows are chained in slices.
 * Resolves immediately once `signal` is aborted, so a pending wait never blocks shutdown.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise(resolve => {
		if (signal?.aborted) {
			resolve();
			return;
		}

		let remaining = ms;
		let timerId: ReturnType<typeof setTimeout> | undefined;

		const done = (): void => {
			clearTimeout(timerId);
			signal?.removeEventListener("abort", done);
			resolve();
		};

		const schedule = (): void => {
			const slice = Math.min(remaining, MAX_TIMER_DELAY_MS);
			remaining -= slice;
			timerId = setTimeout(remaining > 0 ? schedule : done, slice);
		};

		signal?.addEventListener("abort", done, { once: true });
		schedule();
	});
}
