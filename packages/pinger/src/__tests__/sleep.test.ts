import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MAX_TIMER_DELAY_MS } from "@keepalive-pinger/shared";
import { streakBackoffMs } from "../retry/index.js";
import { formatError, formatErrorDetail, formatSeconds, sleep } from "../utils/index.js";

describe("utils", () => {
	describe("sleep", () => {
		beforeEach(() => {
			vi.useFakeTimers();
		});

		afterEach(() => {
			vi.useRealTimers();
		});

		it("resolves after the given time", async () => {
			let done = false;
			const pending = sleep(1000).then(() => {
				done = true;
			});

			await vi.advanceTimersByTimeAsync(999);
			expect(done).toBe(false);

			await vi.advanceTimersByTimeAsync(1);
			await pending;
			expect(done).toBe(true);
		});

		it("waits the full time for delays beyond a single timer", async () => {
			const delayMs = streakBackoffMs(20, 5_000);
			expect(delayMs).toBe(2_621_440_000);

			let done = false;
			const pending = sleep(delayMs).then(() => {
				done = true;
			});

			await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS);
			expect(done).toBe(false);
			expect(vi.getTimerCount()).toBe(1);

			await vi.advanceTimersByTimeAsync(delayMs - MAX_TIMER_DELAY_MS - 1);
			expect(done).toBe(false);

			await vi.advanceTimersByTimeAsync(1);
			await pending;
			expect(done).toBe(true);
		});

		it("aborts a chained wait", async () => {
			const controller = new AbortController();
			const pending = sleep(3 * MAX_TIMER_DELAY_MS, controller.signal);

			await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS);
			controller.abort();
			await pending;

			expect(vi.getTimerCount()).toBe(0);
		});

		it("resolves early and clears its timer when aborted", async () => {
			const controller = new AbortController();
			const pending = sleep(60_000, controller.signal);

			controller.abort();
			await pending;

			expect(vi.getTimerCount()).toBe(0);
		});

		it("resolves at once for an already aborted signal", async () => {
			const controller = new AbortController();
			controller.abort();

			await sleep(60_000, controller.signal);

			expect(vi.getTimerCount()).toBe(0);
		});
	});

	describe("formatError", () => {
		it("uses the message of an Error and stringifies anything else", () => {
			expect(formatError(new Error("boom"))).toBe("boom");
			expect(formatError("plain")).toBe("plain");
			expect(formatError(42)).toBe("42");
		});

		it("formatErrorDetail prefers the stack", () => {
			const err = new Error("boom");
			expect(formatErrorDetail(err)).toBe(err.stack);
			expect(formatErrorDetail("plain")).toBe("plain");
		});
	});

	describe("formatSeconds", () => {
		it("renders two decimals", () => {
			expect(formatSeconds(1234)).toBe("1.23");
			expect(formatSeconds(30_000)).toBe("30.00");
		});
	});
});
