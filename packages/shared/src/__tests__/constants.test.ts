import { describe, expect, it } from "vitest";
import {
	ACCEPT_HEADER,
	DEFAULT_LOG_FILE,
	DEFAULT_TARGET_URLS,
	DELIVERY_DEFAULTS,
	INTERVAL_DEFAULTS,
	LOG_FILE_ENV,
	MAX_TIMER_DELAY_MS,
	QUERY_PARAM_KEYS,
	QUERY_PARAM_PROBABILITY,
	USER_AGENTS,
} from "../constants.js";

describe("shared constants", () => {
	describe("interval defaults", () => {
		it("MIN_INTERVAL_MS equals 10 minutes", () => {
			expect(INTERVAL_DEFAULTS.MIN_INTERVAL_MS).toBe(600_000);
		});

		it("MAX_INTERVAL_MS equals 25 minutes", () => {
			expect(INTERVAL_DEFAULTS.MAX_INTERVAL_MS).toBe(1_500_000);
		});

		it("JITTER_FRACTION equals 15%", () => {
			expect(INTERVAL_DEFAULTS.JITTER_FRACTION).toBe(0.15);
		});

		it("FLOOR_MS equals one second", () => {
			expect(INTERVAL_DEFAULTS.FLOOR_MS).toBe(1000);
		});
	});

	describe("delivery defaults", () => {
		it("REQUEST_TIMEOUT_MS equals 30000 milliseconds", () => {
			expect(DELIVERY_DEFAULTS.REQUEST_TIMEOUT_MS).toBe(30000);
		});

		it("allows 3 attempts with a 5 second backoff base", () => {
			expect(DELIVERY_DEFAULTS.MAX_ATTEMPTS).toBe(3);
			expect(DELIVERY_DEFAULTS.BASE_BACKOFF_MS).toBe(5000);
		});

		it("pauses 60 seconds after a loop error", () => {
			expect(DELIVERY_DEFAULTS.LOOP_ERROR_PAUSE_MS).toBe(60000);
		});
	});

	describe("request randomization pools", () => {
		it("has five user agents", () => {
			expect(USER_AGENTS).toHaveLength(5);
			expect(USER_AGENTS).toContain("curl/7.85.0");
		});

		it("has the query parameter keys t, v, rand, token, src", () => {
			expect(QUERY_PARAM_KEYS).toEqual(["t", "v", "rand", "token", "src"]);
		});

		it("injects a parameter 70% of the time", () => {
			expect(QUERY_PARAM_PROBABILITY).toBe(0.7);
		});

		it("accepts any content type", () => {
			expect(ACCEPT_HEADER).toBe("*/*");
		});
	});

	describe("targets and logging", () => {
		it("has at least one default target", () => {
			expect(DEFAULT_TARGET_URLS.length).toBeGreaterThan(0);
		});

		it("reads the log file path from KEEPALIVE_LOGFILE", () => {
			expect(LOG_FILE_ENV).toBe("KEEPALIVE_LOGFILE");
			expect(DEFAULT_LOG_FILE).toBe("/var/log/keepalive_random.log");
		});
	});

	describe("timers", () => {
		it("caps a single timer at 2^31-1 milliseconds", () => {
			expect(MAX_TIMER_DELAY_MS).toBe(2 ** 31 - 1);
		});
	});
});
