/**
 * Tests for logging
 *
 * Covers:
 * - Line format and level threshold
 * - Fan-out to every sink
 * - File sink appends, and falls back to stdout-only when the file cannot be opened
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import {
	ConsoleSink,
	FileSink,
	LoggerImpl,
	formatLogLine,
	getCurrentLevel,
	isLogLevel,
	openLogSinks,
	setLogLevel,
} from "../logger/index.js";
import { MemorySink, cleanupTempDir, createTempDir } from "./test-utils.js";

describe("logging", () => {
	const initialLevel = getCurrentLevel();

	afterEach(() => {
		setLogLevel(initialLevel);
		vi.restoreAllMocks();
	});

	describe("formatLogLine", () => {
		it("renders timestamp, padded level, prefix and message", () => {
			const line = formatLogLine({
				timestamp: new Date("2024-01-02T03:04:05.678Z"),
				level: "warn",
				prefix: "pinger",
				message: "Timeout after 30.00s for http://test:3000/health",
			});

			expect(line).toBe("[2024-01-02T03:04:05.678Z] [WARN ] [pinger] Timeout after 30.00s for http://test:3000/health");
		});
	});

	describe("LoggerImpl", () => {
		it("writes a record to every sink", () => {
			setLogLevel("debug");
			const first = new MemorySink();
			const second = new MemorySink();
			const logger = new LoggerImpl("pinger", [first, second]);

			logger.info("hello");

			expect(first.records).toHaveLength(1);
			expect(second.records).toHaveLength(1);
			expect(first.records[0]).toMatchObject({ level: "info", prefix: "pinger", message: "hello" });
		});

		it("drops records below the current level", () => {
			setLogLevel("warn");
			const sink = new MemorySink();
			const logger = new LoggerImpl("pinger", [sink]);

			logger.debug("d");
			logger.info("i");
			logger.warn("w");
			logger.error("e");

			expect(sink.messages()).toEqual(["w", "e"]);
		});

		it("writes nothing when silent", () => {
			setLogLevel("silent");
			const sink = new MemorySink();

			new LoggerImpl("pinger", [sink]).error("e");

			expect(sink.records).toEqual([]);
		});

		it("writes to stdout by default", () => {
			setLogLevel("info");
			const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

			new LoggerImpl("pinger").info("to stdout");

			expect(log).toHaveBeenCalledWith(expect.stringMatching(/^\[.+\] \[INFO \] \[pinger\] to stdout$/));
		});
	});

	describe("isLogLevel", () => {
		it("accepts known levels only", () => {
			expect(isLogLevel("debug")).toBe(true);
			expect(isLogLevel("silent")).toBe(true);
			expect(isLogLevel("verbose")).toBe(false);
			expect(isLogLevel("toString")).toBe(false);
		});
	});

	describe("sinks", () => {
		let tempDir: string;

		beforeEach(() => {
			tempDir = createTempDir();
		});

		afterEach(() => {
			cleanupTempDir(tempDir);
		});

		it("FileSink appends one line per record", () => {
			const logFile = path.join(tempDir, "keepalive.log");
			fs.writeFileSync(logFile, "existing\n");
			const sink = FileSink.open(logFile);
			const record = {
				timestamp: new Date("2024-01-02T03:04:05.678Z"),
				level: "info" as const,
				prefix: "pinger",
				message: "Next ping in 17.50 minutes (1050s)",
			};

			sink.write(record);
			sink.close();

			expect(fs.readFileSync(logFile, "utf-8")).toBe(
				"existing\n[2024-01-02T03:04:05.678Z] [INFO ] [pinger] Next ping in 17.50 minutes (1050s)\n",
			);
		});

		it("FileSink ignores writes after close", () => {
			const logFile = path.join(tempDir, "closed.log");
			const sink = FileSink.open(logFile);
			sink.close();

			sink.write({ timestamp: new Date(), level: "info", prefix: "p", message: "late" });

			expect(fs.readFileSync(logFile, "utf-8")).toBe("");
		});

		it("openLogSinks returns stdout and the file when the file opens", () => {
			const logFile = path.join(tempDir, "keepalive.log");

			const { sinks, warning } = openLogSinks(logFile);

			expect(warning).toBeNull();
			expect(sinks).toHaveLength(2);
			expect(sinks[0]).toBeInstanceOf(ConsoleSink);
			expect(sinks[1]).toBeInstanceOf(FileSink);
			expect(fs.existsSync(logFile)).toBe(true);
		});

		it("openLogSinks falls back to stdout with a warning when the file cannot be opened", () => {
			const logFile = path.join(tempDir, "missing-dir", "keepalive.log");

			const { sinks, warning } = openLogSinks(logFile);

			expect(sinks).toHaveLength(1);
			expect(sinks[0]).toBeInstanceOf(ConsoleSink);
			expect(warning).toMatch(/^Could not open log file .*missing-dir.*keepalive\.log: .*ENOENT.*\. Logging to stdout only\.$/);
		});

		it("openLogSinks skips the file when no path is configured", () => {
			const { sinks, warning } = openLogSinks("");

			expect(warning).toBeNull();
			expect(sinks).toHaveLength(1);
		});
	});
});
