import { PING_FAILURE, type PingRequest, type PingResult } from "@keepalive-pinger/shared";
import type { Logger, PingClient } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";
import { formatError, formatSeconds } from "../utils/index.js";

/**
 * Ping client backed by the runtime's fetch.
 *
 * fetch shares one keep-alive connection pool across calls; the loop keeps at
 * most one request in flight. Each attempt, body read included, is bounded by
 * `timeoutMs`.
 */
export class HttpPingClient implements PingClient {
	private readonly logger: Logger;

	constructor(
		private readonly timeoutMs: number,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("http");
	}

	async ping(request: PingRequest): Promise<PingResult> {
		const { url } = request;
		const startedAt = performance.now();
		const controller = new AbortController();
		const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

		try {
			const response = await fetch(url, {
				method: "GET",
				headers: request.headers,
				signal: controller.signal,
			});

			// Only the length of the body matters
			const body = await response.text();
			const elapsedMs = performance.now() - startedAt;

			this.logger.info(`URL: ${url} -> ${response.status} time=${formatSeconds(elapsedMs)}s len=${body.length}`);

			return {
				ok: true,
				url,
				status: response.status,
				elapsedMs,
				bodyLength: body.length,
			};
		} catch (err) {
			const elapsedMs = performance.now() - startedAt;

			if (controller.signal.aborted || (err instanceof Error && err.name === "AbortError")) {
				this.logger.warn(`Timeout after ${formatSeconds(elapsedMs)}s for ${url}`);
				return {
					ok: false,
					url,
					failure: PING_FAILURE.TIMEOUT,
					error: "Request timeout",
					elapsedMs,
				};
			}

			const message = formatError(err);
			this.logger.error(`Request error for ${url}: ${message} (took ${formatSeconds(elapsedMs)}s)`);
			return {
				ok: false,
				url,
				failure: PING_FAILURE.TRANSPORT,
				error: message,
				elapsedMs,
			};
		} finally {
			clearTimeout(timeoutId);
		}
	}
}
