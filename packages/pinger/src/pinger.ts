import {
	type CycleReport,
	type CycleState,
	RETRY_STATE,
} from "@keepalive-pinger/shared";
import type {
	Clock,
	Logger,
	PingClient,
	Pinger,
	PingerConfig,
	RandomSource,
	Sleep,
} from "./types/index.js";
import { HttpPingClient } from "./client/index.js";
import { LoggerImpl } from "./logger/index.js";
import { buildPingRequest, pickTarget } from "./request/index.js";
import { deliver } from "./retry/index.js";
import { computeNextIntervalMs } from "./schedule/index.js";
import { formatErrorDetail, sleep } from "./utils/index.js";

/**
 * The state a fresh process starts from.
 */
export function initialCycleState(): CycleState {
	return { failureStreak: 0 };
}

/**
 * Pinger implementation: one sequential loop of deliver, then wait.
 */
export class PingerImpl implements Pinger {
	private readonly logger: Logger;
	private readonly pingClient: PingClient;
	private running = false;
	private abortController = new AbortController();

	/**
	 * Create a new pinger with injected dependencies.
	 * Dependencies are optional and will be created if not provided.
	 */
	constructor(
		private readonly config: PingerConfig,
		logger?: Logger,
		pingClient?: PingClient,
		private readonly random: RandomSource = Math.random,
		private readonly clock: Clock = Date.now,
		private readonly sleepFn: Sleep = sleep,
	) {
		this.logger = logger ?? new LoggerImpl("pinger");
		this.pingClient = pingClient ?? new HttpPingClient(config.requestTimeoutMs, this.logger);
	}

	/**
	 * Run one cycle: pick a target, deliver it with retries, then wait a random interval.
	 * Returns the state to pass to the next cycle.
	 */
	async runCycle(state: CycleState): Promise<CycleReport> {
		const target = pickTarget(this.config.targetUrls, this.random);

		const delivery = await deliver(target, state.failureStreak, {
			pingClient: this.pingClient,
			logger: this.logger,
			policy: this.config,
			buildRequest: url => buildPingRequest(url, this.config, this.random, this.clock),
			sleep: ms => this.pause(ms),
		});

		const nextState: CycleState = {
			failureStreak: delivery.kind === RETRY_STATE.SUCCEEDED ? 0 : delivery.failureStreak,
		};

		const nextIntervalMs = computeNextIntervalMs(this.config, this.random);
		this.logger.info(
			`Next ping in ${(nextIntervalMs / 60_000).toFixed(2)} minutes (${Math.round(nextIntervalMs / 1000)}s)`,
		);
		await this.pause(nextIntervalMs);

		return { target, delivery, state: nextState, nextIntervalMs };
	}

	/**
	 * Start the main loop. Resolves only after stop().
	 */
	async start(): Promise<void> {
		if (this.running) {
			return;
		}
		this.running = true;
		this.abortController = new AbortController();
		this.logger.debug(`Pinger starting with ${this.config.targetUrls.length} target(s)`);

		let state = initialCycleState();
		while (this.running) {
			try {
				const report = await this.runCycle(state);
				state = report.state;
			} catch (err) {
				// The loop never ends on error; pause and carry the last known state forward
				this.logger.error(
					`Unexpected error in keepalive loop: ${formatErrorDetail(err)}. ` +
					`Pausing ${this.config.loopErrorPauseMs / 1000}s and continuing`,
				);
				await this.pause(this.config.loopErrorPauseMs);
			}
		}
	}

	/**
	 * Stop the loop and wake any pending sleep.
	 */
	stop(): void {
		if (!this.running) {
			return;
		}
		this.running = false;
		this.abortController.abort();
		this.logger.debug("Pinger stopped");
	}

	private pause(ms: number): Promise<void> {
		return this.sleepFn(ms, this.abortController.signal);
	}
}
