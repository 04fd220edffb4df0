import type { CycleReport, CycleState } from "@keepalive-pinger/shared";

/**
 * Keepalive loop that pings a random target, then waits a random interval.
 */
export interface Pinger {
	runCycle(state: CycleState): Promise<CycleReport>;
	start(): Promise<void>;
	stop(): void;
}
