import type { PingRequest, PingResult } from "@keepalive-pinger/shared";

/**
 * Sends a single keepalive request.
 * Failures are reported in the result, never thrown.
 */
export interface PingClient {
	ping(request: PingRequest): Promise<PingResult>;
}
