/**
 * Shared constants for the pinger and its tests.
 *
 * Constants are organized into domain-specific groups for easier discovery.
 */

// =============================================================================
// Targets
// =============================================================================

/** Endpoints pinged when KEEPALIVE_URLS is not set */
export const DEFAULT_TARGET_URLS: readonly string[] = [
	"https://example.onrender.com/health",
];

// =============================================================================
// Interval Scheduling
// =============================================================================

/**
 * Bounds and jitter for the randomized wait between cycles.
 */
export const INTERVAL_DEFAULTS = {
	/** Lower bound of the base interval in milliseconds (10 minutes) */
	MIN_INTERVAL_MS: 600_000,
	/** Upper bound of the base interval in milliseconds (25 minutes) */
	MAX_INTERVAL_MS: 1_500_000,
	/** Jitter applied around the base interval, as a fraction of it */
	JITTER_FRACTION: 0.15,
	/** No interval is ever shorter than this */
	FLOOR_MS: 1_000,
} as const;

// =============================================================================
// Delivery
// =============================================================================

/**
 * Request and retry constraints for a single delivery.
 */
export const DELIVERY_DEFAULTS = {
	/** Timeout for one request attempt in milliseconds */
	REQUEST_TIMEOUT_MS: 30_000,
	/** Attempts per cycle before the cycle is abandoned */
	MAX_ATTEMPTS: 3,
	/** Base of the exponential backoff in milliseconds */
	BASE_BACKOFF_MS: 5_000,
	/** Pause after an unexpected error in the loop, in milliseconds */
	LOOP_ERROR_PAUSE_MS: 60_000,
} as const;

// =============================================================================
// Request Randomization
// =============================================================================

/** User-Agent values drawn uniformly for each attempt */
export const USER_AGENTS: readonly string[] = [
	"Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko)",
	"Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko)",
	"Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko)",
	"curl/7.85.0",
	"Wget/1.21.3 (linux-gnu)",
];

/** Names a randomized query parameter may take */
export const QUERY_PARAM_KEYS: readonly string[] = ["t", "v", "rand", "token", "src"];

/** Chance that a request gets a randomized query parameter */
export const QUERY_PARAM_PROBABILITY = 0.7;

/** Upper bound (inclusive) of the random suffix in a query parameter value */
export const QUERY_PARAM_SUFFIX_MAX = 99_999;

/** Static Accept header sent with every request */
export const ACCEPT_HEADER = "*/*";

// =============================================================================
// Logging
// =============================================================================

/** Environment variable that overrides the log file path */
export const LOG_FILE_ENV = "KEEPALIVE_LOGFILE";

/** Log file used when KEEPALIVE_LOGFILE is not set */
export const DEFAULT_LOG_FILE = "/var/log/keepalive_random.log";

// =============================================================================
// Timers
// =============================================================================

/** Longest delay a single setTimeout honours; larger values fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
