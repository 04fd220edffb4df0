/**
 * Format an unknown error value into a string message.
 * Handles both Error objects and other types.
 */
export function formatError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Format an unknown error with its stack trace when one is available.
 */
export function formatErrorDetail(err: unknown): string {
	if (err instanceof Error && err.stack) {
		return err.stack;
	}
	return formatError(err);
}
