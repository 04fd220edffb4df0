/**
 * Render a millisecond duration as seconds with two decimals, e.g. "1.25".
 */
export function formatSeconds(ms: number): string {
	return (ms / 1000).toFixed(2);
}
