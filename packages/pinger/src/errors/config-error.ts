import { PingerError } from "./pinger-error.js";

/**
 * Thrown when configuration cannot drive the loop
 */
export class ConfigError extends PingerError {
	readonly field: string;

	constructor(field: string, message: string) {
		super(`Invalid configuration for ${field}: ${message}`);
		this.field = field;
	}
}
