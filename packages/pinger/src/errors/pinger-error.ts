/**
 * Base class for errors raised by the pinger itself
 */
export class PingerError extends Error {
	constructor(message: string) {
		super(message);
		this.name = this.constructor.name;
	}
}
