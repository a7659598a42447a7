/**
 * The subset of `console` the library writes to.
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
}
