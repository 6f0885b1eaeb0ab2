// src/inim/logger.ts

/**
 * Very small logger interface so the engine accepts either the Homebridge
 * log object or console.* functions in tests. Messages use printf-style
 * placeholders (%s, %d, %o).
 */
export interface InimLogger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export function consoleLogger(tag: string): InimLogger {
	const prefix = `[${tag}]`;
	return {
		debug: (...args: unknown[]) => console.debug(prefix, ...args),
		info: (...args: unknown[]) => console.info(prefix, ...args),
		warn: (...args: unknown[]) => console.warn(prefix, ...args),
		error: (...args: unknown[]) => console.error(prefix, ...args),
	};
}
