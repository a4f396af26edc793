/**
 * Structured logger (pino).
 *
 * Each component logs through a child carrying its `module` binding.
 * Callers pass identifiers and counts only: keys, hashes, passwords and paste
 * text never go to a log line.
 */

import { pino, type DestinationStream, type Logger } from 'pino';

export type { Logger };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Create a root logger named `name`.
 * Lines go to stdout unless a `destination` stream is given.
 */
export function createLogger(name: string, level: LogLevel = 'info', destination?: DestinationStream): Logger {
	const options = { name, level };
	return destination ? pino(options, destination) : pino(options);
}

/** Describe an unknown thrown value without dumping it. */
export function describeError(error: unknown): string {
	return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
