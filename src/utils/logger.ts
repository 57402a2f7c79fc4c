import type { Logger } from "../types";

/** Default prefix for every log line. */
export const DEFAULT_LOG_PREFIX = "[gatt-io]";

/**
 * Logger bound to one component, prefixing every line with
 * `[gatt-io:<component>]` (or the caller's own prefix).
 */
export interface ScopedLogger {
	debug(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

/**
 * Scopes a logger to a component.
 *
 * @example
 * ```typescript
 * const log = scopeLogger(console, "[gatt-io]", "dispatcher");
 * log.warn("no waiter"); // "[gatt-io:dispatcher] no waiter"
 * ```
 */
export function scopeLogger(
	logger: Logger,
	prefix: string,
	component: string,
): ScopedLogger {
	const tag = prefix.endsWith("]")
		? `${prefix.slice(0, -1)}:${component}]`
		: `${prefix}:${component}`;

	return {
		debug: (message, ...args) => logger.debug(`${tag} ${message}`, ...args),
		warn: (message, ...args) => logger.warn(`${tag} ${message}`, ...args),
		error: (message, ...args) => logger.error(`${tag} ${message}`, ...args),
	};
}
