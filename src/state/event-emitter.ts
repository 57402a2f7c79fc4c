import { DEFAULT_LOG_PREFIX, type ScopedLogger, scopeLogger } from "../utils/logger";

export type EventMap = { [key: string]: unknown };

/**
 * A type-safe event emitter that provides compile-time checking for event names and payloads.
 *
 * @example Define typed events and create emitter
 * ```typescript
 * interface IoEvents extends Record<string, unknown> {
 *   stateChange: { from: ConnectionState; to: ConnectionState };
 *   anomaly: OperationKey;
 * }
 *
 * const emitter = createEventEmitter<IoEvents>();
 *
 * const unsubscribe = emitter.on('stateChange', ({ from, to }) => {
 *   console.log(`${from} -> ${to}`);
 * });
 *
 * emitter.emit('stateChange', { from: 'idle', to: 'connecting' });
 * unsubscribe();
 * ```
 */
export interface TypedEventEmitter<T extends EventMap> {
	on<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	off<K extends keyof T>(event: K, callback: (data: T[K]) => void): void;
	removeAllListeners<K extends keyof T>(event?: K): void;
	emit<K extends keyof T>(event: K, data: T[K]): void;
}

type ListenerTable<T extends EventMap> = {
	[K in keyof T]?: Set<(data: T[K]) => void>;
};

/**
 * Creates a typed emitter. A listener that throws is logged and does not
 * prevent the remaining listeners from running.
 */
export function createEventEmitter<T extends EventMap>(
	log: ScopedLogger = scopeLogger(console, DEFAULT_LOG_PREFIX, "event-emitter"),
): TypedEventEmitter<T> {
	let table: ListenerTable<T> = {};

	function on<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
	): () => void {
		let set = table[event];
		if (!set) {
			set = new Set<(data: T[K]) => void>();
			table[event] = set;
		}
		set.add(callback);
		return () => off(event, callback);
	}

	function off<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
	): void {
		const set = table[event];
		if (!set) {
			return;
		}
		set.delete(callback);
		if (set.size === 0) {
			delete table[event];
		}
	}

	function removeAllListeners<K extends keyof T>(event?: K): void {
		if (event === undefined) {
			table = {};
			return;
		}
		delete table[event];
	}

	function emit<K extends keyof T>(event: K, data: T[K]): void {
		const set = table[event];
		if (!set) {
			return;
		}
		// Snapshot: listeners added during emit wait for the next one
		for (const callback of [...set]) {
			try {
				callback(data);
			} catch (err) {
				log.error("Listener threw an error:", err);
			}
		}
	}

	return { on, off, removeAllListeners, emit };
}
