import { OperationInProgressError } from "../errors";

/**
 * A single-use completion handle for one outstanding operation.
 */
export interface Waiter<TKey, TValue> {
	readonly key: TKey;
	/** Settles exactly once, or never if the waiter is cancelled. */
	readonly promise: Promise<TValue>;
	/**
	 * Removes this waiter from its table without settling it.
	 * A no-op once the waiter has been settled or replaced.
	 * @returns true if the waiter was still registered
	 */
	cancel(): boolean;
}

export interface PendingTableOptions<TKey> {
	/** Maps a key to its identity. Keys with equal ids share one slot. */
	keyId: (key: TKey) => string;
	/**
	 * Called when a result arrives for a key with no registered waiter.
	 * Late or duplicate transport events make this benign.
	 */
	onAnomaly?: (key: TKey, outcome: "resolve" | "fail") => void;
}

/**
 * Keyed table of single-slot waiters.
 *
 * Every settle path removes the entry before settling it, so a waiter is
 * resolved or failed at most once, and `failAll` can never race a `resolve`
 * for the same entry.
 */
export interface PendingTable<TKey, TValue> {
	/**
	 * Registers a waiter for `key`.
	 * @throws OperationInProgressError if `key` already has a live waiter
	 */
	register(key: TKey): Waiter<TKey, TValue>;

	/** @returns false (and reports an anomaly) if nobody was waiting */
	resolve(key: TKey, value: TValue): boolean;

	/** @returns false (and reports an anomaly) if nobody was waiting */
	fail(key: TKey, error: Error): boolean;

	/**
	 * Removes every waiter, then fails each with `error`.
	 * @returns the number of waiters failed
	 */
	failAll(error: Error): number;

	/** Removes the waiter for `key` without settling it. */
	cancel(key: TKey): boolean;

	has(key: TKey): boolean;

	readonly size: number;
}

interface Entry<TKey, TValue> {
	key: TKey;
	/** Distinguishes this registration from a later one under the same id. */
	token: symbol;
	resolve: (value: TValue) => void;
	reject: (error: Error) => void;
}

/**
 * Creates a pending table.
 *
 * @example
 * ```typescript
 * const writes = createPendingTable<string, void>({ keyId: (uuid) => uuid });
 *
 * const waiter = writes.register("2a37");
 * transport.writeCharacteristic(char);
 * // later, from the event callback:
 * writes.resolve("2a37", undefined);
 * await waiter.promise;
 * ```
 */
export function createPendingTable<TKey, TValue>(
	options: PendingTableOptions<TKey>,
): PendingTable<TKey, TValue> {
	const { keyId, onAnomaly } = options;
	const entries = new Map<string, Entry<TKey, TValue>>();

	function take(key: TKey): Entry<TKey, TValue> | undefined {
		const id = keyId(key);
		const entry = entries.get(id);
		if (entry) {
			entries.delete(id);
		}
		return entry;
	}

	function register(key: TKey): Waiter<TKey, TValue> {
		const id = keyId(key);
		if (entries.has(id)) {
			throw new OperationInProgressError(id);
		}

		const token = Symbol(id);
		const promise = new Promise<TValue>((resolve, reject) => {
			entries.set(id, { key, token, resolve, reject });
		});

		return {
			key,
			promise,
			cancel() {
				if (entries.get(id)?.token !== token) {
					return false;
				}
				entries.delete(id);
				return true;
			},
		};
	}

	function resolve(key: TKey, value: TValue): boolean {
		const entry = take(key);
		if (!entry) {
			onAnomaly?.(key, "resolve");
			return false;
		}
		entry.resolve(value);
		return true;
	}

	function fail(key: TKey, error: Error): boolean {
		const entry = take(key);
		if (!entry) {
			onAnomaly?.(key, "fail");
			return false;
		}
		entry.reject(error);
		return true;
	}

	function failAll(error: Error): number {
		const snapshot = [...entries.values()];
		entries.clear();
		for (const entry of snapshot) {
			entry.reject(error);
		}
		return snapshot.length;
	}

	function cancel(key: TKey): boolean {
		return take(key) !== undefined;
	}

	function has(key: TKey): boolean {
		return entries.has(keyId(key));
	}

	return {
		register,
		resolve,
		fail,
		failAll,
		cancel,
		has,
		get size() {
			return entries.size;
		},
	};
}
