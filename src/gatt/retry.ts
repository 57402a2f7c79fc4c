import pRetry from "p-retry";
import {
	AbortError,
	abortMessage,
	isTransientGattError,
	throwIfAborted,
} from "../errors";
import type {
	GattCharacteristicRef,
	NotificationMode,
	OperationOptions,
} from "../types";
import type { GattIo } from "./gatt-io";

/** Delay schedule between attempts: `minDelayMs * factor^(n-1)`, capped. */
export interface BackoffOptions {
	/** @default 250 */
	minDelayMs?: number;
	/** @default 5000 */
	maxDelayMs?: number;
	/** @default 2 */
	factor?: number;
	/** Spread each delay by a random factor between 1 and 2. @default false */
	randomize?: boolean;
}

/** Passed to `onRetry` after a failed attempt that will be retried. */
export interface RetryEvent {
	/** The attempt that just failed, starting at 1. */
	attempt: number;
	retriesLeft: number;
	error: Error;
}

export interface RetryOptions {
	/**
	 * Attempts including the first.
	 * @default 3
	 */
	attempts?: number;
	/**
	 * Handed to every attempt as its `timeoutMs`, so an unanswered request
	 * frees its key and can be issued again.
	 */
	attemptTimeoutMs?: number;
	backoff?: BackoffOptions;
	/** Cancels the in-flight attempt and any pending delay. */
	signal?: AbortSignal;
	/** @default isTransientGattError */
	shouldRetry?: (error: Error) => boolean;
	onRetry?: (event: RetryEvent) => void;
}

/**
 * One attempt of a GattIo operation. `options` carries the retry signal and
 * the per-attempt timeout and must be forwarded to the operation.
 */
export type GattAttempt<T> = (
	options: OperationOptions,
	attempt: number,
) => Promise<T>;

/**
 * Runs a GattIo operation until it succeeds, the error is not transient, or
 * the attempts run out. GattIo itself never retries.
 *
 * @example
 * ```typescript
 * const battery = await withRetry(
 *   (options) => io.readCharacteristicChange(level, options),
 *   { attemptTimeoutMs: 2000, backoff: { minDelayMs: 500 } },
 * );
 * ```
 *
 * @throws the last attempt's error, or AbortError if `signal` fires
 */
export async function withRetry<T>(
	run: GattAttempt<T>,
	options: RetryOptions = {},
): Promise<T> {
	const {
		attempts = 3,
		attemptTimeoutMs,
		backoff = {},
		signal,
		shouldRetry = isTransientGattError,
		onRetry,
	} = options;
	const {
		minDelayMs = 250,
		maxDelayMs = 5000,
		factor = 2,
		randomize = false,
	} = backoff;

	if (!Number.isInteger(attempts) || attempts < 1) {
		throw new RangeError(`attempts must be a positive integer, got ${attempts}`);
	}
	throwIfAborted(signal);

	const attemptOptions: OperationOptions = {
		...(signal && { signal }),
		...(attemptTimeoutMs !== undefined && { timeoutMs: attemptTimeoutMs }),
	};

	try {
		return await pRetry((attempt) => run(attemptOptions, attempt), {
			retries: attempts - 1,
			minTimeout: Math.min(minDelayMs, maxDelayMs),
			maxTimeout: maxDelayMs,
			factor,
			randomize,
			...(signal && { signal }),
			shouldRetry,
			onFailedAttempt: (error) => {
				if (error.retriesLeft > 0 && shouldRetry(error)) {
					onRetry?.({
						attempt: error.attemptNumber,
						retriesLeft: error.retriesLeft,
						error,
					});
				}
			},
		});
	} catch (e) {
		if (signal?.aborted) {
			throw new AbortError(abortMessage(signal));
		}
		throw e;
	}
}

/**
 * Writes `value` to `characteristic`, retrying transient failures.
 *
 * @example
 * ```typescript
 * await retryWrite(io, controlPoint, new Uint8Array([0x01]), {
 *   attempts: 4,
 *   attemptTimeoutMs: 1500,
 * });
 * ```
 */
export function retryWrite(
	io: Pick<GattIo, "writeCharacteristic">,
	characteristic: GattCharacteristicRef,
	value: Uint8Array,
	options: RetryOptions = {},
): Promise<void> {
	return withRetry(
		(attemptOptions) =>
			io.writeCharacteristic(characteristic, value, attemptOptions),
		options,
	);
}

/** Configures notification delivery, retrying transient failures. */
export function retrySetNotification(
	io: Pick<GattIo, "setNotification">,
	characteristic: GattCharacteristicRef,
	mode: NotificationMode,
	options: RetryOptions = {},
): Promise<void> {
	return withRetry(
		(attemptOptions) => io.setNotification(characteristic, mode, attemptOptions),
		options,
	);
}
