import type { ConnectionState } from "../types";

/**
 * Stable identifiers for every failure gatt-io reports.
 * Use `error.code` to branch without `instanceof` chains.
 */
export type GattErrorCode =
	| "ALREADY_CONNECTING"
	| "OPERATION_IN_PROGRESS"
	| "MISSING_CONFIG_DESCRIPTOR"
	| "DISCOVERY_START_FAILED"
	| "TRANSPORT_WRITE_REJECTED"
	| "REMOTE_WRITE_FAILED"
	| "CONNECTION_LOST"
	| "UNKNOWN_CONNECTION_STATE"
	| "NOT_CONNECTED";

/**
 * Base class of every GATT-level failure.
 *
 * @example Branching on the failure kind
 * ```typescript
 * try {
 *   await io.writeCharacteristic(char, payload);
 * } catch (e) {
 *   if (e instanceof GattError && e.code === 'REMOTE_WRITE_FAILED') {
 *     // peer rejected the write
 *   }
 * }
 * ```
 */
export class GattError extends Error {
	constructor(
		public readonly code: GattErrorCode,
		message: string,
	) {
		super(message);
		this.name = "GattError";
	}
}

/** connect() was invoked while a connection attempt is live or already done. */
export class AlreadyConnectingError extends GattError {
	constructor(public readonly state: ConnectionState) {
		super("ALREADY_CONNECTING", `connect() already invoked (state: ${state})`);
		this.name = "AlreadyConnectingError";
	}
}

/**
 * A waiter is already registered for this operation key.
 * Only one operation per key may be outstanding.
 */
export class OperationInProgressError extends GattError {
	constructor(public readonly operation: string) {
		super(
			"OPERATION_IN_PROGRESS",
			`Previous ${operation} has not finished`,
		);
		this.name = "OperationInProgressError";
	}
}

export class MissingConfigDescriptorError extends GattError {
	constructor(public readonly characteristic: string) {
		super(
			"MISSING_CONFIG_DESCRIPTOR",
			`Missing client characteristic configuration descriptor on ${characteristic}`,
		);
		this.name = "MissingConfigDescriptorError";
	}
}

export class DiscoveryStartFailedError extends GattError {
	constructor() {
		super("DISCOVERY_START_FAILED", "Failed to start service discovery");
		this.name = "DiscoveryStartFailedError";
	}
}

/**
 * The transport refused to issue a request, so no result event will follow.
 */
export class TransportWriteRejectedError extends GattError {
	constructor(public readonly operation: string) {
		super("TRANSPORT_WRITE_REJECTED", `Transport rejected ${operation}`);
		this.name = "TransportWriteRejectedError";
	}
}

/** The peer answered a write with a non-success GATT status. */
export class RemoteWriteFailedError extends GattError {
	constructor(
		public readonly operation: string,
		public readonly status: number,
	) {
		super("REMOTE_WRITE_FAILED", `Failed ${operation}: status ${status}`);
		this.name = "RemoteWriteFailedError";
	}
}

/** The link went down while the operation was outstanding. */
export class ConnectionLostError extends GattError {
	constructor() {
		super("CONNECTION_LOST", "GATT disconnected");
		this.name = "ConnectionLostError";
	}
}

/**
 * The transport reported a connection state gatt-io does not know.
 * The connection is failed; this is never swallowed.
 */
export class UnknownConnectionStateError extends GattError {
	constructor(public readonly state: number) {
		super("UNKNOWN_CONNECTION_STATE", `Unknown GATT state: ${state}`);
		this.name = "UnknownConnectionStateError";
	}
}

/**
 * Error thrown when attempting an operation that requires a ready connection
 * while the connection is in another state.
 */
export class NotConnectedError extends GattError {
	constructor(public readonly state: ConnectionState) {
		super("NOT_CONNECTED", `Not connected to device (state: ${state})`);
		this.name = "NotConnectedError";
	}
}

/**
 * Custom error class for timeout operations.
 *
 * The waiter is cancelled when this is thrown, but a request already handed
 * to the transport may still complete on the peer.
 */
export class TimeoutError extends Error {
	constructor(
		public readonly operation: string,
		public readonly timeout: number,
	) {
		super(`${operation} timed out after ${timeout}ms`);
		this.name = "TimeoutError";
	}
}

/**
 * Error thrown when an operation is aborted via AbortSignal.
 */
export class AbortError extends Error {
	constructor(message = "Operation aborted") {
		super(message);
		this.name = "AbortError";
	}
}

/** Extracts a readable message from `signal.reason`. */
export function abortMessage(signal: AbortSignal): string {
	const reason: unknown = signal.reason;
	return reason instanceof Error
		? reason.message
		: typeof reason === "string"
			? reason
			: "Operation aborted";
}

/**
 * Throws an AbortError if the given signal is aborted.
 * Use this at the start of async operations to fail fast on abort.
 *
 * @throws {AbortError} If the signal is aborted
 */
export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw new AbortError(abortMessage(signal));
	}
}

/**
 * Normalizes any thrown value into an Error instance.
 */
export function normalizeError(e: unknown): Error {
	if (e instanceof Error) {
		return e;
	}

	if (e === null) {
		return new Error("null");
	}

	if (e === undefined) {
		return new Error("undefined");
	}

	if (typeof e === "string") {
		return new Error(e);
	}

	if (typeof e === "object") {
		try {
			return new Error(JSON.stringify(e));
		} catch {
			// Circular reference
			return new Error(String(e));
		}
	}

	return new Error(String(e));
}

/**
 * Determines if a GATT error is transient and worth retrying.
 *
 * Retries on:
 * - Timeout errors
 * - Remote write failures (non-success status from the peer)
 * - Requests the transport refused to issue
 *
 * Does NOT retry on:
 * - Abort (the caller cancelled)
 * - Connection loss (the connection object is terminal; reconnect instead)
 * - Precondition failures (duplicate operation, missing descriptor, not connected)
 * - Unknown errors
 */
export function isTransientGattError(error: Error): boolean {
	if (error instanceof AbortError) {
		return false;
	}

	if (error instanceof TimeoutError) {
		return true;
	}

	if (error instanceof GattError) {
		switch (error.code) {
			case "REMOTE_WRITE_FAILED":
			case "TRANSPORT_WRITE_REJECTED":
				return true;
			default:
				return false;
		}
	}

	return false;
}
