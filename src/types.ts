/**
 * @fileoverview Core type definitions for gatt-io.
 *
 * ## Null vs Undefined Conventions
 *
 * - **`null`**: Intentionally empty or "not found"
 *   - transport lookups return `null` when a service, characteristic or
 *     descriptor does not exist on the peer
 *   - `NotificationBuffer.popOrNone()` returns `null` when nothing is queued
 *   - `failureReason` is `null` unless the connection has failed
 *
 * - **`undefined`**: Not set yet or optional property
 *   - `characteristic.value` is `undefined` until a payload is assigned
 *   - optional option properties
 */

/**
 * Connection lifecycle state.
 * - 'idle': created, connect() not issued yet
 * - 'connecting': waiting for the link to come up
 * - 'discovering-services': link is up, waiting for service discovery
 * - 'ready': services discovered, operations may be issued
 * - 'disconnected': link lost (terminal)
 * - 'failed': connection could not be set up or the transport misbehaved (terminal)
 */
export type ConnectionState =
	| "idle"
	| "connecting"
	| "discovering-services"
	| "ready"
	| "disconnected"
	| "failed";

/** GATT status reported with a successful operation result. */
export const GATT_SUCCESS = 0;

/**
 * Link states reported by `connection-state-changed` events.
 * Only `Connected` and `Disconnected` are acted upon; anything else is
 * treated as an unknown state.
 */
export const LinkState = {
	Disconnected: 0,
	Connecting: 1,
	Connected: 2,
	Disconnecting: 3,
} as const;

export type LinkState = (typeof LinkState)[keyof typeof LinkState];

/** A primary GATT service handle as exposed by the transport. */
export interface GattServiceRef {
	readonly uuid: string;
}

/**
 * A GATT characteristic handle as exposed by the transport.
 *
 * `value` is the pending payload: it is what `transport.writeCharacteristic()`
 * sends, so it is assigned before a write is issued.
 */
export interface GattCharacteristicRef {
	readonly uuid: string;
	value: Uint8Array | undefined;
}

/** A GATT descriptor handle, attached to its owning characteristic. */
export interface GattDescriptorRef {
	readonly uuid: string;
	readonly characteristic: GattCharacteristicRef;
}

/**
 * Events delivered by the transport through its single callback entry point.
 * They may arrive in any order relative to one another.
 */
export type GattEvent =
	| {
			type: "connection-state-changed";
			status: number;
			newState: number;
	  }
	| {
			type: "services-discovered";
			status: number;
	  }
	| {
			type: "descriptor-write";
			descriptor: GattDescriptorRef;
			status: number;
	  }
	| {
			type: "characteristic-write";
			characteristic: GattCharacteristicRef;
			status: number;
	  }
	| {
			type: "characteristic-changed";
			characteristic: GattCharacteristicRef;
			value: Uint8Array;
	  }
	| {
			type: "characteristic-read";
			characteristic: GattCharacteristicRef;
			value: Uint8Array;
			status: number;
	  };

export type GattEventType = GattEvent["type"];

export type GattEventHandler = (event: GattEvent) => void;

/**
 * The native GATT stack the library drives.
 *
 * Every `boolean`-returning method reports whether the request could be
 * issued at all; the outcome of an issued request arrives later as a
 * {@link GattEvent} on the handler passed to `connect()`.
 *
 * @remarks
 * The device handle is owned by the caller, who is also responsible for
 * closing it. gatt-io never releases it.
 *
 * @example Wiring a custom stack
 * ```typescript
 * const transport: GattTransport<MyDevice> = {
 *   connect(device, autoReconnect, onEvent) {
 *     stack.open(device, { autoReconnect });
 *     stack.on('event', (raw) => onEvent(toGattEvent(raw)));
 *   },
 *   discoverServices: () => stack.discover(),
 *   writeDescriptor: (desc, value) => stack.writeDescriptor(desc, value),
 *   writeCharacteristic: (char) => stack.writeCharacteristic(char),
 *   setCharacteristicNotification: (char, enable) => stack.notify(char, enable),
 *   getService: (uuid) => stack.service(uuid),
 *   getCharacteristic: (service, uuid) => stack.characteristic(service, uuid),
 *   getDescriptor: (char, uuid) => stack.descriptor(char, uuid),
 * };
 * ```
 */
export interface GattTransport<TDevice = unknown> {
	/**
	 * Starts connecting to `device`. Connection-state changes and every later
	 * result are delivered to `onEvent`.
	 */
	connect(device: TDevice, autoReconnect: boolean, onEvent: GattEventHandler): void;

	/** @returns false if discovery could not be started */
	discoverServices(): boolean;

	writeDescriptor(descriptor: GattDescriptorRef, value: Uint8Array): boolean;

	/** Writes `characteristic.value`. */
	writeCharacteristic(characteristic: GattCharacteristicRef): boolean;

	/** Enables or disables local delivery of changes for `characteristic`. */
	setCharacteristicNotification(
		characteristic: GattCharacteristicRef,
		enable: boolean,
	): boolean;

	getService(uuid: string): GattServiceRef | null;

	getCharacteristic(
		service: GattServiceRef,
		uuid: string,
	): GattCharacteristicRef | null;

	getDescriptor(
		characteristic: GattCharacteristicRef,
		uuid: string,
	): GattDescriptorRef | null;
}

/**
 * How a characteristic delivers server-initiated values.
 * Indications are acknowledged by the stack; both arrive as
 * `characteristic-changed` events.
 */
export type NotificationMode = "notification" | "indication" | "disable";

/**
 * Cancellation options accepted by every suspending operation.
 */
export interface OperationOptions {
	/** Abandon the operation when this signal aborts. */
	signal?: AbortSignal;
	/** Abandon the operation after this many milliseconds. No timeout by default. */
	timeoutMs?: number;
}

/**
 * Minimal logger contract. `console` satisfies it.
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}
