import {
	type CharacteristicWriteKey,
	characteristicWriteKey,
	createNotificationBuffer,
	createPendingTable,
	type DescriptorWriteKey,
	descriptorWriteKey,
	formatOperationKey,
	type NotificationReadKey,
	notificationReadKey,
	type OperationKey,
	type PendingTable,
	type Waiter,
} from "../correlation";
import {
	AbortError,
	abortMessage,
	MissingConfigDescriptorError,
	NotConnectedError,
	normalizeError,
	TimeoutError,
	TransportWriteRejectedError,
	throwIfAborted,
} from "../errors";
import { createEventEmitter, type TypedEventEmitter } from "../state";
import type {
	ConnectionState,
	GattCharacteristicRef,
	GattEventHandler,
	GattServiceRef,
	GattTransport,
	Logger,
	NotificationMode,
	OperationOptions,
} from "../types";
import { toHex } from "../utils/bytes";
import { DEFAULT_LOG_PREFIX, scopeLogger } from "../utils/logger";
import {
	CLIENT_CHARACTERISTIC_CONFIG_UUID,
	normalizeUuid,
} from "../utils/uuid";
import { createConnectionLifecycle } from "./connection-lifecycle";
import { configDescriptorValue } from "./constants";
import {
	createEventDispatcher,
	failAllPending,
	type PendingOperations,
} from "./event-dispatcher";

const DISPOSED_MESSAGE = "GattIo disposed";

/**
 * Options for creating a GattIo.
 */
export interface GattIoOptions {
	/**
	 * Forwarded to `transport.connect()`: let the stack complete the
	 * connection whenever the peer becomes available.
	 * @default true
	 */
	autoReconnect?: boolean;
	/**
	 * Where log lines go.
	 * @default console
	 */
	logger?: Logger;
	/**
	 * Prefix for log lines; the component name is appended.
	 * @default "[gatt-io]"
	 */
	logPrefix?: string;
}

/** A transport result that arrived for an operation nobody is waiting on. */
export interface AnomalyEvent {
	key: OperationKey;
	outcome: "resolve" | "fail";
}

/**
 * Events emitted by a GattIo.
 */
export interface GattIoEvents extends Record<string, unknown> {
	stateChange: { from: ConnectionState; to: ConnectionState };
	anomaly: AnomalyEvent;
	error: Error;
}

/**
 * Request/response view of one GATT peer.
 *
 * At most one operation per key may be outstanding: one write per
 * characteristic, one configuration write per characteristic descriptor and
 * one notification read per characteristic. A second call while the first
 * is pending rejects with `OperationInProgressError` and leaves the first
 * untouched.
 *
 * Notifications that arrive while no read is waiting are queued per
 * characteristic, in arrival order, without limit. They survive a
 * disconnect and can still be read afterwards.
 */
export interface GattIo<TDevice = unknown> {
	/** The caller-owned device handle. gatt-io never closes it. */
	readonly device: TDevice;

	readonly state: ConnectionState;

	/** The error that failed the connection, else `null`. */
	readonly failureReason: Error | null;

	/** Number of operations currently waiting on the transport. */
	readonly pendingOperationCount: number;

	/**
	 * Connects and discovers services.
	 * @throws AlreadyConnectingError if called more than once
	 * @throws DiscoveryStartFailedError if discovery could not start
	 * @throws ConnectionLostError if the link drops first
	 */
	connect(options?: OperationOptions): Promise<void>;

	/**
	 * Writes the client characteristic configuration descriptor and toggles
	 * local delivery for `characteristic`.
	 *
	 * @throws MissingConfigDescriptorError if the characteristic has no CCCD
	 * @throws OperationInProgressError if a configuration write is pending
	 * @throws TransportWriteRejectedError if the transport refused to issue it
	 * @throws RemoteWriteFailedError if the peer rejected it
	 */
	setNotification(
		characteristic: GattCharacteristicRef,
		mode: NotificationMode,
		options?: OperationOptions,
	): Promise<void>;

	enableNotification(
		characteristic: GattCharacteristicRef,
		options?: OperationOptions,
	): Promise<void>;

	enableIndication(
		characteristic: GattCharacteristicRef,
		options?: OperationOptions,
	): Promise<void>;

	disableNotification(
		characteristic: GattCharacteristicRef,
		options?: OperationOptions,
	): Promise<void>;

	/**
	 * Writes `characteristic.value`, replacing it with `value` first when given.
	 *
	 * @throws OperationInProgressError if a write to the characteristic is pending
	 * @throws TransportWriteRejectedError if the transport refused to issue it
	 * @throws RemoteWriteFailedError if the peer rejected it
	 */
	writeCharacteristic(
		characteristic: GattCharacteristicRef,
		value?: Uint8Array,
		options?: OperationOptions,
	): Promise<void>;

	/**
	 * Returns the oldest queued notification for `characteristic`, or waits
	 * for the next one.
	 *
	 * @throws OperationInProgressError if a read is already waiting
	 * @throws ConnectionLostError if the link drops while waiting
	 */
	readCharacteristicChange(
		characteristic: GattCharacteristicRef,
		options?: OperationOptions,
	): Promise<Uint8Array>;

	/**
	 * Drops queued notifications for one characteristic, or for all of them.
	 * The next read returns a fresh value.
	 */
	clearNotificationQueue(characteristic?: GattCharacteristicRef): void;

	queuedNotificationCount(characteristic: GattCharacteristicRef): number;

	getService(uuid: string): GattServiceRef | null;

	getCharacteristic(
		serviceUuid: string,
		characteristicUuid: string,
	): GattCharacteristicRef | null;

	onStateChange(
		callback: (from: ConnectionState, to: ConnectionState) => void,
	): () => void;

	/** Results that arrived with nobody waiting. Diagnostic only. */
	onAnomaly(callback: (event: AnomalyEvent) => void): () => void;

	/** Fatal transport misbehaviour, such as an unknown connection state. */
	onError(callback: (error: Error) => void): () => void;

	/**
	 * Fails every outstanding operation with AbortError, ignores further
	 * transport events and removes all listeners.
	 */
	dispose(): void;
}

/**
 * Creates a GattIo for `device`. Nothing is sent to the transport until
 * `connect()` is called.
 *
 * @example Reading heart rate notifications
 * ```typescript
 * const io = createGattIo(transport, device);
 * await io.connect({ timeoutMs: 20000 });
 *
 * const hr = io.getCharacteristic('180d', '2a37');
 * if (!hr) throw new Error('Heart rate characteristic missing');
 *
 * await io.enableNotification(hr);
 * for (;;) {
 *   const packet = await io.readCharacteristicChange(hr);
 *   console.log('Heart rate:', packet[1]);
 * }
 * ```
 */
export function createGattIo<TDevice>(
	transport: GattTransport<TDevice>,
	device: TDevice,
	options: GattIoOptions = {},
): GattIo<TDevice> {
	const {
		autoReconnect = true,
		logger = console,
		logPrefix = DEFAULT_LOG_PREFIX,
	} = options;

	const log = scopeLogger(logger, logPrefix, "gatt-io");
	const dispatcherLog = scopeLogger(logger, logPrefix, "dispatcher");
	const emitter: TypedEventEmitter<GattIoEvents> = createEventEmitter(
		scopeLogger(logger, logPrefix, "event-emitter"),
	);

	function reportAnomaly(key: OperationKey, outcome: "resolve" | "fail"): void {
		dispatcherLog.warn(
			`No waiter for ${formatOperationKey(key)} (${outcome}), ignoring`,
		);
		emitter.emit("anomaly", { key, outcome });
	}

	const lifecycle = createConnectionLifecycle({
		transport,
		log: scopeLogger(logger, logPrefix, "lifecycle"),
		onAnomaly: reportAnomaly,
	});
	lifecycle.onTransition((from, to) => {
		emitter.emit("stateChange", { from, to });
	});

	const pending: PendingOperations = {
		characteristicWrites: createPendingTable<CharacteristicWriteKey, void>({
			keyId: formatOperationKey,
			onAnomaly: reportAnomaly,
		}),
		descriptorWrites: createPendingTable<DescriptorWriteKey, void>({
			keyId: formatOperationKey,
			onAnomaly: reportAnomaly,
		}),
		notificationReads: createPendingTable<NotificationReadKey, Uint8Array>({
			keyId: formatOperationKey,
			onAnomaly: reportAnomaly,
		}),
	};
	const buffer = createNotificationBuffer();

	const dispatch = createEventDispatcher({
		lifecycle,
		pending,
		buffer,
		log: dispatcherLog,
		onError: (error) => emitter.emit("error", error),
	});

	let disposed = false;

	const handleEvent: GattEventHandler = (event) => {
		if (disposed) {
			return;
		}
		dispatch(event);
	};

	function requireReady(): void {
		const state = lifecycle.getState();
		if (state !== "ready") {
			throw new NotConnectedError(state);
		}
	}

	/**
	 * Hands a request to the transport. A refusal (false or a throw) fails
	 * the just-registered waiter, so the caller sees it on the same promise.
	 */
	function issue<TKey>(
		table: PendingTable<TKey, void>,
		key: TKey,
		operation: string,
		request: () => boolean,
	): void {
		let accepted: boolean;
		try {
			accepted = request();
		} catch (e) {
			table.fail(key, normalizeError(e));
			return;
		}
		if (!accepted) {
			table.fail(key, new TransportWriteRejectedError(operation));
		}
	}

	/**
	 * Waits for a waiter to settle. Abort and timeout cancel the waiter,
	 * which frees its key for the next operation.
	 */
	function suspend<TKey, TValue>(
		waiter: Waiter<TKey, TValue>,
		operation: string,
		{ signal, timeoutMs }: OperationOptions,
	): Promise<TValue> {
		if (!signal && timeoutMs === undefined) {
			return waiter.promise;
		}

		return new Promise<TValue>((resolve, reject) => {
			let timer: ReturnType<typeof setTimeout> | undefined;

			const cleanup = () => {
				if (timer !== undefined) {
					clearTimeout(timer);
				}
				signal?.removeEventListener("abort", onAbort);
			};

			const abandon = (error: Error) => {
				cleanup();
				if (waiter.cancel()) {
					log.debug(`Cancelled ${operation}: ${error.message}`);
				}
				reject(error);
			};

			function onAbort(): void {
				abandon(new AbortError(signal ? abortMessage(signal) : undefined));
			}

			if (signal?.aborted) {
				onAbort();
				return;
			}
			signal?.addEventListener("abort", onAbort, { once: true });

			if (timeoutMs !== undefined) {
				timer = setTimeout(() => {
					abandon(new TimeoutError(operation, timeoutMs));
				}, timeoutMs);
			}

			waiter.promise.then(
				(value) => {
					cleanup();
					resolve(value);
				},
				(error: unknown) => {
					cleanup();
					reject(normalizeError(error));
				},
			);
		});
	}

	async function connect(connectOptions: OperationOptions = {}): Promise<void> {
		throwIfAborted(connectOptions.signal);
		if (disposed) {
			throw new AbortError(DISPOSED_MESSAGE);
		}

		const waiter = lifecycle.issueConnect();
		log.debug("Connecting to device");
		try {
			transport.connect(device, autoReconnect, handleEvent);
		} catch (e) {
			lifecycle.fail(normalizeError(e));
		}

		await suspend(waiter, "connect", connectOptions);
		log.debug("Device connected");
	}

	async function setNotification(
		characteristic: GattCharacteristicRef,
		mode: NotificationMode,
		operationOptions: OperationOptions = {},
	): Promise<void> {
		throwIfAborted(operationOptions.signal);
		requireReady();

		const descriptor = transport.getDescriptor(
			characteristic,
			CLIENT_CHARACTERISTIC_CONFIG_UUID,
		);
		if (!descriptor) {
			throw new MissingConfigDescriptorError(characteristic.uuid);
		}

		const key = descriptorWriteKey(
			normalizeUuid(characteristic.uuid),
			normalizeUuid(descriptor.uuid),
		);
		const waiter = pending.descriptorWrites.register(key);
		const value = configDescriptorValue(mode);
		const enable = mode !== "disable";

		log.debug(
			`Setting ${mode} on ${characteristic.uuid} (descriptor ${toHex(value)})`,
		);
		issue(
			pending.descriptorWrites,
			key,
			`notification toggle on ${characteristic.uuid}`,
			() => transport.setCharacteristicNotification(characteristic, enable),
		);
		if (pending.descriptorWrites.has(key)) {
			issue(
				pending.descriptorWrites,
				key,
				`descriptor write on ${characteristic.uuid}`,
				() => transport.writeDescriptor(descriptor, value),
			);
		}

		await suspend(waiter, `setNotification(${characteristic.uuid})`, operationOptions);
	}

	async function writeCharacteristic(
		characteristic: GattCharacteristicRef,
		value?: Uint8Array,
		operationOptions: OperationOptions = {},
	): Promise<void> {
		throwIfAborted(operationOptions.signal);
		requireReady();

		const key = characteristicWriteKey(normalizeUuid(characteristic.uuid));
		const waiter = pending.characteristicWrites.register(key);
		if (value !== undefined) {
			characteristic.value = value;
		}

		log.debug(
			`Writing ${characteristic.uuid} ${toHex(characteristic.value)}`,
		);
		issue(
			pending.characteristicWrites,
			key,
			`characteristic write on ${characteristic.uuid}`,
			() => transport.writeCharacteristic(characteristic),
		);

		await suspend(
			waiter,
			`writeCharacteristic(${characteristic.uuid})`,
			operationOptions,
		);
	}

	async function readCharacteristicChange(
		characteristic: GattCharacteristicRef,
		operationOptions: OperationOptions = {},
	): Promise<Uint8Array> {
		throwIfAborted(operationOptions.signal);

		const id = normalizeUuid(characteristic.uuid);
		const queued = buffer.popOrNone(id);
		if (queued !== null) {
			return queued;
		}

		requireReady();
		const waiter = pending.notificationReads.register(notificationReadKey(id));
		return suspend(
			waiter,
			`readCharacteristicChange(${characteristic.uuid})`,
			operationOptions,
		);
	}

	function clearNotificationQueue(characteristic?: GattCharacteristicRef): void {
		buffer.clear(
			characteristic === undefined ? undefined : normalizeUuid(characteristic.uuid),
		);
	}

	function getCharacteristic(
		serviceUuid: string,
		characteristicUuid: string,
	): GattCharacteristicRef | null {
		const service = transport.getService(serviceUuid);
		if (!service) {
			return null;
		}
		return transport.getCharacteristic(service, characteristicUuid);
	}

	function dispose(): void {
		if (disposed) {
			return;
		}
		disposed = true;
		const error = new AbortError(DISPOSED_MESSAGE);
		failAllPending(pending, error);
		// From a state-change listener this transition is announced once
		// the current announcement finishes
		lifecycle.fail(error);
		emitter.removeAllListeners();
	}

	return {
		device,
		get state() {
			return lifecycle.getState();
		},
		get failureReason() {
			return lifecycle.failureReason;
		},
		get pendingOperationCount() {
			return (
				(lifecycle.isConnectPending() ? 1 : 0) +
				pending.characteristicWrites.size +
				pending.descriptorWrites.size +
				pending.notificationReads.size
			);
		},
		connect,
		setNotification,
		enableNotification: (characteristic, operationOptions) =>
			setNotification(characteristic, "notification", operationOptions),
		enableIndication: (characteristic, operationOptions) =>
			setNotification(characteristic, "indication", operationOptions),
		disableNotification: (characteristic, operationOptions) =>
			setNotification(characteristic, "disable", operationOptions),
		writeCharacteristic,
		readCharacteristicChange,
		clearNotificationQueue,
		queuedNotificationCount: (characteristic) =>
			buffer.size(normalizeUuid(characteristic.uuid)),
		getService: (uuid) => transport.getService(uuid),
		getCharacteristic,
		onStateChange: (callback) =>
			emitter.on("stateChange", ({ from, to }) => callback(from, to)),
		onAnomaly: (callback) => emitter.on("anomaly", callback),
		onError: (callback) => emitter.on("error", callback),
		dispose,
	};
}

/**
 * Creates a GattIo and connects it. Services have been discovered by the
 * time the promise resolves.
 *
 * @example
 * ```typescript
 * const io = await connectGattIo(transport, device, { logPrefix: '[hr-strap]' }, {
 *   timeoutMs: 20000,
 * });
 * ```
 */
export async function connectGattIo<TDevice>(
	transport: GattTransport<TDevice>,
	device: TDevice,
	options: GattIoOptions = {},
	connectOptions: OperationOptions = {},
): Promise<GattIo<TDevice>> {
	const io = createGattIo(transport, device, options);
	await io.connect(connectOptions);
	return io;
}
