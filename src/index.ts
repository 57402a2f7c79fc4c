/**
 * gatt-io - Promise-based request/response and notification streaming over a
 * callback-multiplexed BLE GATT transport.
 *
 * @packageDocumentation
 *
 * @example Basic usage
 * ```typescript
 * import { connectGattIo, retryWrite } from 'gatt-io';
 *
 * const io = await connectGattIo(transport, device, {}, { timeoutMs: 20000 });
 *
 * const control = io.getCharacteristic('180d', '2a39');
 * const measurement = io.getCharacteristic('180d', '2a37');
 * if (!control || !measurement) throw new Error('Heart rate service missing');
 *
 * await io.enableNotification(measurement);
 * await retryWrite(io, control, new Uint8Array([0x01]), { attemptTimeoutMs: 2000 });
 *
 * const packet = await io.readCharacteristicChange(measurement, { timeoutMs: 5000 });
 * ```
 */

// Correlation primitives
export {
	CONNECT_KEY,
	type CharacteristicWriteKey,
	type ConnectKey,
	characteristicWriteKey,
	createNotificationBuffer,
	createPendingTable,
	type DescriptorWriteKey,
	descriptorWriteKey,
	formatOperationKey,
	type NotificationBuffer,
	type NotificationReadKey,
	notificationReadKey,
	type OperationKey,
	type OperationKind,
	type PendingTable,
	type PendingTableOptions,
	type Waiter,
} from "./correlation";
// Errors
export {
	AbortError,
	AlreadyConnectingError,
	ConnectionLostError,
	DiscoveryStartFailedError,
	GattError,
	type GattErrorCode,
	isTransientGattError,
	MissingConfigDescriptorError,
	NotConnectedError,
	normalizeError,
	OperationInProgressError,
	RemoteWriteFailedError,
	TimeoutError,
	TransportWriteRejectedError,
	throwIfAborted,
	UnknownConnectionStateError,
} from "./errors";
// GATT engine
export {
	type AnomalyEvent,
	type BackoffOptions,
	CONNECTION_TRANSITIONS,
	type ConnectionLifecycle,
	type ConnectionLifecycleOptions,
	configDescriptorValue,
	connectGattIo,
	createConnectionLifecycle,
	createEventDispatcher,
	createGattIo,
	DISABLE_NOTIFICATION_VALUE,
	ENABLE_INDICATION_VALUE,
	ENABLE_NOTIFICATION_VALUE,
	type EventDispatcherOptions,
	failAllPending,
	type GattAttempt,
	type GattIo,
	type GattIoEvents,
	type GattIoOptions,
	type PendingOperations,
	type RetryEvent,
	type RetryOptions,
	retrySetNotification,
	retryWrite,
	withRetry,
} from "./gatt";
// State management
export {
	createEventEmitter,
	createStateMachine,
	type EventMap,
	type StateMachine,
	type StateMachineOptions,
	type TransitionCallback,
	type TransitionTable,
	type TypedEventEmitter,
} from "./state";
// Types
export {
	type ConnectionState,
	GATT_SUCCESS,
	type GattCharacteristicRef,
	type GattDescriptorRef,
	type GattEvent,
	type GattEventHandler,
	type GattEventType,
	type GattServiceRef,
	type GattTransport,
	LinkState,
	type Logger,
	type NotificationMode,
	type OperationOptions,
} from "./types";
// Utilities
export {
	CLIENT_CHARACTERISTIC_CONFIG_UUID,
	normalizeUuid,
	toFullUuid,
	toHex,
	uuidEquals,
} from "./utils";
