export {
	CONNECTION_TRANSITIONS,
	type ConnectionLifecycle,
	type ConnectionLifecycleOptions,
	createConnectionLifecycle,
} from "./connection-lifecycle";

export {
	configDescriptorValue,
	DISABLE_NOTIFICATION_VALUE,
	ENABLE_INDICATION_VALUE,
	ENABLE_NOTIFICATION_VALUE,
} from "./constants";

export {
	createEventDispatcher,
	type EventDispatcherOptions,
	failAllPending,
	type PendingOperations,
} from "./event-dispatcher";

export {
	type AnomalyEvent,
	connectGattIo,
	createGattIo,
	type GattIo,
	type GattIoEvents,
	type GattIoOptions,
} from "./gatt-io";

export {
	type BackoffOptions,
	type GattAttempt,
	type RetryEvent,
	type RetryOptions,
	retrySetNotification,
	retryWrite,
	withRetry,
} from "./retry";
