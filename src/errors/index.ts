export {
	AbortError,
	AlreadyConnectingError,
	abortMessage,
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
