export { copyBytes, toHex } from "./bytes";

export { DEFAULT_LOG_PREFIX, type ScopedLogger, scopeLogger } from "./logger";

export {
	BLUETOOTH_UUID_BASE,
	CLIENT_CHARACTERISTIC_CONFIG_UUID,
	normalizeUuid,
	toFullUuid,
	uuidEquals,
} from "./uuid";
