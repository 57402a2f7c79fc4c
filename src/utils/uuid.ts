/** Bluetooth Base UUID suffix for constructing full UUIDs */
export const BLUETOOTH_UUID_BASE = "-0000-1000-8000-00805f9b34fb";

/** Client Characteristic Configuration descriptor (0x2902). */
export const CLIENT_CHARACTERISTIC_CONFIG_UUID = `00002902${BLUETOOTH_UUID_BASE}`;

/**
 * Converts a short UUID to a full Bluetooth Base UUID.
 * @param shortId - A number (0-65535) or hex string (1-4 chars)
 * @throws RangeError if number is out of 16-bit range
 * @throws Error if string is invalid hex or empty
 *
 * @example
 * ```typescript
 * toFullUuid(0x2902); // "00002902-0000-1000-8000-00805f9b34fb"
 * toFullUuid("fe00"); // "0000fe00-0000-1000-8000-00805f9b34fb"
 * ```
 */
export function toFullUuid(shortId: number | string): string {
	if (typeof shortId === "number") {
		if (!Number.isInteger(shortId) || shortId < 0 || shortId > 0xffff) {
			throw new RangeError(
				`Short UUID must be integer 0-65535, got ${shortId}`,
			);
		}
		return `0000${shortId.toString(16).padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
	}

	if (shortId.length === 0 || shortId.length > 4) {
		throw new Error(
			`Invalid short UUID length: ${shortId.length} (must be 1-4)`,
		);
	}

	if (!/^[0-9a-fA-F]+$/.test(shortId)) {
		throw new Error(`Invalid short UUID format: ${shortId} (must be hex)`);
	}

	return `0000${shortId.toLowerCase().padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
}

/**
 * Canonical form of a UUID, used to build operation keys.
 * Short 16-bit and 32-bit forms are expanded; full UUIDs are lower-cased.
 * Anything else is returned lower-cased and trimmed so transports with
 * non-standard identifiers still key consistently.
 *
 * @example
 * ```typescript
 * normalizeUuid("2A37"); // "00002a37-0000-1000-8000-00805f9b34fb"
 * normalizeUuid("00002a37"); // same
 * normalizeUuid("00002A37-0000-1000-8000-00805F9B34FB"); // same
 * ```
 */
export function normalizeUuid(uuid: string): string {
	const trimmed = uuid.trim().toLowerCase();
	if (/^[0-9a-f]{1,4}$/.test(trimmed)) {
		return toFullUuid(trimmed);
	}
	if (/^[0-9a-f]{8}$/.test(trimmed)) {
		return `${trimmed}${BLUETOOTH_UUID_BASE}`;
	}
	return trimmed;
}

/**
 * Checks whether two UUIDs name the same attribute, in any supported form.
 */
export function uuidEquals(a: string, b: string): boolean {
	return normalizeUuid(a) === normalizeUuid(b);
}
