/**
 * Copies a payload so later mutation of the source (transports commonly
 * reuse their receive buffers) cannot change what was queued or delivered.
 */
export function copyBytes(data: Uint8Array): Uint8Array {
	return Uint8Array.from(data);
}

/**
 * Renders bytes as space-separated hex for log lines.
 *
 * @example
 * ```typescript
 * toHex(new Uint8Array([0x01, 0xab])); // "01 ab"
 * toHex(undefined); // "<none>"
 * ```
 */
export function toHex(data: Uint8Array | undefined): string {
	if (!data) {
		return "<none>";
	}
	if (data.length === 0) {
		return "<empty>";
	}
	return Array.from(data, (b) => b.toString(16).padStart(2, "0")).join(" ");
}
