/**
 * Identity of one outstanding operation. At most one waiter may be live per
 * key at any instant. Characteristic and descriptor identifiers are
 * normalised UUIDs (see `normalizeUuid`).
 */
export type OperationKey =
	| { kind: "connect" }
	| { kind: "characteristic-write"; characteristic: string }
	| { kind: "descriptor-write"; characteristic: string; descriptor: string }
	| { kind: "notification-read"; characteristic: string };

export type OperationKind = OperationKey["kind"];

export type ConnectKey = Extract<OperationKey, { kind: "connect" }>;
export type CharacteristicWriteKey = Extract<
	OperationKey,
	{ kind: "characteristic-write" }
>;
export type DescriptorWriteKey = Extract<
	OperationKey,
	{ kind: "descriptor-write" }
>;
export type NotificationReadKey = Extract<
	OperationKey,
	{ kind: "notification-read" }
>;

export const CONNECT_KEY: ConnectKey = { kind: "connect" };

export function characteristicWriteKey(
	characteristic: string,
): CharacteristicWriteKey {
	return { kind: "characteristic-write", characteristic };
}

export function descriptorWriteKey(
	characteristic: string,
	descriptor: string,
): DescriptorWriteKey {
	return { kind: "descriptor-write", characteristic, descriptor };
}

export function notificationReadKey(
	characteristic: string,
): NotificationReadKey {
	return { kind: "notification-read", characteristic };
}

/**
 * Stable string identity of a key, used as the map key in pending tables
 * and in diagnostics.
 *
 * @example
 * ```typescript
 * formatOperationKey(descriptorWriteKey("2a37", "2902"));
 * // "descriptor-write:2a37/2902"
 * ```
 */
export function formatOperationKey(key: OperationKey): string {
	switch (key.kind) {
		case "connect":
			return "connect";
		case "characteristic-write":
		case "notification-read":
			return `${key.kind}:${key.characteristic}`;
		case "descriptor-write":
			return `${key.kind}:${key.characteristic}/${key.descriptor}`;
	}
}
