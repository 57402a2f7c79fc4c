import type { NotificationMode } from "../types";

/** CCCD value enabling notifications. */
export const ENABLE_NOTIFICATION_VALUE = [0x01, 0x00] as const;

/** CCCD value enabling indications. */
export const ENABLE_INDICATION_VALUE = [0x02, 0x00] as const;

/** CCCD value disabling both notifications and indications. */
export const DISABLE_NOTIFICATION_VALUE = [0x00, 0x00] as const;

const CONFIG_VALUES: Record<NotificationMode, readonly number[]> = {
	notification: ENABLE_NOTIFICATION_VALUE,
	indication: ENABLE_INDICATION_VALUE,
	disable: DISABLE_NOTIFICATION_VALUE,
};

/**
 * Bytes written to the client characteristic configuration descriptor for
 * `mode`. Returns a fresh array on every call.
 */
export function configDescriptorValue(mode: NotificationMode): Uint8Array {
	return Uint8Array.from(CONFIG_VALUES[mode]);
}
