import {
	type CharacteristicWriteKey,
	characteristicWriteKey,
	type DescriptorWriteKey,
	descriptorWriteKey,
	type NotificationBuffer,
	type NotificationReadKey,
	notificationReadKey,
	type PendingTable,
} from "../correlation";
import {
	ConnectionLostError,
	RemoteWriteFailedError,
	UnknownConnectionStateError,
} from "../errors";
import {
	GATT_SUCCESS,
	type GattEvent,
	type GattEventHandler,
	LinkState,
} from "../types";
import { copyBytes, toHex } from "../utils/bytes";
import type { ScopedLogger } from "../utils/logger";
import { normalizeUuid } from "../utils/uuid";
import type { ConnectionLifecycle } from "./connection-lifecycle";

/** The per-operation waiter tables, one per key variant. */
export interface PendingOperations {
	characteristicWrites: PendingTable<CharacteristicWriteKey, void>;
	descriptorWrites: PendingTable<DescriptorWriteKey, void>;
	notificationReads: PendingTable<NotificationReadKey, Uint8Array>;
}

/**
 * Fails every outstanding operation in every table.
 * @returns the number of waiters failed
 */
export function failAllPending(
	pending: PendingOperations,
	error: Error,
): number {
	return (
		pending.characteristicWrites.failAll(error) +
		pending.descriptorWrites.failAll(error) +
		pending.notificationReads.failAll(error)
	);
}

export interface EventDispatcherOptions {
	lifecycle: ConnectionLifecycle;
	pending: PendingOperations;
	buffer: NotificationBuffer;
	log: ScopedLogger;
	/** Receives fatal transport misbehaviour, such as an unknown link state. */
	onError?: (error: Error) => void;
}

/**
 * Creates the single ingress point for transport events.
 *
 * Every event is routed synchronously: by the time the handler returns, the
 * matching waiter has been settled (its continuation runs later, as a
 * microtask) or the payload has been queued.
 */
export function createEventDispatcher(
	options: EventDispatcherOptions,
): GattEventHandler {
	const { lifecycle, pending, buffer, log, onError } = options;

	function settleWrite<TKey>(
		table: PendingTable<TKey, void>,
		key: TKey,
		status: number,
		operation: string,
	): void {
		if (status === GATT_SUCCESS) {
			table.resolve(key, undefined);
		} else {
			table.fail(key, new RemoteWriteFailedError(operation, status));
		}
	}

	function onConnectionStateChanged(status: number, newState: number): void {
		switch (newState) {
			case LinkState.Connected:
				lifecycle.linkEstablished();
				return;
			case LinkState.Disconnected: {
				log.debug(`GATT disconnected (status ${status})`);
				// Waiters fail before listeners hear about the disconnect
				const failed = failAllPending(pending, new ConnectionLostError());
				if (failed > 0) {
					log.debug(`Failed ${failed} pending operation(s) on disconnect`);
				}
				lifecycle.linkLost();
				return;
			}
			default: {
				const error = new UnknownConnectionStateError(newState);
				log.error(`${error.message} (status ${status})`);
				failAllPending(pending, error);
				lifecycle.fail(error);
				onError?.(error);
			}
		}
	}

	function onCharacteristicChanged(characteristic: string, value: Uint8Array): void {
		const payload = copyBytes(value);
		const key = notificationReadKey(characteristic);
		if (pending.notificationReads.has(key)) {
			pending.notificationReads.resolve(key, payload);
		} else {
			buffer.push(characteristic, payload);
		}
	}

	return (event: GattEvent): void => {
		switch (event.type) {
			case "connection-state-changed":
				onConnectionStateChanged(event.status, event.newState);
				break;

			case "services-discovered":
				lifecycle.discoveryComplete(event.status);
				break;

			case "descriptor-write": {
				const { descriptor, status } = event;
				log.debug(
					`Descriptor WRITTEN ${descriptor.characteristic.uuid}/${descriptor.uuid} status ${status}`,
				);
				settleWrite(
					pending.descriptorWrites,
					descriptorWriteKey(
						normalizeUuid(descriptor.characteristic.uuid),
						normalizeUuid(descriptor.uuid),
					),
					status,
					"descriptor write",
				);
				break;
			}

			case "characteristic-write": {
				const { characteristic, status } = event;
				log.debug(
					`Characteristic WRITTEN ${characteristic.uuid} status ${status} ${toHex(characteristic.value)}`,
				);
				settleWrite(
					pending.characteristicWrites,
					characteristicWriteKey(normalizeUuid(characteristic.uuid)),
					status,
					"characteristic write",
				);
				break;
			}

			case "characteristic-changed":
				log.debug(
					`Characteristic CHANGED ${event.characteristic.uuid} ${toHex(event.value)}`,
				);
				onCharacteristicChanged(
					normalizeUuid(event.characteristic.uuid),
					event.value,
				);
				break;

			case "characteristic-read":
				// No operation waits on explicit reads
				log.debug(
					`Characteristic READ ${event.characteristic.uuid} status ${event.status} ${toHex(event.value)}`,
				);
				break;

			default: {
				const unrecognised: never = event;
				log.warn("Ignoring unrecognised event:", unrecognised);
			}
		}
	};
}
