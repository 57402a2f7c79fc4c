/**
 * Per-characteristic FIFO of notification payloads that arrived while no
 * reader was waiting.
 *
 * Queues are unbounded: payloads are never dropped or reordered until read
 * or explicitly cleared.
 */
export interface NotificationBuffer {
	/** Appends to the tail of the characteristic's queue. */
	push(characteristic: string, payload: Uint8Array): void;

	/** Removes and returns the head, or `null` if nothing is queued. */
	popOrNone(characteristic: string): Uint8Array | null;

	/** Empties one characteristic's queue, or all of them. */
	clear(characteristic?: string): void;

	/** Number of payloads queued for a characteristic. */
	size(characteristic: string): number;

	/** Number of payloads queued across all characteristics. */
	readonly totalSize: number;
}

/**
 * Creates an empty buffer. Queues are created lazily on the first push and
 * stay allocated (empty) once drained.
 */
export function createNotificationBuffer(): NotificationBuffer {
	const queues = new Map<string, Uint8Array[]>();

	return {
		push(characteristic, payload) {
			let queue = queues.get(characteristic);
			if (!queue) {
				queue = [];
				queues.set(characteristic, queue);
			}
			queue.push(payload);
		},

		popOrNone(characteristic) {
			return queues.get(characteristic)?.shift() ?? null;
		},

		clear(characteristic) {
			if (characteristic === undefined) {
				queues.clear();
			} else {
				queues.delete(characteristic);
			}
		},

		size(characteristic) {
			return queues.get(characteristic)?.length ?? 0;
		},

		get totalSize() {
			let total = 0;
			for (const queue of queues.values()) {
				total += queue.length;
			}
			return total;
		},
	};
}
