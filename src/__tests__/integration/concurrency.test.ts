/**
 * Interleaving properties of the correlation engine, driven through the
 * public GattIo surface with randomly ordered transport events.
 */

import * as fc from "fast-check";
import { describe, expect, it, vi } from "vitest";
import { ConnectionLostError, RemoteWriteFailedError } from "../../errors";
import { createGattIo } from "../../gatt";
import {
	CONTROL_POINT,
	createFakeTransport,
	createSpyLogger,
	FAKE_DEVICE,
	flush,
	HEART_RATE_MEASUREMENT,
	track,
} from "../helpers/fake-transport";

async function connected() {
	const transport = createFakeTransport();
	const io = createGattIo(transport, FAKE_DEVICE, { logger: createSpyLogger() });
	const connecting = io.connect();
	transport.linkUp();
	transport.servicesDiscovered();
	await connecting;
	return {
		transport,
		io,
		hr: transport.characteristic(HEART_RATE_MEASUREMENT),
		control: transport.characteristic(CONTROL_POINT),
	};
}

type StreamOp = { type: "notify"; byte: number } | { type: "read" };

const streamOpArb: fc.Arbitrary<StreamOp> = fc.oneof(
	fc.record({ type: fc.constant("notify" as const), byte: fc.nat(255) }),
	fc.record({ type: fc.constant("read" as const) }),
);

describe("notification ordering", () => {
	it("delivers every payload exactly once, in arrival order", async () => {
		await fc.assert(
			fc.asyncProperty(fc.array(streamOpArb, { maxLength: 40 }), async (ops) => {
				const { transport, io, hr } = await connected();
				const sent: number[] = [];
				const reads: Promise<Uint8Array>[] = [];

				for (const op of ops) {
					if (op.type === "notify") {
						sent.push(op.byte);
						transport.notify(hr, new Uint8Array([op.byte]));
					} else if (io.pendingOperationCount === 0) {
						// A second reader would be rejected; the model skips it
						reads.push(io.readCharacteristicChange(hr));
					}
				}

				// A reader still waiting receives nothing; release it
				if (io.pendingOperationCount > 0) {
					transport.notify(hr, new Uint8Array([0]));
					sent.push(0);
				}

				const received: number[] = [];
				for (const payload of await Promise.all(reads)) {
					received.push(...payload);
				}
				while (io.queuedNotificationCount(hr) > 0) {
					received.push(...(await io.readCharacteristicChange(hr)));
				}

				expect(received).toEqual(sent);
			}),
		);
	});

	it("never buffers a payload while a reader is waiting", async () => {
		await fc.assert(
			fc.asyncProperty(
				fc.array(fc.nat(255), { minLength: 1, maxLength: 20 }),
				async (bytes) => {
					const { transport, io, hr } = await connected();

					for (const byte of bytes) {
						const reading = io.readCharacteristicChange(hr);
						transport.notify(hr, new Uint8Array([byte]));
						expect(io.queuedNotificationCount(hr)).toBe(0);
						await expect(reading).resolves.toEqual(new Uint8Array([byte]));
					}
				},
			),
		);
	});
});

describe("disconnect fan-out", () => {
	const pendingArb = fc.record({
		hrWrite: fc.boolean(),
		controlWrite: fc.boolean(),
		hrConfig: fc.boolean(),
		hrRead: fc.boolean(),
		controlRead: fc.boolean(),
		buffered: fc.nat(5),
	});

	it("fails exactly the outstanding waiters once and keeps the buffer", async () => {
		await fc.assert(
			fc.asyncProperty(pendingArb, async (plan) => {
				const { transport, io, hr, control } = await connected();
				const outcomes: ReturnType<typeof track>[] = [];

				for (let i = 0; i < plan.buffered; i++) {
					transport.notify(control, new Uint8Array([i]));
				}
				if (plan.hrWrite) {
					outcomes.push(track(io.writeCharacteristic(hr, new Uint8Array([1]))));
				}
				if (plan.controlWrite) {
					outcomes.push(
						track(io.writeCharacteristic(control, new Uint8Array([2]))),
					);
				}
				if (plan.hrConfig) {
					outcomes.push(track(io.enableNotification(hr)));
				}
				if (plan.hrRead) {
					outcomes.push(track(io.readCharacteristicChange(hr)));
				}
				// With payloads buffered the read completes at once
				const controlReadWaits = plan.controlRead && plan.buffered === 0;
				if (controlReadWaits) {
					outcomes.push(track(io.readCharacteristicChange(control)));
				}

				expect(io.pendingOperationCount).toBe(outcomes.length);

				transport.linkDown();
				// Duplicate disconnects must not fail anything twice
				transport.linkDown();
				await flush();

				expect(io.pendingOperationCount).toBe(0);
				for (const outcome of outcomes) {
					expect(outcome.settled).toBe(1);
					expect(outcome.error).toBeInstanceOf(ConnectionLostError);
				}
				expect(io.queuedNotificationCount(control)).toBe(plan.buffered);
			}),
		);
	});
});

describe("at-most-once settlement", () => {
	it("settles a write by its first confirmation and reports the rest", async () => {
		await fc.assert(
			fc.asyncProperty(
				fc.array(fc.constantFrom(0, 1, 5, 133), { minLength: 1, maxLength: 6 }),
				async (statuses) => {
					const { transport, io, control } = await connected();
					const anomalies = vi.fn();
					io.onAnomaly(anomalies);

					const outcome = track(
						io.writeCharacteristic(control, new Uint8Array([0xaa])),
					);
					for (const status of statuses) {
						transport.characteristicWritten(control, status);
					}
					await flush();

					expect(outcome.settled).toBe(1);
					if (statuses[0] === 0) {
						expect(outcome.error).toBeUndefined();
					} else {
						expect(outcome.error).toBeInstanceOf(RemoteWriteFailedError);
					}
					expect(anomalies).toHaveBeenCalledTimes(statuses.length - 1);
				},
			),
		);
	});

	it("keeps operations on different characteristics independent", async () => {
		await fc.assert(
			fc.asyncProperty(fc.boolean(), fc.boolean(), async (hrOk, controlOk) => {
				const { transport, io, hr, control } = await connected();

				const hrWrite = track(io.writeCharacteristic(hr, new Uint8Array([1])));
				const controlWrite = track(
					io.writeCharacteristic(control, new Uint8Array([2])),
				);

				transport.characteristicWritten(control, controlOk ? 0 : 1);
				expect(io.pendingOperationCount).toBe(1);
				transport.characteristicWritten(hr, hrOk ? 0 : 1);
				await flush();

				expect(hrWrite.settled).toBe(1);
				expect(controlWrite.settled).toBe(1);
				expect(hrWrite.error === undefined).toBe(hrOk);
				expect(controlWrite.error === undefined).toBe(controlOk);
			}),
		);
	});
});
