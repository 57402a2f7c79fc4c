/**
 * Edge cases around late, duplicate and out-of-order transport events.
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import {
	AbortError,
	ConnectionLostError,
	NotConnectedError,
	OperationInProgressError,
	TimeoutError,
} from "../../errors";
import { createGattIo } from "../../gatt";
import { LinkState } from "../../types";
import {
	CONTROL_POINT,
	createFakeTransport,
	createSpyLogger,
	FAKE_DEVICE,
	HEART_RATE_MEASUREMENT,
	track,
} from "../helpers/fake-transport";

function setup() {
	const transport = createFakeTransport();
	const logger = createSpyLogger();
	const io = createGattIo(transport, FAKE_DEVICE, { logger });
	return {
		transport,
		logger,
		io,
		hr: transport.characteristic(HEART_RATE_MEASUREMENT),
		control: transport.characteristic(CONTROL_POINT),
	};
}

async function connect({ io, transport }: ReturnType<typeof setup>) {
	const connecting = io.connect();
	transport.linkUp();
	transport.servicesDiscovered();
	await connecting;
}

describe("late and duplicate events", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("ignores a duplicate services-discovered event", async () => {
		const ctx = setup();
		await connect(ctx);

		ctx.transport.servicesDiscovered();

		expect(ctx.io.state).toBe("ready");
		expect(ctx.logger.warn).toHaveBeenCalledWith(
			"[gatt-io:lifecycle] Services discovered in ready state, ignoring",
		);
	});

	it("ignores a link-up after the connection is ready", async () => {
		const ctx = setup();
		await connect(ctx);

		ctx.transport.linkUp();

		expect(ctx.io.state).toBe("ready");
		expect(ctx.transport.discoverServices).toHaveBeenCalledTimes(1);
	});

	it("ignores events after the link was lost", async () => {
		const ctx = setup();
		await connect(ctx);
		ctx.transport.linkDown();

		ctx.transport.linkUp();
		ctx.transport.servicesDiscovered();
		ctx.transport.linkState(LinkState.Connecting);

		expect(ctx.io.state).toBe("disconnected");
		expect(ctx.io.failureReason).toBeNull();
	});

	it("buffers notifications that arrive after a disconnect", async () => {
		const ctx = setup();
		await connect(ctx);
		ctx.transport.linkDown();

		ctx.transport.notify(ctx.hr, new Uint8Array([7]));

		await expect(ctx.io.readCharacteristicChange(ctx.hr)).resolves.toEqual(
			new Uint8Array([7]),
		);
	});

	it("does not let a stale timeout cancel a newer read on the same key", async () => {
		vi.useFakeTimers();
		const ctx = setup();
		await connect(ctx);

		const first = ctx.io.readCharacteristicChange(ctx.hr, { timeoutMs: 100 });
		ctx.transport.notify(ctx.hr, new Uint8Array([1]));
		await expect(first).resolves.toEqual(new Uint8Array([1]));

		const second = ctx.io.readCharacteristicChange(ctx.hr);
		vi.advanceTimersByTime(100);
		expect(ctx.io.pendingOperationCount).toBe(1);

		ctx.transport.notify(ctx.hr, new Uint8Array([2]));
		await expect(second).resolves.toEqual(new Uint8Array([2]));
	});

	it("ignores an abort after the operation completed", async () => {
		const ctx = setup();
		await connect(ctx);
		const controller = new AbortController();

		const writing = ctx.io.writeCharacteristic(ctx.control, new Uint8Array([1]), {
			signal: controller.signal,
		});
		ctx.transport.characteristicWritten(ctx.control);
		await expect(writing).resolves.toBeUndefined();

		const next = track(ctx.io.writeCharacteristic(ctx.control, new Uint8Array([2])));
		controller.abort();

		expect(ctx.io.pendingOperationCount).toBe(1);
		ctx.transport.characteristicWritten(ctx.control);
		await vi.waitFor(() => expect(next.settled).toBe(1));
		expect(next.error).toBeUndefined();
	});

	it("frees the key when a write is aborted", async () => {
		const ctx = setup();
		await connect(ctx);
		const controller = new AbortController();

		const writing = ctx.io.writeCharacteristic(ctx.control, new Uint8Array([1]), {
			signal: controller.signal,
		});
		await expect(
			ctx.io.writeCharacteristic(ctx.control, new Uint8Array([2])),
		).rejects.toThrow(OperationInProgressError);

		controller.abort();
		await expect(writing).rejects.toThrow(AbortError);

		const retry = ctx.io.writeCharacteristic(ctx.control, new Uint8Array([2]));
		ctx.transport.characteristicWritten(ctx.control);
		await expect(retry).resolves.toBeUndefined();
	});

	it("fails a connect that is still discovering when the link drops", async () => {
		const ctx = setup();
		const connecting = ctx.io.connect();
		ctx.transport.linkUp();

		ctx.transport.linkDown(19);

		await expect(connecting).rejects.toThrow(ConnectionLostError);
		expect(ctx.io.state).toBe("disconnected");
	});

	it("reports NotConnectedError for every operation once failed", async () => {
		const ctx = setup();
		await connect(ctx);
		ctx.transport.linkState(42);

		await expect(ctx.io.enableNotification(ctx.hr)).rejects.toThrow(
			NotConnectedError,
		);
		await expect(
			ctx.io.writeCharacteristic(ctx.control, new Uint8Array([1])),
		).rejects.toThrow("Not connected to device (state: failed)");
		await expect(ctx.io.readCharacteristicChange(ctx.hr)).rejects.toThrow(
			NotConnectedError,
		);
	});
});

describe("timeouts", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("times out a configuration write and accepts a new one", async () => {
		vi.useFakeTimers();
		const ctx = setup();
		await connect(ctx);

		const enabling = ctx.io.enableNotification(ctx.hr, { timeoutMs: 300 });
		vi.advanceTimersByTime(300);
		await expect(enabling).rejects.toThrow(TimeoutError);

		// The late confirmation is an anomaly, not a completion of the next call
		ctx.transport.descriptorWritten(ctx.hr);
		const again = ctx.io.enableNotification(ctx.hr);
		expect(ctx.io.pendingOperationCount).toBe(1);
		ctx.transport.descriptorWritten(ctx.hr);
		await expect(again).resolves.toBeUndefined();
	});

	it("lets abort win over a later timeout", async () => {
		vi.useFakeTimers();
		const ctx = setup();
		await connect(ctx);
		const controller = new AbortController();

		const reading = ctx.io.readCharacteristicChange(ctx.hr, {
			signal: controller.signal,
			timeoutMs: 1000,
		});
		controller.abort("navigated away");
		vi.advanceTimersByTime(1000);

		await expect(reading).rejects.toThrow(AbortError);
		await expect(reading).rejects.toThrow("navigated away");
		expect(vi.getTimerCount()).toBe(0);
	});
});
