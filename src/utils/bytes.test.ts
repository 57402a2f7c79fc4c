import { describe, expect, it } from "vitest";
import { copyBytes, toHex } from "./bytes";

describe("copyBytes", () => {
	it("returns an independent copy", () => {
		const source = new Uint8Array([1, 2, 3]);
		const copy = copyBytes(source);
		source[0] = 9;
		expect(Array.from(copy)).toEqual([1, 2, 3]);
	});

	it("copies only the viewed window of a shared buffer", () => {
		const backing = new Uint8Array([0, 1, 2, 3, 4]);
		const view = backing.subarray(1, 3);
		const copy = copyBytes(view);
		expect(copy.byteOffset).toBe(0);
		expect(copy.buffer.byteLength).toBe(2);
		expect(Array.from(copy)).toEqual([1, 2]);
	});
});

describe("toHex", () => {
	it("renders zero-padded hex bytes", () => {
		expect(toHex(new Uint8Array([0x01, 0xab, 0x00]))).toBe("01 ab 00");
	});

	it("marks empty and missing payloads", () => {
		expect(toHex(new Uint8Array())).toBe("<empty>");
		expect(toHex(undefined)).toBe("<none>");
	});
});
