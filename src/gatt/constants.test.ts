import { describe, expect, it } from "vitest";
import type { NotificationMode } from "../types";
import {
	configDescriptorValue,
	DISABLE_NOTIFICATION_VALUE,
	ENABLE_INDICATION_VALUE,
	ENABLE_NOTIFICATION_VALUE,
} from "./constants";

describe("configDescriptorValue", () => {
	it.each<[NotificationMode, number[]]>([
		["notification", [0x01, 0x00]],
		["indication", [0x02, 0x00]],
		["disable", [0x00, 0x00]],
	])("%s writes %j", (mode, expected) => {
		expect(Array.from(configDescriptorValue(mode))).toEqual(expected);
	});

	it("returns a fresh array on every call", () => {
		const first = configDescriptorValue("notification");
		first[0] = 0xff;

		expect(configDescriptorValue("notification")[0]).toBe(0x01);
		expect(ENABLE_NOTIFICATION_VALUE[0]).toBe(0x01);
	});

	it("keeps the descriptor values two bytes long", () => {
		for (const value of [
			ENABLE_NOTIFICATION_VALUE,
			ENABLE_INDICATION_VALUE,
			DISABLE_NOTIFICATION_VALUE,
		]) {
			expect(value).toHaveLength(2);
		}
	});
});
