import { Temporal } from "temporal-polyfill";
import { describe, expect, it } from "vitest";

import type { Service } from "../gtfs/import-resource.js";

import { isServiceOperatingOn } from "./is-service-operating-on.js";

const weekdays: Service = {
	id: "Weekday",
	days: [true, true, true, true, true, false, false],
	startDate: Temporal.PlainDate.from("2026-01-01"),
	endDate: Temporal.PlainDate.from("2026-06-30"),
	includedDays: [Temporal.PlainDate.from("2026-03-07")],
	excludedDays: [Temporal.PlainDate.from("2026-05-25")],
};

describe("isServiceOperatingOn", () => {
	it("follows the weekly pattern, Monday first", () => {
		expect(isServiceOperatingOn(weekdays, Temporal.PlainDate.from("2026-03-02"))).toBe(true);
		expect(isServiceOperatingOn(weekdays, Temporal.PlainDate.from("2026-03-06"))).toBe(true);
		expect(isServiceOperatingOn(weekdays, Temporal.PlainDate.from("2026-03-08"))).toBe(false);
	});

	it("applies added and removed dates before the weekly pattern", () => {
		expect(isServiceOperatingOn(weekdays, Temporal.PlainDate.from("2026-03-07"))).toBe(true);
		expect(isServiceOperatingOn(weekdays, Temporal.PlainDate.from("2026-05-25"))).toBe(false);
	});

	it("is inactive outside of its validity range", () => {
		expect(isServiceOperatingOn(weekdays, Temporal.PlainDate.from("2025-12-31"))).toBe(false);
		expect(isServiceOperatingOn(weekdays, Temporal.PlainDate.from("2026-07-01"))).toBe(false);
		expect(isServiceOperatingOn(weekdays, Temporal.PlainDate.from("2026-06-30"))).toBe(true);
	});
});
