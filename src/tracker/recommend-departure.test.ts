import { Temporal } from "temporal-polyfill";
import { describe, expect, it } from "vitest";

import { SERVICE_DATE, TIME_ZONE, at, byStop, makeLiveArrival, makeTrip, platforms } from "../../test/schedule-builder.js";
import { NoUpcomingTripError } from "../errors.js";
import type { LiveArrival } from "../gtfs-rt/live-snapshot.js";
import type { Trip } from "../gtfs/import-resource.js";

import { mergeLiveUpdates } from "./merge-live-updates.js";
import { type Recommendation, recommendDeparture } from "./recommend-departure.js";

const first = makeTrip("R1", [
	[platforms.alphaS, "10:05:00"],
	[platforms.bravoS, "10:10:00"],
	[platforms.charlieS, "10:15:00"],
]);

const second = makeTrip("R2", [
	[platforms.alphaS, "10:20:00"],
	[platforms.bravoS, "10:25:00"],
	[platforms.charlieS, "10:30:00"],
]);

const timetablesAt = (trips: Trip[], mergedAt: Temporal.Instant, live?: Map<string, ReadonlyMap<string, LiveArrival>>) =>
	trips.map((trip) =>
		mergeLiveUpdates(trip, live?.get(trip.id), {
			now: mergedAt,
			serviceDate: SERVICE_DATE,
			timeZone: TIME_ZONE,
			stalenessThreshold: Temporal.Duration.from({ seconds: 120 }),
		}),
	);

const request = (now: Temporal.Instant, lookahead = Temporal.Duration.from({ minutes: 60 })) => ({
	stop: platforms.bravoS,
	walkDuration: Temporal.Duration.from({ minutes: 6 }),
	bufferDuration: Temporal.Duration.from({ minutes: 2 }),
	now,
	lookahead,
});

const summarize = (recommendation: Recommendation) => ({
	status: recommendation.status,
	tripId: recommendation.tripId,
	departsAt: recommendation.departsAt.toString(),
	leaveBy: recommendation.leaveBy.toString(),
	spareMinutes: recommendation.status === "time-to-spare" ? recommendation.spare.total("minutes") : 0,
	live: recommendation.live,
});

describe("recommendDeparture", () => {
	it("tells how long is left before leaving", () => {
		const now = at("10:01:00");

		expect(summarize(recommendDeparture(timetablesAt([second, first], now), request(now)))).toEqual({
			status: "time-to-spare",
			tripId: "R1",
			departsAt: "2026-03-02T15:10:00Z",
			leaveBy: "2026-03-02T15:02:00Z",
			spareMinutes: 1,
			live: false,
		});
	});

	it("has no spare time left exactly at the leave-by time", () => {
		const now = at("10:02:00");

		const recommendation = recommendDeparture(timetablesAt([first], now), request(now));

		expect(recommendation.status).toBe("time-to-spare");
		expect(summarize(recommendation).spareMinutes).toBe(0);
	});

	it("tells to leave now once the leave-by time has passed", () => {
		const now = at("10:03:00");

		expect(summarize(recommendDeparture(timetablesAt([first, second], now), request(now)))).toEqual({
			status: "leave-now",
			tripId: "R1",
			departsAt: "2026-03-02T15:10:00Z",
			leaveBy: "2026-03-02T15:02:00Z",
			spareMinutes: 0,
			live: false,
		});
	});

	it("relies on live predictions when there are some", () => {
		const now = at("10:01:00");
		const live = new Map([[first.id, byStop(makeLiveArrival(first, platforms.bravoS, at("10:13:00"), at("10:00:40")))]]);

		expect(summarize(recommendDeparture(timetablesAt([first], now, live), request(now)))).toEqual({
			status: "time-to-spare",
			tripId: "R1",
			departsAt: "2026-03-02T15:13:00Z",
			leaveBy: "2026-03-02T15:05:00Z",
			spareMinutes: 4,
			live: true,
		});
	});

	it("fails when no train is left", () => {
		const now = at("10:11:00");

		expect(() => recommendDeparture(timetablesAt([first], now), request(now))).toThrow(
			new NoUpcomingTripError("B1S", Temporal.Duration.from({ minutes: 60 })),
		);
	});

	it("skips a train that left since the timetables were merged", () => {
		const timetables = timetablesAt([first, second], at("10:09:00"));

		expect(summarize(recommendDeparture(timetables, request(at("10:11:00"))))).toEqual({
			status: "time-to-spare",
			tripId: "R2",
			departsAt: "2026-03-02T15:25:00Z",
			leaveBy: "2026-03-02T15:17:00Z",
			spareMinutes: 6,
			live: false,
		});
	});

	it("ignores trains beyond the lookahead window", () => {
		const now = at("10:01:00");

		expect(() =>
			recommendDeparture(timetablesAt([first], now), request(now, Temporal.Duration.from({ minutes: 5 }))),
		).toThrow("No upcoming train at 'B1S' within the next 5 minutes.");
	});

	it("gives the same answer when asked twice", () => {
		const now = at("10:01:00");
		const timetables = timetablesAt([first, second], now);

		expect(summarize(recommendDeparture(timetables, request(now)))).toEqual(
			summarize(recommendDeparture(timetables, request(now))),
		);
	});
});
