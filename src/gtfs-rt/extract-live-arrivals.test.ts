import GtfsRealtime from "gtfs-realtime-bindings";
import { describe, expect, it } from "vitest";

import { buildFeed, encodeFeed, epoch } from "../../test/feed-builder.js";

import { extractLiveArrivals } from "./extract-live-arrivals.js";
import type { LiveArrival } from "./live-snapshot.js";

const { SKIPPED } = GtfsRealtime.transit_realtime.TripUpdate.StopTimeUpdate.ScheduleRelationship;

const feed = buildFeed(epoch("10:01:00"), [
	{
		trip: { tripId: "060000_J..S", routeId: "J", startDate: "20260302" },
		stopTimeUpdate: [
			{ stopId: "A1S", scheduleRelationship: SKIPPED, arrival: { time: epoch("10:00:00") } },
			{ stopId: "B1S", arrival: { time: epoch("10:03:00") }, departure: { time: epoch("10:03:30") } },
			{ stopId: "C1S", departure: { time: epoch("10:06:00") } },
			{ stopId: "D1S" },
			{ arrival: { time: epoch("10:09:00") } },
		],
	},
	{
		trip: { tripId: "061000_A..N", routeId: "A" },
		stopTimeUpdate: [{ stopId: "A1N", arrival: { time: epoch("10:10:00") } }],
	},
	{
		trip: { routeId: "Z" },
		stopTimeUpdate: [
			{ stopId: "A1S", arrival: { time: epoch("10:12:00") } },
			{ stopId: "B1S", arrival: { time: epoch("10:15:00") } },
		],
	},
	{
		trip: { tripId: "062000_M..N" },
		timestamp: epoch("10:01:30"),
		stopTimeUpdate: [{ stopId: "C1N", arrival: { time: epoch("10:20:00") } }],
	},
]);

const describeArrival = (arrival: LiveArrival) => ({
	tripId: arrival.tripId,
	stopId: arrival.stopId,
	routeId: arrival.routeId,
	startDate: arrival.startDate?.toString(),
	arrival: arrival.arrival.toString(),
	departure: arrival.departure?.toString(),
	feedTimestamp: arrival.feedTimestamp.toString(),
});

const expectedArrivals = [
	{
		tripId: "060000_J..S",
		stopId: "B1S",
		routeId: "J",
		startDate: "2026-03-02",
		arrival: "2026-03-02T15:03:00Z",
		departure: "2026-03-02T15:03:30Z",
		feedTimestamp: "2026-03-02T15:01:00Z",
	},
	{
		tripId: "060000_J..S",
		stopId: "C1S",
		routeId: "J",
		startDate: "2026-03-02",
		arrival: "2026-03-02T15:06:00Z",
		departure: "2026-03-02T15:06:00Z",
		feedTimestamp: "2026-03-02T15:01:00Z",
	},
	{
		tripId: "062000_M..N",
		stopId: "C1N",
		routeId: undefined,
		startDate: undefined,
		arrival: "2026-03-02T15:20:00Z",
		departure: undefined,
		feedTimestamp: "2026-03-02T15:01:30Z",
	},
];

describe("extractLiveArrivals", () => {
	it("keeps predictions of tracked routes and counts malformed updates", () => {
		const { arrivals, rejected } = extractLiveArrivals(feed, new Set(["J", "Z", "M"]));

		expect(arrivals.map(describeArrival)).toEqual(expectedArrivals);
		expect(rejected).toBe(4);
	});

	it("reads the 64-bit timestamps of a decoded feed", () => {
		const decoded = GtfsRealtime.transit_realtime.FeedMessage.decode(encodeFeed(feed));

		const { arrivals, rejected } = extractLiveArrivals(decoded, new Set(["J", "Z", "M"]));

		expect(arrivals.map(describeArrival)).toEqual(expectedArrivals);
		expect(rejected).toBe(4);
	});

	it("drops every entity of untracked routes", () => {
		const { arrivals } = extractLiveArrivals(feed, new Set(["A"]));

		expect(arrivals.map(({ tripId }) => tripId)).toEqual(["061000_A..N", "062000_M..N"]);
	});

	it("rejects trip updates without any timestamp", () => {
		const { arrivals, rejected } = extractLiveArrivals(
			{
				header: { gtfsRealtimeVersion: "2.0" },
				entity: [
					{
						id: "1",
						tripUpdate: {
							trip: { tripId: "060000_J..S", routeId: "J" },
							stopTimeUpdate: [{ stopId: "B1S", arrival: { time: epoch("10:03:00") } }],
						},
					},
				],
			},
			new Set(["J"]),
		);

		expect(arrivals).toEqual([]);
		expect(rejected).toBe(1);
	});
});
