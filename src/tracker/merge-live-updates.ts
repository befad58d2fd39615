import { Temporal } from "temporal-polyfill";

import { InconsistentOrderingError } from "../errors.js";
import type { Stop, Trip } from "../gtfs/import-resource.js";
import type { LiveArrival } from "../gtfs-rt/live-snapshot.js";
import { atServiceTime } from "../utils/parse-time.js";

export type EffectiveStopTime = {
	sequence: number;
	stop: Stop;
	arrival: Temporal.Instant;
	departure: Temporal.Instant;
	source: "live" | "schedule";
};

export type EffectiveTimetable = {
	trip: Trip;
	serviceDate: Temporal.PlainDate;
	/** Stops the train has already left, in itinerary order. */
	passed: EffectiveStopTime[];
	/** Stops the train has not left yet, in itinerary order. */
	upcoming: EffectiveStopTime[];
};

export type MergeContext = {
	now: Temporal.Instant;
	serviceDate: Temporal.PlainDate;
	timeZone: string;
	stalenessThreshold: Temporal.Duration;
};

const latest = (a: Temporal.Instant, b: Temporal.Instant) => (Temporal.Instant.compare(a, b) >= 0 ? a : b);

export function isFresh(arrival: LiveArrival, now: Temporal.Instant, stalenessThreshold: Temporal.Duration) {
	return Temporal.Instant.compare(now.subtract(stalenessThreshold), arrival.feedTimestamp) <= 0;
}

/**
 * Resolves the effective time at every stop of `trip`: the live prediction when one is fresh, the static schedule
 * otherwise. Times never go backwards along the itinerary; a live time earlier than the previous stop is clamped.
 */
export function mergeLiveUpdates(
	trip: Trip,
	liveArrivals: ReadonlyMap<string, LiveArrival> | undefined,
	{ now, serviceDate, timeZone, stalenessThreshold }: MergeContext,
): EffectiveTimetable {
	const passed: EffectiveStopTime[] = [];
	const upcoming: EffectiveStopTime[] = [];
	let previousDeparture: Temporal.Instant | undefined;

	for (const stopTime of trip.stopTimes) {
		const live = liveArrivals?.get(stopTime.stop.id);

		let arrival: Temporal.Instant;
		let departure: Temporal.Instant;
		let source: EffectiveStopTime["source"];

		if (live !== undefined && isFresh(live, now, stalenessThreshold)) {
			arrival = live.arrival;
			departure = live.departure ?? live.arrival.add({ seconds: stopTime.departure - stopTime.arrival });
			source = "live";
		} else {
			arrival = atServiceTime(serviceDate, stopTime.arrival, timeZone);
			departure = atServiceTime(serviceDate, stopTime.departure, timeZone);
			source = "schedule";
		}

		if (previousDeparture !== undefined && Temporal.Instant.compare(arrival, previousDeparture) < 0) {
			console.warn(new InconsistentOrderingError(trip.id, stopTime.stop.id, arrival, previousDeparture).message);
			arrival = previousDeparture;
		}
		departure = latest(departure, arrival);
		previousDeparture = departure;

		const effective = { sequence: stopTime.sequence, stop: stopTime.stop, arrival, departure, source };
		if (Temporal.Instant.compare(departure, now) < 0) {
			passed.push(effective);
		} else {
			upcoming.push(effective);
		}
	}

	return { trip, serviceDate, passed, upcoming };
}

export const hasLiveData = (timetable: EffectiveTimetable) =>
	timetable.passed.some(({ source }) => source === "live") ||
	timetable.upcoming.some(({ source }) => source === "live");
