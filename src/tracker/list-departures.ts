import { Temporal } from "temporal-polyfill";

import type { EffectiveTimetable } from "./merge-live-updates.js";
import { findUpcomingCandidates } from "./recommend-departure.js";

export type Departure = {
	tripId: string;
	routeId: string;
	headsign?: string;
	arrival: Temporal.Instant;
	departure: Temporal.Instant;
	minutesAway: number;
	live: boolean;
};

export function listDepartures(
	timetables: Iterable<EffectiveTimetable>,
	stopId: string,
	now: Temporal.Instant,
	{ limit, lookahead }: { limit: number; lookahead: Temporal.Duration },
): Departure[] {
	return findUpcomingCandidates(timetables, stopId, now, lookahead)
		.filter(({ stopTime }) => Temporal.Instant.compare(stopTime.departure, now) >= 0)
		.slice(0, limit)
		.map(({ timetable, stopTime }) => ({
			tripId: timetable.trip.id,
			routeId: timetable.trip.routeId,
			headsign: timetable.trip.headsign,
			arrival: stopTime.arrival,
			departure: stopTime.departure,
			minutesAway: Math.floor(stopTime.departure.since(now).total("minutes")),
			live: stopTime.source === "live",
		}));
}
