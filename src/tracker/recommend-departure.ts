import { Temporal } from "temporal-polyfill";

import { NoUpcomingTripError } from "../errors.js";
import type { Stop } from "../gtfs/import-resource.js";

import type { EffectiveStopTime, EffectiveTimetable } from "./merge-live-updates.js";

export type RecommendationRequest = {
	stop: Stop;
	walkDuration: Temporal.Duration;
	bufferDuration: Temporal.Duration;
	now: Temporal.Instant;
	lookahead: Temporal.Duration;
};

export type Recommendation = {
	stop: Stop;
	tripId: string;
	routeId: string;
	walkDuration: Temporal.Duration;
	bufferDuration: Temporal.Duration;
	departsAt: Temporal.Instant;
	leaveBy: Temporal.Instant;
	live: boolean;
} & ({ status: "time-to-spare"; spare: Temporal.Duration } | { status: "leave-now" });

type Candidate = { timetable: EffectiveTimetable; stopTime: EffectiveStopTime };

export function findUpcomingCandidates(
	timetables: Iterable<EffectiveTimetable>,
	stopId: string,
	now: Temporal.Instant,
	lookahead: Temporal.Duration,
) {
	const horizon = now.add(lookahead);
	const candidates: Candidate[] = [];

	for (const timetable of timetables) {
		const stopTime = timetable.upcoming.find(({ stop }) => stop.id === stopId);
		if (stopTime !== undefined && Temporal.Instant.compare(stopTime.departure, horizon) <= 0) {
			candidates.push({ timetable, stopTime });
		}
	}

	return candidates.sort((a, b) => Temporal.Instant.compare(a.stopTime.departure, b.stopTime.departure));
}

/**
 * Picks the earliest train still departing `request.stop` and tells when to leave to catch it.
 * A train whose departure is already behind `now` is skipped in favor of the next one.
 */
export function recommendDeparture(timetables: Iterable<EffectiveTimetable>, request: RecommendationRequest) {
	const { stop, walkDuration, bufferDuration, now, lookahead } = request;
	const candidates = findUpcomingCandidates(timetables, stop.id, now, lookahead);

	const recommend = ([candidate, ...others]: Candidate[]): Recommendation => {
		if (candidate === undefined) {
			throw new NoUpcomingTripError(stop.id, lookahead);
		}

		const departsAt = candidate.stopTime.departure;
		if (Temporal.Instant.compare(now, departsAt) > 0) {
			return recommend(others);
		}

		const leaveBy = departsAt.subtract(walkDuration).subtract(bufferDuration);
		const base = {
			stop,
			tripId: candidate.timetable.trip.id,
			routeId: candidate.timetable.trip.routeId,
			walkDuration,
			bufferDuration,
			departsAt,
			leaveBy,
			live: candidate.stopTime.source === "live",
		};

		return Temporal.Instant.compare(now, leaveBy) <= 0
			? { ...base, status: "time-to-spare", spare: leaveBy.since(now) }
			: { ...base, status: "leave-now" };
	};

	return recommend(candidates);
}
