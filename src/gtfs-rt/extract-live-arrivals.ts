import GtfsRealtime from "gtfs-realtime-bindings";
import { Temporal } from "temporal-polyfill";

import type { LiveArrival } from "./live-snapshot.js";

type Timestamp = number | { toNumber(): number } | null | undefined;

const { SKIPPED, NO_DATA } = GtfsRealtime.transit_realtime.TripUpdate.StopTimeUpdate.ScheduleRelationship;

function toInstant(timestamp: Timestamp) {
	if (timestamp === null || timestamp === undefined) {
		return undefined;
	}

	const seconds = typeof timestamp === "number" ? timestamp : timestamp.toNumber();
	return seconds > 0 ? Temporal.Instant.fromEpochMilliseconds(seconds * 1000) : undefined;
}

function toPlainDate(input: string | null | undefined) {
	if (!input || !/^\d{8}$/.test(input)) {
		return undefined;
	}

	return Temporal.PlainDate.from(input);
}

/**
 * Turns the trip updates of a decoded feed into validated live arrivals.
 * Entities of routes outside `routes` are dropped, malformed stop time updates are counted in `rejected`.
 */
export function extractLiveArrivals(feed: GtfsRealtime.transit_realtime.IFeedMessage, routes: ReadonlySet<string>) {
	const headerTimestamp = toInstant(feed.header?.timestamp);
	const arrivals: LiveArrival[] = [];
	let rejected = 0;

	for (const entity of feed.entity ?? []) {
		const tripUpdate = entity.tripUpdate;
		if (!tripUpdate) {
			continue;
		}

		const stopTimeUpdates = tripUpdate.stopTimeUpdate ?? [];
		const tripId = tripUpdate.trip?.tripId;
		const routeId = tripUpdate.trip?.routeId || undefined;
		if (routeId !== undefined && !routes.has(routeId)) {
			continue;
		}

		const feedTimestamp = toInstant(tripUpdate.timestamp) ?? headerTimestamp;
		if (!tripId || feedTimestamp === undefined) {
			rejected += stopTimeUpdates.length;
			continue;
		}

		const startDate = toPlainDate(tripUpdate.trip?.startDate);

		for (const stopTimeUpdate of stopTimeUpdates) {
			if (stopTimeUpdate.scheduleRelationship === SKIPPED || stopTimeUpdate.scheduleRelationship === NO_DATA) {
				continue;
			}

			const arrival = toInstant(stopTimeUpdate.arrival?.time);
			const departure = toInstant(stopTimeUpdate.departure?.time);
			const predicted = arrival ?? departure;
			if (!stopTimeUpdate.stopId || predicted === undefined) {
				rejected += 1;
				continue;
			}

			arrivals.push({
				tripId,
				stopId: stopTimeUpdate.stopId,
				routeId,
				startDate,
				arrival: predicted,
				departure,
				feedTimestamp,
			});
		}
	}

	return { arrivals, rejected };
}
