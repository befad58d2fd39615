import { Temporal } from "temporal-polyfill";

import type { Trip } from "../gtfs/import-resource.js";
import { getRealtimeTripKey } from "../utils/realtime-trip-key.js";

export type LiveArrival = {
	tripId: string;
	stopId: string;
	routeId?: string;
	startDate?: Temporal.PlainDate;
	arrival: Temporal.Instant;
	departure?: Temporal.Instant;
	feedTimestamp: Temporal.Instant;
};

export type LiveTripUpdate = {
	tripKey: string;
	startDate?: Temporal.PlainDate;
	stops: ReadonlyMap<string, LiveArrival>;
};

export type LiveSnapshot = {
	readonly fetchedAt: Temporal.Instant;
	readonly updates: ReadonlyMap<string, LiveTripUpdate>;
};

const getUpdateKey = (tripKey: string, startDate?: Temporal.PlainDate) => `${tripKey}@${startDate?.toString() ?? "*"}`;

/**
 * Groups live arrivals by trip. For a given trip and stop, the arrival with the most recent feed timestamp wins.
 */
export function createLiveSnapshot(arrivals: Iterable<LiveArrival>, fetchedAt: Temporal.Instant): LiveSnapshot {
	const updates = new Map<string, { tripKey: string; startDate?: Temporal.PlainDate; stops: Map<string, LiveArrival> }>();

	for (const arrival of arrivals) {
		const tripKey = getRealtimeTripKey(arrival.tripId);
		const updateKey = getUpdateKey(tripKey, arrival.startDate);

		let update = updates.get(updateKey);
		if (update === undefined) {
			update = { tripKey, startDate: arrival.startDate, stops: new Map() };
			updates.set(updateKey, update);
		}

		const current = update.stops.get(arrival.stopId);
		if (current === undefined || Temporal.Instant.compare(arrival.feedTimestamp, current.feedTimestamp) > 0) {
			update.stops.set(arrival.stopId, arrival);
		}
	}

	return Object.freeze({ fetchedAt, updates });
}

/**
 * Live arrivals for a trip running on `serviceDate`, keyed by stop id.
 * Updates without a start date apply to any service date.
 */
export function getLiveArrivals(snapshot: LiveSnapshot | null, trip: Trip, serviceDate: Temporal.PlainDate) {
	if (snapshot === null) {
		return undefined;
	}

	const tripKey = getRealtimeTripKey(trip.id);
	const update = snapshot.updates.get(getUpdateKey(tripKey, serviceDate)) ?? snapshot.updates.get(getUpdateKey(tripKey));
	return update?.stops;
}
