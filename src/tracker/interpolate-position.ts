import { Temporal } from "temporal-polyfill";

import type { Shape, Stop } from "../gtfs/import-resource.js";
import { type Direction, getTripDirection } from "../gtfs/schedule-index.js";
import { interpolateAlongPath } from "../utils/interpolate-coordinates.js";

import type { EffectiveTimetable } from "./merge-live-updates.js";

type TrainIdentity = { tripId: string; routeId: string; direction: Direction };

export type TrainPosition =
	| (TrainIdentity & {
			status: "in-transit";
			from: Stop;
			to: Stop;
			progress: number;
			latitude: number;
			longitude: number;
			/** Seconds until arrival at `to`. */
			eta: number;
	  })
	| (TrainIdentity & {
			status: "not-departed";
			stop: Stop;
			progress: 0;
			latitude: number;
			longitude: number;
			/** Seconds until departure from `stop`. */
			eta: number;
	  })
	| (TrainIdentity & { status: "completed"; stop: Stop; progress: 1 });

const secondsBetween = (from: Temporal.Instant, to: Temporal.Instant) => to.since(from).total("seconds");

export function interpolatePosition(timetable: EffectiveTimetable, now: Temporal.Instant, shape?: Shape): TrainPosition {
	const { trip, passed, upcoming } = timetable;
	const identity: TrainIdentity = { tripId: trip.id, routeId: trip.routeId, direction: getTripDirection(trip) };

	const from = passed.at(-1);
	const to = upcoming.at(0);

	if (to === undefined) {
		// `passed` always holds the whole itinerary here.
		const terminus = from ?? trip.stopTimes[trip.stopTimes.length - 1];
		return { ...identity, status: "completed", stop: terminus.stop, progress: 1 };
	}

	if (upcoming.length === 1 && Temporal.Instant.compare(now, to.arrival) > 0) {
		return { ...identity, status: "completed", stop: to.stop, progress: 1 };
	}

	if (from === undefined) {
		return {
			...identity,
			status: "not-departed",
			stop: to.stop,
			progress: 0,
			latitude: to.stop.latitude,
			longitude: to.stop.longitude,
			eta: Math.max(0, secondsBetween(now, to.departure)),
		};
	}

	const travelTime = secondsBetween(from.departure, to.arrival);
	const progress = travelTime <= 0 ? 1 : Math.min(1, Math.max(0, secondsBetween(from.departure, now) / travelTime));
	const [longitude, latitude] = interpolateAlongPath(
		shape?.points,
		[from.stop.longitude, from.stop.latitude],
		[to.stop.longitude, to.stop.latitude],
		progress,
	);

	return {
		...identity,
		status: "in-transit",
		from: from.stop,
		to: to.stop,
		progress,
		latitude,
		longitude,
		eta: Math.max(0, secondsBetween(now, to.arrival)),
	};
}
