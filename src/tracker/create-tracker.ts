import { Temporal } from "temporal-polyfill";

import type { Trip } from "../gtfs/import-resource.js";
import type { Direction, ScheduleIndex } from "../gtfs/schedule-index.js";
import { type LiveSnapshot, getLiveArrivals } from "../gtfs-rt/live-snapshot.js";
import { getOperatingTrips } from "../utils/get-operating-trips.js";
import { atServiceTime, getServiceDates } from "../utils/parse-time.js";

import { interpolatePosition, type TrainPosition } from "./interpolate-position.js";
import { listDepartures } from "./list-departures.js";
import { type EffectiveTimetable, hasLiveData, mergeLiveUpdates } from "./merge-live-updates.js";
import { recommendDeparture } from "./recommend-departure.js";

export type TrackerOptions = {
	timeZone: string;
	stalenessThreshold: Temporal.Duration;
	lookahead: Temporal.Duration;
	/** How long after its scheduled end a trip is still considered, to cover delays. */
	lateTolerance: Temporal.Duration;
};

export type MapPosition = Exclude<TrainPosition, { status: "completed" }> & { live: boolean };

export function createTracker(index: ScheduleIndex, options: TrackerOptions) {
	const { timeZone, stalenessThreshold, lookahead, lateTolerance } = options;
	const operatingTripsByDate = new Map<string, Trip[]>();

	const getTripsOn = (serviceDate: Temporal.PlainDate) => {
		const key = serviceDate.toString();
		let trips = operatingTripsByDate.get(key);
		if (trips === undefined) {
			// Only three consecutive service dates are ever asked for.
			if (operatingTripsByDate.size >= 4) operatingTripsByDate.clear();
			trips = getOperatingTrips(index.trips, serviceDate);
			operatingTripsByDate.set(key, trips);
		}
		return trips;
	};

	/**
	 * Effective timetables of every trip instance that may be running between `now - lateTolerance` and
	 * `now + lookahead`. A `null` snapshot yields static-only timetables.
	 */
	const timetables = (snapshot: LiveSnapshot | null, now: Temporal.Instant) => {
		const earliest = now.subtract(lateTolerance);
		const horizon = now.add(lookahead);
		const result: EffectiveTimetable[] = [];

		for (const serviceDate of getServiceDates(now, timeZone)) {
			for (const trip of getTripsOn(serviceDate)) {
				const start = atServiceTime(serviceDate, trip.stopTimes[0].departure, timeZone);
				const end = atServiceTime(serviceDate, trip.stopTimes[trip.stopTimes.length - 1].arrival, timeZone);
				if (Temporal.Instant.compare(start, horizon) > 0 || Temporal.Instant.compare(end, earliest) < 0) {
					continue;
				}

				const liveArrivals = getLiveArrivals(snapshot, trip, serviceDate);
				result.push(mergeLiveUpdates(trip, liveArrivals, { now, serviceDate, timeZone, stalenessThreshold }));
			}
		}

		return result;
	};

	return {
		timetables,

		/**
		 * Trains to draw on the map: in transit, or waiting at their origin with a train assigned.
		 * `routes` restricts them to some routes.
		 */
		getPositions(snapshot: LiveSnapshot | null, now: Temporal.Instant, routes?: ReadonlySet<string>) {
			const positions: MapPosition[] = [];

			for (const timetable of timetables(snapshot, now)) {
				if (routes !== undefined && !routes.has(timetable.trip.routeId)) continue;
				const position = interpolatePosition(timetable, now, index.shapeFor(timetable.trip));
				const live = hasLiveData(timetable);
				if (position.status === "in-transit" || (position.status === "not-departed" && live)) {
					positions.push({ ...position, live });
				}
			}

			return positions;
		},

		getRecommendation(
			snapshot: LiveSnapshot | null,
			request: {
				stopId: string;
				direction: Direction;
				walkDuration: Temporal.Duration;
				bufferDuration: Temporal.Duration;
				now: Temporal.Instant;
			},
		) {
			const stop = index.resolvePlatform(request.stopId, request.direction);
			return recommendDeparture(timetables(snapshot, request.now), {
				stop,
				walkDuration: request.walkDuration,
				bufferDuration: request.bufferDuration,
				now: request.now,
				lookahead,
			});
		},

		getDepartures(
			snapshot: LiveSnapshot | null,
			request: { stopId: string; direction: Direction; now: Temporal.Instant; limit: number },
		) {
			const stop = index.resolvePlatform(request.stopId, request.direction);
			const departures = listDepartures(timetables(snapshot, request.now), stop.id, request.now, {
				limit: request.limit,
				lookahead,
			});
			return { stop, departures };
		},

		/** Effective timetable and position of a single trip, when it is running around `now`. */
		getTripStatus(snapshot: LiveSnapshot | null, tripId: string, now: Temporal.Instant) {
			const trip = index.lookupTrip(tripId);
			const timetable = timetables(snapshot, now).find((candidate) => candidate.trip.id === trip.id);
			return {
				trip,
				timetable,
				position: timetable && interpolatePosition(timetable, now, index.shapeFor(trip)),
			};
		},

		stopsForRoute(routeId: string, direction: Direction) {
			return index.stopsForRoute(routeId, direction);
		},

		shapesForRoute(routeId: string, direction: Direction) {
			return index.shapesForRoute(routeId, direction);
		},
	};
}

export type Tracker = ReturnType<typeof createTracker>;
