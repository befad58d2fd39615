import { match } from "ts-pattern";

import { NotFoundError } from "../errors.js";

import type { GtfsResource, Shape, Stop, Trip } from "./import-resource.js";

/** NYCT platforms carry their direction as an `N` or `S` suffix. */
export type Direction = "N" | "S";

export type RouteStop = { sequence: number; stop: Stop };

export function getTripDirection(trip: Trip): Direction {
	return match(trip.stopTimes[0]?.stop.id.at(-1))
		.with("N", "S", (suffix) => suffix)
		.otherwise(() => (trip.directionId === 0 ? "N" : "S"));
}

export function findTripIssue(trip: Trip) {
	if (trip.stopTimes.length < 2) {
		return "has fewer than two stop times";
	}

	for (let i = 0; i < trip.stopTimes.length; i += 1) {
		const stopTime = trip.stopTimes[i];
		if (stopTime.departure < stopTime.arrival) {
			return `departs '${stopTime.stop.id}' before arriving there`;
		}

		const previous = trip.stopTimes[i - 1];
		if (previous !== undefined && stopTime.arrival < previous.departure) {
			return `arrives at '${stopTime.stop.id}' before leaving '${previous.stop.id}'`;
		}
	}
}

/**
 * Immutable lookups over the static schedule.
 */
export class ScheduleIndex {
	private readonly routeStops = new Map<string, readonly RouteStop[]>();
	private readonly routeShapes = new Map<string, readonly Shape[]>();

	constructor(
		private readonly stops: ReadonlyMap<string, Stop>,
		private readonly tripsById: ReadonlyMap<string, Trip>,
		private readonly shapes: ReadonlyMap<string, Shape>,
	) {
		const longestTrips = new Map<string, Trip>();
		const shapeIds = new Map<string, Set<string>>();

		for (const trip of tripsById.values()) {
			Object.freeze(trip.stopTimes);
			Object.freeze(trip);

			const routeKey = `${trip.routeId}:${getTripDirection(trip)}`;
			const longest = longestTrips.get(routeKey);
			if (longest === undefined || longest.stopTimes.length < trip.stopTimes.length) {
				longestTrips.set(routeKey, trip);
			}

			let routeShapeIds = shapeIds.get(routeKey);
			if (routeShapeIds === undefined) {
				routeShapeIds = new Set();
				shapeIds.set(routeKey, routeShapeIds);
			}
			if (trip.shapeId !== undefined) routeShapeIds.add(trip.shapeId);
		}

		for (const [routeKey, trip] of longestTrips) {
			this.routeStops.set(
				routeKey,
				Object.freeze(trip.stopTimes.map(({ stop }, index) => Object.freeze({ sequence: index + 1, stop }))),
			);
		}

		for (const [routeKey, ids] of shapeIds) {
			const routeShapes: Shape[] = [];
			for (const id of ids) {
				const shape = shapes.get(id);
				if (shape !== undefined) {
					Object.freeze(shape.points);
					routeShapes.push(Object.freeze(shape));
				}
			}
			this.routeShapes.set(routeKey, Object.freeze(routeShapes));
		}
	}

	get trips(): Iterable<Trip> {
		return this.tripsById.values();
	}

	lookupTrip(tripId: string) {
		const trip = this.tripsById.get(tripId);
		if (trip === undefined) {
			throw new NotFoundError("trip", tripId);
		}

		return trip;
	}

	lookupStop(stopId: string) {
		const stop = this.stops.get(stopId);
		if (stop === undefined) {
			throw new NotFoundError("stop", stopId);
		}

		return stop;
	}

	/** Accepts either a platform id or its parent station id. */
	resolvePlatform(stopId: string, direction: Direction) {
		const platform = this.stops.get(`${stopId}${direction}`);
		if (platform !== undefined) {
			return platform;
		}

		const stop = this.lookupStop(stopId);
		const suffix = stop.id.at(-1);
		if ((suffix === "N" || suffix === "S") && suffix !== direction) {
			throw new NotFoundError("stop", `${stopId.slice(0, -1)}${direction}`);
		}

		return stop;
	}

	stopsForRoute(routeId: string, direction: Direction) {
		const stops = this.routeStops.get(`${routeId}:${direction}`);
		if (stops === undefined) {
			throw new NotFoundError("route", `${routeId} (${direction})`);
		}

		return stops;
	}

	/** Distinct path geometries used by the trips of a route in one direction. */
	shapesForRoute(routeId: string, direction: Direction) {
		const shapes = this.routeShapes.get(`${routeId}:${direction}`);
		if (shapes === undefined) {
			throw new NotFoundError("route", `${routeId} (${direction})`);
		}

		return shapes;
	}

	shapeFor(trip: Trip) {
		return trip.shapeId === undefined ? undefined : this.shapes.get(trip.shapeId);
	}
}

export function createScheduleIndex(resource: Pick<GtfsResource, "stops" | "trips" | "shapes">) {
	const trips = new Map<string, Trip>();

	for (const [id, trip] of resource.trips) {
		const issue = findTripIssue(trip);
		if (issue !== undefined) {
			console.warn(`    ⛛ Rejected trip '${id}': it ${issue}.`);
			continue;
		}

		trips.set(id, trip);
	}

	return new ScheduleIndex(resource.stops, trips, resource.shapes);
}
