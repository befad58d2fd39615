import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { Temporal } from "temporal-polyfill";
import { P, match } from "ts-pattern";

import { DEFAULT_ROUTE_COLOR, ROUTE_COLORS, TRACKED_ROUTES } from "../config.js";
import { NoUpcomingTripError, NotFoundError } from "../errors.js";
import { type Direction, getTripDirection } from "../gtfs/schedule-index.js";
import type { LiveSnapshot } from "../gtfs-rt/live-snapshot.js";
import type { Tracker } from "../tracker/create-tracker.js";
import type { EffectiveStopTime } from "../tracker/merge-live-updates.js";
import type { Recommendation } from "../tracker/recommend-departure.js";

export type ServerOptions = {
	tracker: Tracker;
	getSnapshot: (now: Temporal.Instant) => LiveSnapshot | null;
	defaults: { stopId: string; walkDuration: Temporal.Duration; bufferDuration: Temporal.Duration };
	clock?: () => Temporal.Instant;
};

const parseDirection = (input: string | undefined, stopId: string): Direction =>
	match(input ?? stopId.at(-1))
		.with("N", "S", (direction) => direction)
		.otherwise(() => {
			throw new HTTPException(400, { message: "Query parameter 'direction' must be 'N' or 'S'." });
		});

const parseInteger = (name: string, input: string | undefined, fallback: number, min: number, max: number) => {
	if (input === undefined) {
		return fallback;
	}

	const value = Number(input);
	if (input.trim() === "" || !Number.isInteger(value) || value < min || value > max) {
		throw new HTTPException(400, { message: `Query parameter '${name}' must be an integer in [${min}, ${max}].` });
	}

	return value;
};

const parseRoutes = (input: string | undefined) => {
	if (input === undefined) {
		return undefined;
	}

	const routes = new Set<string>();
	for (const value of input.split(",")) {
		const route = TRACKED_ROUTES.find((tracked) => tracked === value.trim());
		if (route === undefined) {
			throw new HTTPException(400, {
				message: `Query parameter 'routes' must list routes among ${TRACKED_ROUTES.join(", ")}.`,
			});
		}
		routes.add(route);
	}
	return routes;
};

const routeColor = (routeId: string) => ROUTE_COLORS.get(routeId) ?? DEFAULT_ROUTE_COLOR;

const serializeRecommendation = (recommendation: Recommendation) => ({
	status: recommendation.status,
	stop: recommendation.stop,
	tripId: recommendation.tripId,
	routeId: recommendation.routeId,
	walkMinutes: recommendation.walkDuration.total("minutes"),
	bufferMinutes: recommendation.bufferDuration.total("minutes"),
	departsAt: recommendation.departsAt.toString(),
	leaveBy: recommendation.leaveBy.toString(),
	spareMinutes: recommendation.status === "time-to-spare" ? recommendation.spare.total("minutes") : 0,
	live: recommendation.live,
});

export function createServer({ tracker, getSnapshot, defaults, clock = () => Temporal.Now.instant() }: ServerOptions) {
	const server = new Hono();

	server.get("/positions", (c) => {
		const now = clock();
		const routes = parseRoutes(c.req.query("routes"));
		const snapshot = getSnapshot(now);
		const positions = tracker.getPositions(snapshot, now, routes).map((position) => ({
			...position,
			color: routeColor(position.routeId),
		}));
		return c.json({ timestamp: now.toString(), live: snapshot !== null, positions });
	});

	server.get("/recommendation", (c) => {
		const now = clock();
		const stopId = c.req.query("stop") ?? defaults.stopId;
		const direction = parseDirection(c.req.query("direction"), stopId);
		const walkMinutes = parseInteger("walk", c.req.query("walk"), defaults.walkDuration.total("minutes"), 0, 120);
		const bufferMinutes = parseInteger("buffer", c.req.query("buffer"), defaults.bufferDuration.total("minutes"), 0, 60);

		try {
			const recommendation = tracker.getRecommendation(getSnapshot(now), {
				stopId,
				direction,
				walkDuration: Temporal.Duration.from({ minutes: walkMinutes }),
				bufferDuration: Temporal.Duration.from({ minutes: bufferMinutes }),
				now,
			});
			return c.json(serializeRecommendation(recommendation));
		} catch (error) {
			if (error instanceof NoUpcomingTripError) {
				return c.json({ status: "no-upcoming-trains", stopId: error.stopId, leaveBy: null, message: error.message });
			}
			throw error;
		}
	});

	server.get("/departures", (c) => {
		const now = clock();
		const stopId = c.req.query("stop") ?? defaults.stopId;
		const direction = parseDirection(c.req.query("direction"), stopId);
		const limit = parseInteger("limit", c.req.query("limit"), 6, 1, 20);

		const { stop, departures } = tracker.getDepartures(getSnapshot(now), { stopId, direction, now, limit });
		return c.json({
			stop,
			departures: departures.map((departure) => ({
				...departure,
				arrival: departure.arrival.toString(),
				departure: departure.departure.toString(),
			})),
		});
	});

	server.get("/trips/:tripId", (c) => {
		const now = clock();
		const { trip, timetable, position } = tracker.getTripStatus(getSnapshot(now), c.req.param("tripId"), now);
		const serializeStopTime = ({ stop, arrival, departure, source }: EffectiveStopTime) => ({
			stop,
			arrival: arrival.toString(),
			departure: departure.toString(),
			source,
		});

		return c.json({
			tripId: trip.id,
			routeId: trip.routeId,
			direction: getTripDirection(trip),
			headsign: trip.headsign,
			active: timetable !== undefined,
			position: position ?? null,
			passed: timetable?.passed.map(serializeStopTime) ?? [],
			upcoming: timetable?.upcoming.map(serializeStopTime) ?? [],
		});
	});

	server.get("/routes/:route/stops", (c) => {
		const route = c.req.param("route");
		const direction = parseDirection(c.req.query("direction") ?? "N", "");
		return c.json({ route, direction, stops: tracker.stopsForRoute(route, direction) });
	});

	server.get("/routes/:route/shape", (c) => {
		const route = c.req.param("route");
		const direction = parseDirection(c.req.query("direction") ?? "N", "");
		const shapes = tracker.shapesForRoute(route, direction).map(({ id, points }) => ({ id, points }));
		return c.json({ route, direction, color: routeColor(route), shapes });
	});

	server.onError((error, c) =>
		match(error)
			.with(P.instanceOf(HTTPException), (exception) => c.json({ error: exception.message }, exception.status))
			.with(P.instanceOf(NotFoundError), (notFound) => c.json({ error: notFound.message }, 404))
			.otherwise((unexpected) => {
				console.error("✘ Request failed:", unexpected);
				return c.json({ error: "Internal server error." }, 500);
			}),
	);

	return server;
}
