import type { Temporal } from "temporal-polyfill";

export class NotFoundError extends Error {
	constructor(
		readonly kind: "trip" | "stop" | "route",
		readonly id: string,
	) {
		super(`Unknown ${kind} '${id}'.`);
		this.name = "NotFoundError";
	}
}

export class StaleDataError extends Error {
	constructor(
		readonly fetchedAt: Temporal.Instant,
		readonly age: Temporal.Duration,
	) {
		super(`Live snapshot fetched at ${fetchedAt} is ${age.total("seconds")}s old, using static schedule.`);
		this.name = "StaleDataError";
	}
}

export class NoUpcomingTripError extends Error {
	constructor(
		readonly stopId: string,
		readonly lookahead: Temporal.Duration,
	) {
		super(`No upcoming train at '${stopId}' within the next ${lookahead.total("minutes")} minutes.`);
		this.name = "NoUpcomingTripError";
	}
}

export class InconsistentOrderingError extends Error {
	constructor(
		readonly tripId: string,
		readonly stopId: string,
		readonly reported: Temporal.Instant,
		readonly clampedTo: Temporal.Instant,
	) {
		super(`Trip '${tripId}' reports ${reported} at '${stopId}', before the previous stop; clamped to ${clampedTo}.`);
		this.name = "InconsistentOrderingError";
	}
}

export class FeedHttpError extends Error {
	constructor(
		readonly url: string,
		readonly status: number,
	) {
		super(`Feed request to '${url}' failed with HTTP ${status}.`);
		this.name = "FeedHttpError";
	}
}
