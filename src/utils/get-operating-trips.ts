import type { Temporal } from "temporal-polyfill";

import type { Trip } from "../gtfs/import-resource.js";

import { isServiceOperatingOn } from "./is-service-operating-on.js";

export function getOperatingTrips(trips: Iterable<Trip>, date: Temporal.PlainDate) {
	const operatingTrips: Trip[] = [];

	for (const trip of trips) {
		if (isServiceOperatingOn(trip.service, date)) {
			operatingTrips.push(trip);
		}
	}

	return operatingTrips;
}
