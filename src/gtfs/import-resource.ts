import { join } from "node:path";
import { Temporal } from "temporal-polyfill";

import { parseCsv } from "../utils/parse-csv.js";
import { parseTime } from "../utils/parse-time.js";

export async function importResource(directory: string, routes: ReadonlySet<string>) {
	const services = await importServices(directory);
	const stops = await importStops(directory);
	const trips = await importTrips(directory, routes, services, stops);
	const shapes = await importShapes(directory, trips);
	return { services, stops, trips, shapes };
}

export type GtfsResource = Awaited<ReturnType<typeof importResource>>;

// --- importServices

type CalendarRecord = {
	service_id: string;
	monday: "0" | "1";
	tuesday: "0" | "1";
	wednesday: "0" | "1";
	thursday: "0" | "1";
	friday: "0" | "1";
	saturday: "0" | "1";
	sunday: "0" | "1";
	start_date: string;
	end_date: string;
};

type CalendarDatesRecord = {
	service_id: string;
	date: string;
	exception_type: "1" | "2";
};

export type Service = {
	id: string;
	/** Monday first, as in `calendar.txt`. */
	days: [boolean, boolean, boolean, boolean, boolean, boolean, boolean];
	startDate: Temporal.PlainDate;
	endDate: Temporal.PlainDate;
	includedDays: Temporal.PlainDate[];
	excludedDays: Temporal.PlainDate[];
};

async function importServices(directory: string) {
	const services = new Map<string, Service>();

	await parseCsv<CalendarRecord>(
		join(directory, "calendar.txt"),
		(calendarRecord) => {
			services.set(calendarRecord.service_id, {
				id: calendarRecord.service_id,
				days: [
					calendarRecord.monday === "1",
					calendarRecord.tuesday === "1",
					calendarRecord.wednesday === "1",
					calendarRecord.thursday === "1",
					calendarRecord.friday === "1",
					calendarRecord.saturday === "1",
					calendarRecord.sunday === "1",
				],
				startDate: Temporal.PlainDate.from(calendarRecord.start_date),
				endDate: Temporal.PlainDate.from(calendarRecord.end_date),
				excludedDays: [],
				includedDays: [],
			});
		},
		{ optional: true },
	);

	await parseCsv<CalendarDatesRecord>(
		join(directory, "calendar_dates.txt"),
		(calendarDatesRecord) => {
			let service = services.get(calendarDatesRecord.service_id);

			if (service === undefined) {
				service = {
					id: calendarDatesRecord.service_id,
					days: [false, false, false, false, false, false, false],
					startDate: Temporal.PlainDate.from("20000101"),
					endDate: Temporal.PlainDate.from("20991231"),
					excludedDays: [],
					includedDays: [],
				};

				services.set(service.id, service);
			}

			const date = Temporal.PlainDate.from(calendarDatesRecord.date);

			if (calendarDatesRecord.exception_type === "1") {
				service.includedDays.push(date);
			} else {
				service.excludedDays.push(date);
			}
		},
		{ optional: true },
	);

	return services;
}

// --- importStops

type StopRecord = {
	stop_id: string;
	stop_name: string;
	stop_lat: string;
	stop_lon: string;
	location_type?: string;
	parent_station?: string;
};

export type Stop = { id: string; name: string; latitude: number; longitude: number; parentId?: string };

async function importStops(directory: string) {
	const stops = new Map<string, Stop>();
	let rejected = 0;

	await parseCsv<StopRecord>(join(directory, "stops.txt"), (stopRecord) => {
		// Stations (location_type 1) are kept: they resolve parent ids into platforms.
		const latitude = Number(stopRecord.stop_lat);
		const longitude = Number(stopRecord.stop_lon);
		if (stopRecord.stop_lat === "" || stopRecord.stop_lon === "" || Number.isNaN(latitude + longitude)) {
			rejected += 1;
			return;
		}

		stops.set(stopRecord.stop_id, {
			id: stopRecord.stop_id,
			name: stopRecord.stop_name,
			latitude,
			longitude,
			parentId: stopRecord.parent_station || undefined,
		});
	});

	if (rejected > 0) {
		console.warn(`    ⛛ Rejected ${rejected} stop(s) without valid coordinates.`);
	}

	return stops;
}

// --- importTrips

type TripRecord = {
	trip_id: string;
	service_id: string;
	route_id: string;
	direction_id?: string;
	trip_headsign?: string;
	shape_id?: string;
};

type StopTimeRecord = {
	trip_id: string;
	stop_sequence: string;
	stop_id: string;
	arrival_time: string;
	departure_time: string;
};

/** Arrival and departure are in seconds past the start of the service day. */
export type StopTime = { sequence: number; stop: Stop; arrival: number; departure: number };

export type Trip = {
	id: string;
	service: Service;
	routeId: string;
	directionId: number;
	headsign?: string;
	shapeId?: string;
	stopTimes: StopTime[];
};

async function importTrips(
	directory: string,
	routes: ReadonlySet<string>,
	services: Map<string, Service>,
	stops: Map<string, Stop>,
) {
	const trips = new Map<string, Trip>();

	await parseCsv<TripRecord>(join(directory, "trips.txt"), (tripRecord) => {
		if (!routes.has(tripRecord.route_id)) {
			return;
		}

		const service = services.get(tripRecord.service_id);
		if (service === undefined) {
			return;
		}

		trips.set(tripRecord.trip_id, {
			id: tripRecord.trip_id,
			service,
			routeId: tripRecord.route_id,
			directionId: tripRecord.direction_id === "1" ? 1 : 0,
			headsign: tripRecord.trip_headsign || undefined,
			shapeId: tripRecord.shape_id || undefined,
			stopTimes: [],
		});
	});

	let rejected = 0;

	await parseCsv<StopTimeRecord>(join(directory, "stop_times.txt"), (stopTimeRecord) => {
		const trip = trips.get(stopTimeRecord.trip_id);
		if (trip === undefined) {
			return;
		}

		const stop = stops.get(stopTimeRecord.stop_id);
		if (stop === undefined) {
			rejected += 1;
			return;
		}

		const arrivalTime = stopTimeRecord.arrival_time || stopTimeRecord.departure_time;
		const departureTime = stopTimeRecord.departure_time || stopTimeRecord.arrival_time;

		try {
			trip.stopTimes.push({
				sequence: +stopTimeRecord.stop_sequence,
				stop,
				arrival: parseTime(arrivalTime),
				departure: parseTime(departureTime),
			});
		} catch {
			// Untimed stop times carry no position information.
			rejected += 1;
		}
	});

	if (rejected > 0) {
		console.warn(`    ⛛ Rejected ${rejected} stop time(s) with unknown stops or invalid times.`);
	}

	trips.forEach((trip) => {
		trip.stopTimes.sort((a, b) => a.sequence - b.sequence);
	});

	return trips;
}

// --- importShapes

type ShapeRecord = {
	shape_id: string;
	shape_pt_lat: string;
	shape_pt_lon: string;
	shape_pt_sequence: string;
};

/** Points are `[longitude, latitude]`. */
export type Shape = { id: string; points: [number, number][] };

async function importShapes(directory: string, trips: Map<string, Trip>) {
	const shapeIds = new Set<string>();
	for (const trip of trips.values()) {
		if (trip.shapeId !== undefined) shapeIds.add(trip.shapeId);
	}

	const sequencedPoints = new Map<string, { sequence: number; point: [number, number] }[]>();

	await parseCsv<ShapeRecord>(
		join(directory, "shapes.txt"),
		(shapeRecord) => {
			if (!shapeIds.has(shapeRecord.shape_id)) {
				return;
			}

			let list = sequencedPoints.get(shapeRecord.shape_id);
			if (list === undefined) {
				list = [];
				sequencedPoints.set(shapeRecord.shape_id, list);
			}

			list.push({
				sequence: +shapeRecord.shape_pt_sequence,
				point: [+shapeRecord.shape_pt_lon, +shapeRecord.shape_pt_lat],
			});
		},
		{ optional: true },
	);

	const shapes = new Map<string, Shape>();
	for (const [id, list] of sequencedPoints) {
		list.sort((a, b) => a.sequence - b.sequence);
		shapes.set(id, { id, points: list.map(({ point }) => point) });
	}

	return shapes;
}
