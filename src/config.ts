import { Temporal } from "temporal-polyfill";

const readNumber = (name: string, fallback: number) => {
	const raw = process.env[name];
	if (raw === undefined || raw.trim() === "") {
		return fallback;
	}

	const value = Number(raw);
	if (!Number.isInteger(value) || value < 0) {
		throw new Error(`Environment variable ${name} must be a non-negative integer, got '${raw}'`);
	}

	return value;
};

export const TIME_ZONE = "America/New_York";

export const TRACKED_ROUTES = ["J", "Z", "M"] as const;

export type TrackedRoute = (typeof TRACKED_ROUTES)[number];

export const ROUTE_COLORS: ReadonlyMap<string, string> = new Map([
	["J", "#FF7F00"],
	["Z", "#FFD300"],
	["M", "#2850AD"],
]);
export const DEFAULT_ROUTE_COLOR = "#6B7280";

export const GTFS_RESOURCE = process.env.GTFS_RESOURCE ?? "data/nyc_gtfs_static.zip";

export type FeedSource = { name: string; url: string; routes: readonly TrackedRoute[] };

export const FEEDS: FeedSource[] = [
	{
		name: "gtfs-jz",
		url: process.env.JZ_FEED_URL ?? "https://api-endpoint.mta.info/Dataservice/mtagtfsfeeds/nyct/gtfs-jz",
		routes: ["J", "Z"],
	},
	{
		name: "gtfs-bdfm",
		url: process.env.BDFM_FEED_URL ?? "https://api-endpoint.mta.info/Dataservice/mtagtfsfeeds/nyct/gtfs-bdfm",
		routes: ["M"],
	},
];

export const PORT = readNumber("PORT", 3000);
export const REFRESH_INTERVAL = Temporal.Duration.from({ seconds: readNumber("REFRESH_SECONDS", 20) });
export const FEED_TIMEOUT = Temporal.Duration.from({ seconds: readNumber("FEED_TIMEOUT_SECONDS", 20) });
export const STALENESS_THRESHOLD = Temporal.Duration.from({ seconds: readNumber("STALENESS_SECONDS", 120) });
export const LOOKAHEAD_WINDOW = Temporal.Duration.from({ minutes: readNumber("LOOKAHEAD_MINUTES", 60) });
export const LATE_TOLERANCE = Temporal.Duration.from({ minutes: readNumber("LATE_TOLERANCE_MINUTES", 30) });

export const HOME_STOP = process.env.HOME_STOP ?? "M11S";
export const WALK_DURATION = Temporal.Duration.from({ minutes: readNumber("WALK_MINUTES", 6) });
export const BUFFER_DURATION = Temporal.Duration.from({ minutes: readNumber("BUFFER_MINUTES", 2) });
