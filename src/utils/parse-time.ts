import { Temporal } from "temporal-polyfill";

const GTFS_TIME = /^(\d{1,2}):(\d{2}):(\d{2})$/;

/**
 * Parses a GTFS `HH:MM:SS` time into seconds past the start of the service day.
 * Hours may go past 23 for trips running after midnight.
 */
export function parseTime(input: string) {
	const matches = GTFS_TIME.exec(input.trim());
	if (matches === null) {
		throw new Error(`Invalid GTFS time '${input}'`);
	}

	const [, hours, minutes, seconds] = matches.map(Number);
	if (minutes > 59 || seconds > 59) {
		throw new Error(`Invalid GTFS time '${input}'`);
	}

	return hours * 3600 + minutes * 60 + seconds;
}

// The service day starts at noon minus 12 hours, which differs from midnight on DST transition days.
export function getServiceDayStart(date: Temporal.PlainDate, timeZone: string) {
	return date
		.toZonedDateTime({ timeZone, plainTime: Temporal.PlainTime.from("12:00") })
		.subtract({ hours: 12 })
		.toInstant();
}

export function atServiceTime(date: Temporal.PlainDate, seconds: number, timeZone: string) {
	return getServiceDayStart(date, timeZone).add({ seconds });
}

/**
 * Service dates whose trips may run around `now`: yesterday's run past midnight, tomorrow's start right after it.
 */
export function getServiceDates(now: Temporal.Instant, timeZone: string) {
	const today = now.toZonedDateTimeISO(timeZone).toPlainDate();
	return [today.subtract({ days: 1 }), today, today.add({ days: 1 })];
}
