import { Temporal } from "temporal-polyfill";

import type { Service } from "../gtfs/import-resource.js";

export function isServiceOperatingOn(service: Service, date: Temporal.PlainDate) {
	if (service.includedDays.some((d) => d.equals(date))) {
		return true;
	}

	if (service.excludedDays.some((d) => d.equals(date))) {
		return false;
	}

	if (
		Temporal.PlainDate.compare(date, service.startDate) < 0 ||
		Temporal.PlainDate.compare(date, service.endDate) > 0
	) {
		return false;
	}

	// dayOfWeek is 1 for Monday, 7 for Sunday.
	return service.days[date.dayOfWeek - 1];
}
