import { serve } from "@hono/node-server";

import {
	BUFFER_DURATION,
	FEED_TIMEOUT,
	FEEDS,
	GTFS_RESOURCE,
	HOME_STOP,
	LATE_TOLERANCE,
	LOOKAHEAD_WINDOW,
	PORT,
	REFRESH_INTERVAL,
	STALENESS_THRESHOLD,
	TIME_ZONE,
	TRACKED_ROUTES,
	WALK_DURATION,
} from "./config.js";
import { loadResource } from "./gtfs/load-resource.js";
import { createScheduleIndex } from "./gtfs/schedule-index.js";
import { useLiveStore } from "./gtfs-rt/use-live-store.js";
import { createServer } from "./server/create-server.js";
import { createTracker } from "./tracker/create-tracker.js";

console.log("-- J/Z/M LEAVE-NOW TRACKER --");

const resource = await loadResource(GTFS_RESOURCE, new Set(TRACKED_ROUTES));
const index = createScheduleIndex(resource);

const tracker = createTracker(index, {
	timeZone: TIME_ZONE,
	stalenessThreshold: STALENESS_THRESHOLD,
	lookahead: LOOKAHEAD_WINDOW,
	lateTolerance: LATE_TOLERANCE,
});

const store = useLiveStore(FEEDS, {
	refreshInterval: REFRESH_INTERVAL,
	feedTimeout: FEED_TIMEOUT,
	stalenessThreshold: STALENESS_THRESHOLD,
});
await store.refresh();
store.start();

const server = createServer({
	tracker,
	getSnapshot: (now) => store.current(now),
	defaults: { stopId: HOME_STOP, walkDuration: WALK_DURATION, bufferDuration: BUFFER_DURATION },
});

serve({ fetch: server.fetch, port: PORT });
console.log(`✓ Listening on port ${PORT}.`);
