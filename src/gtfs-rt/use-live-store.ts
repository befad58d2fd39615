import { Cron } from "croner";
import { Temporal } from "temporal-polyfill";

import type { FeedSource } from "../config.js";
import { StaleDataError } from "../errors.js";

import { loadLiveSnapshot } from "./load-live-snapshot.js";
import type { LiveSnapshot } from "./live-snapshot.js";

export type LiveStoreOptions = {
	refreshInterval: Temporal.Duration;
	feedTimeout: Temporal.Duration;
	stalenessThreshold: Temporal.Duration;
};

/**
 * Keeps the last successfully loaded snapshot. A refresh swaps the whole snapshot at once, so readers never observe
 * arrivals from two different fetches.
 */
export function useLiveStore(feeds: readonly FeedSource[], options: LiveStoreOptions) {
	let snapshot: LiveSnapshot | null = null;

	const refresh = async () => {
		console.log("➔ Refreshing live feeds.");
		try {
			snapshot = await loadLiveSnapshot(feeds, options.feedTimeout);
			console.log(`✓ Live snapshot replaced (${snapshot.updates.size} trip updates).`);
		} catch (cause) {
			console.error("✘ Live refresh failed, keeping the previous snapshot:", cause);
		}
	};

	let job: Cron | undefined;

	return {
		refresh,
		start() {
			job ??= new Cron("* * * * * *", { interval: options.refreshInterval.total("seconds"), protect: true }, refresh);
		},
		stop() {
			job?.stop();
			job = undefined;
		},
		/** The current snapshot, or `null` when there is none or it is too old to trust. */
		current(now = Temporal.Now.instant()) {
			if (snapshot === null) {
				return null;
			}

			const age = now.since(snapshot.fetchedAt);
			if (Temporal.Duration.compare(age, options.stalenessThreshold) > 0) {
				console.warn(`    ⛛ ${new StaleDataError(snapshot.fetchedAt, age).message}`);
				return null;
			}

			return snapshot;
		},
	};
}

export type LiveStore = ReturnType<typeof useLiveStore>;
