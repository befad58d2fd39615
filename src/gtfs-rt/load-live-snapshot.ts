import { Temporal } from "temporal-polyfill";

import type { FeedSource } from "../config.js";

import { extractLiveArrivals } from "./extract-live-arrivals.js";
import { fetchFeed } from "./fetch-feed.js";
import { type LiveArrival, createLiveSnapshot } from "./live-snapshot.js";

export async function loadLiveSnapshot(feeds: readonly FeedSource[], timeout: Temporal.Duration) {
	const arrivals: LiveArrival[] = [];
	let loadedFeeds = 0;

	for (const feed of feeds) {
		try {
			const message = await fetchFeed(feed.url, timeout);
			const extracted = extractLiveArrivals(message, new Set(feed.routes));
			for (const arrival of extracted.arrivals) {
				arrivals.push(arrival);
			}

			loadedFeeds += 1;
			console.log(
				`    ⛛ Feed '${feed.name}' yielded ${extracted.arrivals.length} live arrival(s)` +
					(extracted.rejected > 0 ? `, rejected ${extracted.rejected} malformed update(s).` : "."),
			);
		} catch (cause) {
			console.error(`    ✘ Failed to load feed '${feed.name}':`, cause);
		}
	}

	if (loadedFeeds === 0) {
		throw new Error("None of the live feeds could be loaded");
	}

	return createLiveSnapshot(arrivals, Temporal.Now.instant());
}
