import GtfsRealtime from "gtfs-realtime-bindings";
import type { Temporal } from "temporal-polyfill";

import { FeedHttpError } from "../errors.js";

/**
 * Some CDN edges only answer the `nyct%2Fgtfs-jz` spelling of the feed paths.
 */
export function getEncodedFeedUrl(url: string) {
	const encoded = url.replace(/\/(nyct|lirr|mnr)\/(gtfs[\w-]*)$/, "/$1%2F$2");
	return encoded === url ? undefined : encoded;
}

export async function fetchFeed(url: string, timeout: Temporal.Duration) {
	try {
		return await requestFeed(url, timeout);
	} catch (error) {
		const encodedUrl = getEncodedFeedUrl(url);
		if (!(error instanceof FeedHttpError) || encodedUrl === undefined) {
			throw error;
		}

		console.warn(`    ⛛ Got HTTP ${error.status}, retrying with '${encodedUrl}'.`);
		return requestFeed(encodedUrl, timeout);
	}
}

async function requestFeed(url: string, timeout: Temporal.Duration) {
	const response = await fetch(url, { signal: AbortSignal.timeout(timeout.total("milliseconds")) });
	if (!response.ok) {
		throw new FeedHttpError(url, response.status);
	}

	const payload = new Uint8Array(await response.arrayBuffer());
	return GtfsRealtime.transit_realtime.FeedMessage.decode(payload);
}
