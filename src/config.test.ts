import { afterEach, describe, expect, it, vi } from "vitest";

describe("config", () => {
	afterEach(() => {
		vi.unstubAllEnvs();
		vi.resetModules();
	});

	it("falls back to defaults on blank variables", async () => {
		vi.stubEnv("WALK_MINUTES", "");
		vi.stubEnv("STALENESS_SECONDS", " ");

		const config = await import("./config.js");

		expect(config.WALK_DURATION.total("minutes")).toBe(6);
		expect(config.STALENESS_THRESHOLD.total("seconds")).toBe(120);
	});

	it("reads durations from the environment", async () => {
		vi.stubEnv("WALK_MINUTES", "9");
		vi.stubEnv("LOOKAHEAD_MINUTES", "90");

		const config = await import("./config.js");

		expect(config.WALK_DURATION.total("minutes")).toBe(9);
		expect(config.LOOKAHEAD_WINDOW.total("minutes")).toBe(90);
	});

	it("rejects values that are not non-negative integers", async () => {
		vi.stubEnv("STALENESS_SECONDS", "-5");

		await expect(import("./config.js")).rejects.toThrow(
			"Environment variable STALENESS_SECONDS must be a non-negative integer, got '-5'",
		);
	});

	it("lets feed URLs be overridden", async () => {
		vi.stubEnv("JZ_FEED_URL", "https://example.test/jz");

		const { FEEDS } = await import("./config.js");

		expect(FEEDS.map(({ name, url, routes }) => [name, url, routes])).toEqual([
			["gtfs-jz", "https://example.test/jz", ["J", "Z"]],
			["gtfs-bdfm", "https://api-endpoint.mta.info/Dataservice/mtagtfsfeeds/nyct/gtfs-bdfm", ["M"]],
		]);
	});
});
