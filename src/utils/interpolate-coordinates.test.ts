import { describe, expect, it } from "vitest";

import { type Coordinates, interpolateAlongPath, interpolateLinear, interpolateOnLineString } from "./interpolate-coordinates.js";

describe("interpolateLinear", () => {
	it("moves proportionally between both points", () => {
		const [longitude, latitude] = interpolateLinear([-73.95, 40.7], [-73.94, 40.71], 0.25);
		expect(longitude).toBeCloseTo(-73.9475, 6);
		expect(latitude).toBeCloseTo(40.7025, 6);
	});
});

describe("interpolateOnLineString", () => {
	const line: Coordinates[] = [
		[0, 0],
		[0, 3],
		[4, 3],
	];

	it("clamps at both ends", () => {
		expect(interpolateOnLineString(line, -1)).toEqual([0, 0]);
		expect(interpolateOnLineString(line, 2)).toEqual([4, 3]);
	});

	it("walks segments by length", () => {
		// Total length is 7: 3.5 lands half a unit into the second segment.
		const [x, y] = interpolateOnLineString(line, 0.5);
		expect(x).toBeCloseTo(0.5, 9);
		expect(y).toBeCloseTo(3, 9);
	});

	it("rejects empty line strings", () => {
		expect(() => interpolateOnLineString([], 0.5)).toThrow("Cannot interpolate on an empty line string");
	});
});

describe("interpolateAlongPath", () => {
	it("falls back to a straight line without a path", () => {
		expect(interpolateAlongPath(undefined, [0, 0], [2, 2], 0.5)).toEqual([1, 1]);
	});

	it("follows the path vertices between both stops", () => {
		const path: Coordinates[] = [
			[-1, 0],
			[0, 0],
			[0, 2],
			[2, 2],
			[3, 2],
		];

		const [x, y] = interpolateAlongPath(path, [0, 0], [2, 2], 0.5);
		expect(x).toBeCloseTo(0, 9);
		expect(y).toBeCloseTo(2, 9);
	});

	it("falls back to a straight line when the path runs the other way", () => {
		const path: Coordinates[] = [
			[2, 2],
			[0, 2],
			[0, 0],
		];

		expect(interpolateAlongPath(path, [0, 0], [2, 2], 0.5)).toEqual([1, 1]);
	});
});
