/** `[longitude, latitude]` */
export type Coordinates = [number, number];

function distance(p1: Coordinates, p2: Coordinates) {
	const dx = p2[0] - p1[0];
	const dy = p2[1] - p1[1];
	return Math.sqrt(dx * dx + dy * dy);
}

export function interpolateLinear(from: Coordinates, to: Coordinates, progress: number): Coordinates {
	return [from[0] + (to[0] - from[0]) * progress, from[1] + (to[1] - from[1]) * progress];
}

export function interpolateOnLineString(coords: Coordinates[], progress: number): Coordinates {
	if (coords.length === 0) throw new Error("Cannot interpolate on an empty line string");
	if (coords.length === 1 || progress <= 0) return coords[0];
	if (progress >= 1) return coords[coords.length - 1];

	let totalLength = 0;
	for (let i = 0; i < coords.length - 1; i += 1) {
		totalLength += distance(coords[i], coords[i + 1]);
	}

	const targetDistance = totalLength * progress;
	let accumulated = 0;
	for (let i = 0; i < coords.length - 1; i += 1) {
		const segmentLength = distance(coords[i], coords[i + 1]);
		if (segmentLength > 0 && accumulated + segmentLength >= targetDistance) {
			return interpolateLinear(coords[i], coords[i + 1], (targetDistance - accumulated) / segmentLength);
		}
		accumulated += segmentLength;
	}

	return coords[coords.length - 1];
}

function findNearestIndex(coords: Coordinates[], point: Coordinates, fromIndex = 0) {
	let nearest = fromIndex;
	let nearestDistance = Number.POSITIVE_INFINITY;
	for (let i = fromIndex; i < coords.length; i += 1) {
		const d = distance(coords[i], point);
		if (d < nearestDistance) {
			nearest = i;
			nearestDistance = d;
		}
	}
	return nearest;
}

/**
 * Interpolates between two stops along `path`, each stop snapped to its nearest path vertex.
 * Falls back to a straight line when the path does not run from `from` to `to`.
 */
export function interpolateAlongPath(
	path: Coordinates[] | undefined,
	from: Coordinates,
	to: Coordinates,
	progress: number,
): Coordinates {
	if (path === undefined || path.length < 2) {
		return interpolateLinear(from, to, progress);
	}

	const fromIndex = findNearestIndex(path, from);
	const toIndex = findNearestIndex(path, to, fromIndex);
	if (toIndex <= fromIndex) {
		return interpolateLinear(from, to, progress);
	}

	return interpolateOnLineString([from, ...path.slice(fromIndex + 1, toIndex), to], progress);
}
