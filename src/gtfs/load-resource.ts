import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import AdmZip from "adm-zip";

import { importResource } from "./import-resource.js";

const isRemote = (resource: string) => /^https?:\/\//.test(resource);

export async function loadResource(resource: string, routes: ReadonlySet<string>) {
	console.log(`➔ Loading GTFS resource at '${resource}'.`);

	const workingDirectory = await mkdtemp(join(tmpdir(), "jzm-leave-now_"));
	console.log(`    ⛛ Generated working directory at '${workingDirectory}'.`);

	try {
		const archive = isRemote(resource) ? await downloadArchive(resource) : await readFile(resource);
		new AdmZip(archive).extractAllTo(workingDirectory, true);

		const gtfs = await importResource(workingDirectory, routes);
		console.log(
			`✓ Successfully loaded resource: ${gtfs.trips.size} trips, ${gtfs.stops.size} stops, ${gtfs.shapes.size} shapes.`,
		);
		return gtfs;
	} catch (cause) {
		throw new Error(`Failed to load GTFS resource at '${resource}'`, { cause });
	} finally {
		await rm(workingDirectory, { recursive: true, force: true });
	}
}

async function downloadArchive(url: string) {
	const response = await fetch(url, { signal: AbortSignal.timeout(120_000) });
	if (!response.ok) {
		throw new Error(`Got HTTP ${response.status} while downloading '${url}'`);
	}

	return Buffer.from(await response.arrayBuffer());
}
