import { createReadStream } from "node:fs";
import { access } from "node:fs/promises";
import { parse } from "csv-parse";

export async function parseCsv<T extends Record<string, string>>(
	path: string,
	onRecord: (record: T) => void,
	{ optional = false } = {},
) {
	if (optional) {
		try {
			await access(path);
		} catch {
			return;
		}
	}

	const parser = createReadStream(path).pipe(
		parse({ bom: true, columns: true, relax_column_count: true, skip_empty_lines: true, trim: true }),
	);

	for await (const record of parser) {
		onRecord(record);
	}
}
