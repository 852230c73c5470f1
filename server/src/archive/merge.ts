import type { Row, RowSet } from "@air-sensor-hub/common";

import { parseTimestamp } from "../lib/timestamp";
import { sortRowSet, unionColumns } from "../lib/normalize";

function rowIdentity(row: Row, columns: readonly string[]): string {
	return JSON.stringify(columns.map(c => row[c] ?? null));
}

/**
 * Merge freshly fetched rows into an archived RowSet.
 *
 * Rows are keyed by their instant when a timestamp column exists, else by
 * their full content. The first row seen for a key wins, so archived rows
 * are never replaced by a later fetch of the same instant. Output is
 * sorted by timestamp.
 */
export function mergeRowSets(existing: RowSet | undefined, incoming: RowSet): RowSet {
	const sets = existing ? [existing, incoming] : [incoming];
	const columns = unionColumns(sets.map(s => s.columns));
	const byTimestamp = columns.includes("timestamp");

	const seen = new Set<string>();
	const rows: Row[] = [];

	for (const set of sets) {
		for (const row of set.rows) {
			const full: Row = {};
			for (const c of columns) full[c] = row[c] ?? null;

			const ts = byTimestamp ? parseTimestamp(full.timestamp) : null;
			const key = ts !== null ? `t:${ts}` : `r:${rowIdentity(full, columns)}`;
			if (seen.has(key)) continue;
			seen.add(key);
			rows.push(full);
		}
	}

	return sortRowSet({ columns, rows });
}
