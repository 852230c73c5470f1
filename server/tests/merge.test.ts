import { describe, expect, test } from "vitest";
import type { RowSet } from "@air-sensor-hub/common";

import { mergeRowSets } from "../src/archive/merge";

const T1 = "2025-01-01T00:00:00.000Z";
const T2 = "2025-01-01T00:01:00.000Z";
const T3 = "2025-01-01T00:02:00.000Z";

const archived: RowSet = {
	columns: ["timestamp", "value"],
	rows: [
		{ timestamp: T2, value: 2 },
		{ timestamp: T1, value: 1 }
	]
};

describe("mergeRowSets", () => {
	test("merging nothing returns the archive re-sorted", () => {
		const merged = mergeRowSets(archived, { columns: [], rows: [] });
		expect(merged).toEqual({
			columns: ["timestamp", "value"],
			rows: [
				{ timestamp: T1, value: 1 },
				{ timestamp: T2, value: 2 }
			]
		});
	});

	test("re-ingesting the same rows adds nothing", () => {
		expect(mergeRowSets(archived, archived).rows).toHaveLength(2);
	});

	test("an archived row wins over a later fetch of the same instant", () => {
		const merged = mergeRowSets(
			{ columns: ["timestamp", "value"], rows: [{ timestamp: T1, value: 1 }] },
			{ columns: ["timestamp", "value"], rows: [{ timestamp: T1, value: 2 }] }
		);
		expect(merged.rows).toEqual([{ timestamp: T1, value: 1 }]);
	});

	test("instants are compared, not their spelling", () => {
		const merged = mergeRowSets(
			{ columns: ["timestamp", "value"], rows: [{ timestamp: "2025-01-01T00:00:00Z", value: 1 }] },
			{ columns: ["timestamp", "value"], rows: [{ timestamp: T1, value: 2 }] }
		);
		expect(merged.rows).toEqual([{ timestamp: "2025-01-01T00:00:00Z", value: 1 }]);
	});

	test("without an archive the incoming rows are the result", () => {
		const merged = mergeRowSets(undefined, archived);
		expect(merged.rows.map(r => r.timestamp)).toEqual([T1, T2]);
	});

	test("new columns are added and old rows get null for them", () => {
		const merged = mergeRowSets(archived, {
			columns: ["timestamp", "value", "pm25"],
			rows: [{ timestamp: T3, value: 3, pm25: 7 }]
		});
		expect(merged.columns).toEqual(["timestamp", "value", "pm25"]);
		expect(merged.rows).toEqual([
			{ timestamp: T1, value: 1, pm25: null },
			{ timestamp: T2, value: 2, pm25: null },
			{ timestamp: T3, value: 3, pm25: 7 }
		]);
	});

	test("without a timestamp column whole rows are compared", () => {
		const merged = mergeRowSets(
			{ columns: ["a", "b"], rows: [{ a: 1, b: 2 }] },
			{ columns: ["a", "b"], rows: [{ a: 1, b: 2 }, { a: 1, b: 3 }] }
		);
		expect(merged.rows).toEqual([
			{ a: 1, b: 2 },
			{ a: 1, b: 3 }
		]);
	});
});
