import { describe, expect, test } from "vitest";
import type { Sensor } from "@air-sensor-hub/common";

import {
	concatRowSets,
	filterRowSet,
	flattenRecord,
	normalizeRecords,
	sortRowSet,
	unionColumns
} from "../src/lib/normalize";

const sensor: Sensor = { id: "23883", displayName: "Sensor 1", vendor: "aurassure" };

describe("flattenRecord", () => {
	test("joins nested keys with underscores and keeps arrays as JSON", () => {
		expect(
			flattenRecord({ a: 1, b: { c: 2, d: { e: "x" } }, arr: [1, 2], u: undefined, n: null, ok: true })
		).toEqual({ a: 1, b_c: 2, b_d_e: "x", arr: "[1,2]", u: null, n: null, ok: true });
	});
});

describe("normalizeRecords", () => {
	test("tags rows, parses timestamps and sorts ascending", () => {
		const rs = normalizeRecords(
			sensor,
			[
				{ time: 1735693200, pm25: 3 },
				{ time: 1735689600, pm25: 2, temp: 20 }
			],
			{ timestampFields: ["time"], timestampUnit: "s" }
		);

		expect(rs.columns).toEqual(["sensor_id", "sensor_name", "timestamp", "time", "pm25", "temp"]);
		expect(rs.rows).toEqual([
			{ sensor_id: "23883", sensor_name: "Sensor 1", timestamp: "2025-01-01T00:00:00.000Z", time: 1735689600, pm25: 2, temp: 20 },
			{ sensor_id: "23883", sensor_name: "Sensor 1", timestamp: "2025-01-01T01:00:00.000Z", time: 1735693200, pm25: 3, temp: null }
		]);
	});

	test("a vendor timestamp column is replaced by the canonical value", () => {
		const rs = normalizeRecords(sensor, [{ timestamp: "2025-01-01T00:00:00Z", value: 1 }], {
			timestampFields: ["timestamp"]
		});
		expect(rs.columns).toEqual(["sensor_id", "sensor_name", "timestamp", "value"]);
		expect(rs.rows[0].timestamp).toBe("2025-01-01T00:00:00.000Z");
	});

	test("uses the first timestamp field that parses", () => {
		const rs = normalizeRecords(sensor, [{ time: "n/a", date: "2025-01-02" }], {
			timestampFields: ["timestamp", "time", "date"]
		});
		expect(rs.rows[0].timestamp).toBe("2025-01-02T00:00:00.000Z");
	});

	test("rows without a usable timestamp keep a null marker and sort last", () => {
		const rs = normalizeRecords(
			sensor,
			[{ v: 1 }, { ts: "2025-01-01T00:00:00Z", v: 2 }],
			{ timestampFields: ["ts"] }
		);
		expect(rs.rows.map(r => [r.timestamp, r.v])).toEqual([
			["2025-01-01T00:00:00.000Z", 2],
			[null, 1]
		]);
	});

	test("an empty record list gives only the shared columns", () => {
		expect(normalizeRecords(sensor, [], { timestampFields: ["time"] })).toEqual({
			columns: ["sensor_id", "sensor_name", "timestamp"],
			rows: []
		});
	});
});

describe("row set helpers", () => {
	const a = {
		columns: ["sensor_id", "sensor_name", "timestamp", "pm25"],
		rows: [{ sensor_id: "a", sensor_name: "A", timestamp: "2025-01-01T01:00:00.000Z", pm25: 1 }]
	};
	const b = {
		columns: ["sensor_id", "sensor_name", "timestamp", "temp"],
		rows: [{ sensor_id: "b", sensor_name: "B", timestamp: "2025-01-01T00:00:00.000Z", temp: 5 }]
	};

	test("concatRowSets unions columns and fills gaps with null", () => {
		const rs = concatRowSets([a, b]);
		expect(rs.columns).toEqual(["sensor_id", "sensor_name", "timestamp", "pm25", "temp"]);
		expect(rs.rows).toEqual([
			{ sensor_id: "a", sensor_name: "A", timestamp: "2025-01-01T01:00:00.000Z", pm25: 1, temp: null },
			{ sensor_id: "b", sensor_name: "B", timestamp: "2025-01-01T00:00:00.000Z", pm25: null, temp: 5 }
		]);
	});

	test("unionColumns keeps first-seen order", () => {
		expect(unionColumns([["timestamp", "pm25"], ["temp", "pm25"], []])).toEqual(["timestamp", "pm25", "temp"]);
	});

	test("sortRowSet is stable for equal timestamps", () => {
		const rs = sortRowSet({
			columns: ["timestamp", "n"],
			rows: [
				{ timestamp: "2025-01-01T00:00:01.000Z", n: 1 },
				{ timestamp: "2025-01-01T00:00:00.000Z", n: 2 },
				{ timestamp: "2025-01-01T00:00:00.000Z", n: 3 }
			]
		});
		expect(rs.rows.map(r => r.n)).toEqual([2, 3, 1]);
	});

	test("filterRowSet keeps start and drops end", () => {
		const rs = filterRowSet(concatRowSets([a, b]), {
			start: new Date("2025-01-01T00:00:00Z"),
			end: new Date("2025-01-01T01:00:00Z")
		});
		expect(rs.rows.map(r => r.sensor_id)).toEqual(["b"]);
	});
});
