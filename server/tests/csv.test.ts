import { describe, expect, test } from "vitest";

import {
	csvToRecords,
	inferCell,
	makeDownloadFilename,
	parseCsv,
	sanitizeFileName,
	toCsv,
	type CsvColumn
} from "../src/shared/csv";

type Reading = { at: Date; note: string; value: number | null };

const columns: CsvColumn<Reading>[] = [
	{ header: "at", accessor: r => r.at },
	{ header: "note", accessor: r => r.note },
	{ header: "value", accessor: r => r.value }
];

describe("toCsv", () => {
	test("quotes delimiters, quotes and newlines", () => {
		const csv = toCsv(
			[
				{ at: new Date("2025-01-01T00:00:00Z"), note: "a,b", value: 1.5 },
				{ at: new Date("2025-01-01T00:01:00Z"), note: "say \"hi\"\nbye", value: null }
			],
			columns,
			{ bom: false }
		);

		expect(csv).toBe(
			"at,note,value\n" +
				"2025-01-01T00:00:00.000Z,\"a,b\",1.5\n" +
				"2025-01-01T00:01:00.000Z,\"say \"\"hi\"\"\nbye\",\n"
		);
	});

	test("starts with a BOM unless disabled", () => {
		expect(toCsv([], columns)).toBe("\uFEFFat,note,value\n");
		expect(toCsv([], columns, { newline: "\r\n", bom: false })).toBe("at,note,value\r\n");
	});

	test("blanks non-finite numbers", () => {
		const csv = toCsv([{ at: new Date(0), note: "", value: Number.NaN }], columns, { bom: false });
		expect(csv.split("\n")[1]).toBe("1970-01-01T00:00:00.000Z,,");
	});
});

describe("parseCsv", () => {
	test("reads what toCsv writes", () => {
		const text = "\uFEFFa,b\r\n\"x,1\",\"he said \"\"no\"\"\"\r\n\r\n\"multi\nline\",2\r\n";
		expect(parseCsv(text)).toEqual([
			["a", "b"],
			["x,1", "he said \"no\""],
			["multi\nline", "2"]
		]);
	});

	test("keeps a final row without newline", () => {
		expect(parseCsv("a,b\n1,")).toEqual([
			["a", "b"],
			["1", ""]
		]);
	});

	test("rejects an unterminated quote", () => {
		expect(() => parseCsv("a\n\"open")).toThrow("Malformed CSV: unterminated quoted field");
	});
});

describe("inferCell / csvToRecords", () => {
	test("numbers become numbers and blanks become null", () => {
		expect(inferCell("12.5")).toBe(12.5);
		expect(inferCell("-4")).toBe(-4);
		expect(inferCell("")).toBeNull();
	});

	test("numeric-looking text that would not print back the same stays text", () => {
		expect(inferCell("007")).toBe("007");
		expect(inferCell("12.50")).toBe("12.50");
		expect(inferCell("-3e2")).toBe("-3e2");
		expect(inferCell(" 5")).toBe(" 5");
		expect(inferCell("Infinity")).toBe("Infinity");
		expect(inferCell("2025-01-01")).toBe("2025-01-01");
	});

	test("keepText columns stay strings", () => {
		const { header, records } = csvToRecords("sensor_id,pm25\n0042,7\n,\n", { keepText: ["sensor_id"] });
		expect(header).toEqual(["sensor_id", "pm25"]);
		expect(records).toEqual([
			{ sensor_id: "0042", pm25: 7 },
			{ sensor_id: null, pm25: null }
		]);
	});

	test("empty text has no header", () => {
		expect(csvToRecords("")).toEqual({ header: [], records: [] });
	});
});

describe("file names", () => {
	test("sanitizeFileName", () => {
		expect(sanitizeFileName("  my file/name?.csv ")).toBe("my_file-name-.csv");
		expect(sanitizeFileName("..hidden")).toBe("hidden");
		expect(sanitizeFileName("   ")).toBe("data");
		expect(sanitizeFileName("x".repeat(200))).toHaveLength(128);
	});

	test("makeDownloadFilename uses UTC", () => {
		expect(makeDownloadFilename("airgradient", new Date("2025-01-03T12:00:00Z"), "csv")).toBe(
			"airgradient_data_20250103_120000.csv"
		);
		expect(makeDownloadFilename("crafted-climate", new Date("2025-11-09T05:06:07Z"), "json")).toBe(
			"crafted-climate_data_20251109_050607.json"
		);
	});
});
