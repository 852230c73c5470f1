// src/shared/csv.ts
//
// CSV in both directions: downloads (toCsv, with BOM for Excel) and the
// per-sensor archive files (written without BOM, read back with parseCsv).

import type { CellValue } from "@air-sensor-hub/common";

import { parseError } from "./errors";

export type CsvValue = string | number | boolean | null | undefined | Date;

export interface CsvColumn<T> {
	header: string;
	accessor: (row: T) => CsvValue;
}

export interface CsvOptions {
	/** Default true: downloads open in Excel as UTF-8. Archive files pass false. */
	bom?: boolean;
	newline?: "\n" | "\r\n";
	delimiter?: string;
}

const BOM = "\uFEFF";

function cellText(v: CsvValue): string {
	if (v === null || v === undefined) return "";
	if (v instanceof Date) return v.toISOString();
	if (typeof v === "number") return Number.isFinite(v) ? String(v) : "";
	return String(v);
}

function quote(text: string, delimiter: string): string {
	if (!text.includes(delimiter) && !/["\r\n]/.test(text)) return text;
	return `"${text.replace(/"/g, "\"\"")}"`;
}

/**
 * Rows -> CSV text, one line per row after the header, each line terminated.
 */
export function toCsv<T>(rows: readonly T[], columns: readonly CsvColumn<T>[], opts: CsvOptions = {}): string {
	const { bom = true, newline = "\n", delimiter = "," } = opts;
	const line = (cells: readonly string[]) => cells.map(c => quote(c, delimiter)).join(delimiter);

	const lines = [line(columns.map(c => c.header))];
	for (const row of rows) lines.push(line(columns.map(c => cellText(c.accessor(row)))));

	const text = lines.join(newline) + newline;
	return bom ? BOM + text : text;
}

/**
 * Parse CSV text (RFC 4180 quoting, CRLF or LF) into rows of raw strings.
 * A leading BOM is dropped. Blank lines are skipped.
 */
export function parseCsv(text: string, delimiter = ","): string[][] {
	const src = text.startsWith(BOM) ? text.slice(1) : text;
	const rows: string[][] = [];
	let row: string[] = [];
	let cell = "";
	let inQuotes = false;
	let i = 0;

	const endRow = () => {
		row.push(cell);
		cell = "";
		if (!(row.length === 1 && row[0] === "")) rows.push(row);
		row = [];
	};

	while (i < src.length) {
		const ch = src[i];

		if (inQuotes) {
			if (ch === "\"") {
				if (src[i + 1] === "\"") {
					cell += "\"";
					i += 2;
					continue;
				}
				inQuotes = false;
				i++;
				continue;
			}
			cell += ch;
			i++;
			continue;
		}

		if (ch === "\"" && cell === "") {
			inQuotes = true;
		} else if (ch === delimiter) {
			row.push(cell);
			cell = "";
		} else if (ch === "\n") {
			endRow();
		} else if (ch === "\r") {
			if (src[i + 1] === "\n") i++;
			endRow();
		} else {
			cell += ch;
		}
		i++;
	}

	if (inQuotes) {
		throw parseError("Malformed CSV: unterminated quoted field");
	}
	if (cell !== "" || row.length > 0) endRow();

	return rows;
}

/**
 * "12.5" -> 12.5, "" -> null. Text only becomes a number when the number
 * prints back to the same text, so "007" and "12.50" stay strings.
 */
export function inferCell(raw: string): CellValue {
	if (raw.trim() === "") return null;
	const n = Number(raw);
	return Number.isFinite(n) && String(n) === raw ? n : raw;
}

export function csvToRecords(
	text: string,
	opts?: { keepText?: readonly string[] }
): { header: string[]; records: Record<string, CellValue>[] } {
	const table = parseCsv(text);
	if (table.length === 0) return { header: [], records: [] };

	const header = table[0].map(h => h.trim());
	const keepText = new Set(opts?.keepText ?? []);

	const records = table.slice(1).map(cells => {
		const rec: Record<string, CellValue> = {};
		header.forEach((name, idx) => {
			const raw = cells[idx] ?? "";
			rec[name] = keepText.has(name) ? (raw === "" ? null : raw) : inferCell(raw);
		});
		return rec;
	});

	return { header, records };
}

/**
 * Make a string safe to use as a file or blob name:
 * only [A-Za-z0-9_.-], no leading dots, at most 128 characters.
 */
export function sanitizeFileName(name: string): string {
	const safe = name
		.trim()
		.replace(/\s+/g, "_")
		.replace(/[^a-zA-Z0-9._-]/g, "-")
		.replace(/^\.+/, "")
		.slice(0, 128);
	return safe.length ? safe : "data";
}

/**
 * Build a download filename like: airgradient_data_20250103_120000.csv
 */
export function makeDownloadFilename(vendor: string, at: Date, ext: string): string {
	const p = (n: number) => String(n).padStart(2, "0");
	const stamp =
		`${at.getUTCFullYear()}${p(at.getUTCMonth() + 1)}${p(at.getUTCDate())}` +
		`_${p(at.getUTCHours())}${p(at.getUTCMinutes())}${p(at.getUTCSeconds())}`;
	return sanitizeFileName(`${vendor}_data_${stamp}.${ext}`);
}
