import type { CellValue, Row, RowSet, Sensor, TimeWindow } from "@air-sensor-hub/common";

import { isRecord, type JsonRecord } from "./records";
import { parseTimestamp, type EpochUnit } from "./timestamp";

export const BASE_COLUMNS = ["sensor_id", "sensor_name", "timestamp"] as const;

const RESERVED: ReadonlySet<string> = new Set<string>(BASE_COLUMNS);

export interface NormalizeOptions {
	timestampFields: readonly string[];
	timestampUnit?: EpochUnit;
}

export function emptyRowSet(): RowSet {
	return { columns: [...BASE_COLUMNS], rows: [] };
}

function toCell(value: unknown): CellValue {
	if (value === undefined || value === null) return null;
	if (typeof value === "string" || typeof value === "boolean") return value;
	if (typeof value === "number") return Number.isFinite(value) ? value : null;
	if (value instanceof Date) return value.toISOString();
	return JSON.stringify(value);
}

/**
 * Flatten nested plain objects: { pm: { "2.5": 4 } } -> { "pm_2.5": 4 }.
 * Arrays are kept as JSON text.
 */
export function flattenRecord(obj: JsonRecord, sep = "_", prefix = ""): Row {
	const out: Row = {};
	for (const [key, value] of Object.entries(obj)) {
		const name = prefix ? `${prefix}${sep}${key}` : key;
		if (isRecord(value) && !(value instanceof Date)) {
			Object.assign(out, flattenRecord(value, sep, name));
		} else {
			out[name] = toCell(value);
		}
	}
	return out;
}

function findTimestamp(row: Row, opts: NormalizeOptions): string | null {
	for (const field of opts.timestampFields) {
		const value = row[field];
		if (value === undefined || value === null) continue;
		const ts = parseTimestamp(value, opts.timestampUnit);
		if (ts) return ts;
	}
	return null;
}

/** Every row gets every column; absent cells are null. */
function completeRows(columns: readonly string[], rows: readonly Row[]): Row[] {
	return rows.map(r => {
		const full: Row = {};
		for (const c of columns) full[c] = r[c] ?? null;
		return full;
	});
}

/**
 * Vendor records -> RowSet for one sensor, sorted by timestamp.
 */
export function normalizeRecords(sensor: Sensor, records: readonly JsonRecord[], opts: NormalizeOptions): RowSet {
	const columns: string[] = [...BASE_COLUMNS];
	const seen = new Set<string>(columns);
	const rows: Row[] = [];

	for (const record of records) {
		const flat = flattenRecord(record);
		const row: Row = {
			sensor_id: sensor.id,
			sensor_name: sensor.displayName,
			timestamp: findTimestamp(flat, opts)
		};

		for (const [key, value] of Object.entries(flat)) {
			if (RESERVED.has(key)) continue;
			row[key] = value;
			if (!seen.has(key)) {
				seen.add(key);
				columns.push(key);
			}
		}
		rows.push(row);
	}

	return sortRowSet({ columns, rows: completeRows(columns, rows) });
}

function timeOf(row: Row): number | undefined {
	const ts = row.timestamp;
	if (typeof ts !== "string") return undefined;
	const t = Date.parse(ts);
	return Number.isNaN(t) ? undefined : t;
}

/** Stable; ascending timestamp, rows without one last. */
export function sortRowSet(rs: RowSet): RowSet {
	const indexed = rs.rows.map((row, idx) => ({ row, idx, t: timeOf(row) }));
	indexed.sort((a, b) => {
		if (a.t === undefined && b.t === undefined) return a.idx - b.idx;
		if (a.t === undefined) return 1;
		if (b.t === undefined) return -1;
		return a.t - b.t || a.idx - b.idx;
	});
	return { columns: [...rs.columns], rows: indexed.map(x => x.row) };
}

/** Column names of every list, each once, in first-seen order. */
export function unionColumns(lists: readonly (readonly string[])[]): string[] {
	return [...new Set(lists.flat())];
}

/** Union of columns with the base columns first; rows in argument order. */
export function concatRowSets(sets: readonly RowSet[]): RowSet {
	const columns = unionColumns([BASE_COLUMNS, ...sets.map(s => s.columns)]);
	return { columns, rows: completeRows(columns, sets.flatMap(s => s.rows)) };
}

/** Keep rows with start <= timestamp < end. Rows without a timestamp are dropped. */
export function filterRowSet(rs: RowSet, window: TimeWindow): RowSet {
	const start = window.start.getTime();
	const end = window.end.getTime();
	return {
		columns: [...rs.columns],
		rows: rs.rows.filter(r => {
			const t = timeOf(r);
			return t !== undefined && t >= start && t < end;
		})
	};
}
