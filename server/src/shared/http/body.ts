//
// Parsing of preview/download request bodies.
//
// The body shape is validated with the shared zod schema; times and sensor
// ids are then resolved against "now" and the vendor's sensor list.

import { DataRequestSchema, type ExportFormat, type Sensor, type TimeWindow } from "@air-sensor-hub/common";

import { badRequest } from "../errors";
import { parseTimestamp } from "../../lib/timestamp";
import { HOUR_MS } from "../../lib/window";

export interface ResolvedRequest {
	sensors: Sensor[];
	window: TimeWindow;
	format: ExportFormat;
}

export interface ResolveOptions {
	now: Date;
	defaultRangeHours: number;
	available: readonly Sensor[];
}

/**
 * Instant from the body: ISO 8601, or milliseconds since epoch
 * (as a number or a string of digits).
 */
function parseInstant(value: string | number | null | undefined, key: string): Date | undefined {
	if (value === null || value === undefined) return undefined;
	if (typeof value === "string" && value.trim() === "") return undefined;

	const iso = parseTimestamp(value, "ms");
	if (iso === null) throw badRequest(`Invalid date for '${key}' (use ISO 8601)`);
	return new Date(iso);
}

/**
 * Time range with defaults:
 * - If both missing: last `defaultRangeHours` (end=now)
 * - If only start: end=now
 * - If only end: start=end-defaultRangeHours
 */
export function resolveTimeRange(
	startInput: string | number | null | undefined,
	endInput: string | number | null | undefined,
	now: Date,
	defaultRangeHours: number
): TimeWindow {
	const span = defaultRangeHours * HOUR_MS;
	const start = parseInstant(startInput, "start_time");
	const end = parseInstant(endInput, "end_time");

	const window: TimeWindow = {
		start: start ?? new Date((end ?? now).getTime() - span),
		end: end ?? now
	};

	if (window.start.getTime() >= window.end.getTime()) {
		throw badRequest("'start_time' must be before 'end_time'");
	}
	return window;
}

function resolveSensors(selection: "all" | string[], available: readonly Sensor[]): Sensor[] {
	if (selection === "all") return [...available];

	const byId = new Map(available.map(s => [s.id, s]));
	const ids = [...new Set(selection)];
	const unknown = ids.filter(id => !byId.has(id));
	if (unknown.length > 0) {
		throw badRequest(`Unknown sensor id(s): ${unknown.join(", ")}`);
	}
	return ids.flatMap(id => {
		const s = byId.get(id);
		return s ? [s] : [];
	});
}

export function resolveDataRequest(body: unknown, opts: ResolveOptions): ResolvedRequest {
	const res = DataRequestSchema.safeParse(body ?? {});
	if (!res.success) {
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw badRequest(`Invalid request body: ${issues}`);
	}

	const sensors = resolveSensors(res.data.sensors, opts.available);
	if (sensors.length === 0) {
		throw badRequest("No sensors configured for this vendor");
	}

	return {
		sensors,
		window: resolveTimeRange(res.data.start_time, res.data.end_time, opts.now, opts.defaultRangeHours),
		format: res.data.format
	};
}
