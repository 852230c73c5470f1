import type { TimeWindow } from "@air-sensor-hub/common";

export const HOUR_MS = 60 * 60 * 1000;

/**
 * Split [start, end) into contiguous windows no longer than `maxSpanMs`.
 * Without a span the whole range is one window.
 */
export function splitWindow(window: TimeWindow, maxSpanMs?: number): TimeWindow[] {
	const start = window.start.getTime();
	const end = window.end.getTime();

	if (!(start < end)) {
		throw new RangeError(`Window start must be before end (${window.start.toISOString()} >= ${window.end.toISOString()})`);
	}
	if (maxSpanMs === undefined) {
		return [{ start: new Date(start), end: new Date(end) }];
	}
	if (!(maxSpanMs > 0)) {
		throw new RangeError(`maxSpanMs must be > 0 (got ${maxSpanMs})`);
	}

	const out: TimeWindow[] = [];
	for (let cur = start; cur < end; ) {
		const next = Math.min(cur + maxSpanMs, end);
		out.push({ start: new Date(cur), end: new Date(next) });
		cur = next;
	}
	return out;
}

export function describeWindow(w: TimeWindow): { start: string; end: string } {
	return { start: w.start.toISOString(), end: w.end.toISOString() };
}
