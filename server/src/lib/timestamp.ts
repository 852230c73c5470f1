export type EpochUnit = "s" | "ms";

// Anything at or above this is taken as milliseconds (year 5138 in seconds).
const MS_THRESHOLD = 1e11;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;
const DIGITS = /^-?\d+(\.\d+)?$/;

function fromEpoch(n: number, unit?: EpochUnit): Date {
	const resolved = unit ?? (Math.abs(n) >= MS_THRESHOLD ? "ms" : "s");
	return new Date(resolved === "ms" ? n : n * 1000);
}

/**
 * Canonical instant: ISO-8601 UTC with milliseconds, or null when unparseable.
 * A string without a zone is read as UTC.
 */
export function parseTimestamp(value: unknown, unit?: EpochUnit): string | null {
	let d: Date | undefined;

	if (value instanceof Date) {
		d = value;
	} else if (typeof value === "number") {
		if (!Number.isFinite(value)) return null;
		d = fromEpoch(value, unit);
	} else if (typeof value === "string") {
		const s = value.trim();
		if (s === "") return null;
		if (DIGITS.test(s)) {
			d = fromEpoch(Number(s), unit);
		} else if (DATE_ONLY.test(s)) {
			d = new Date(`${s}T00:00:00Z`);
		} else {
			const iso = s.includes("T") ? s : s.replace(" ", "T");
			d = new Date(HAS_ZONE.test(iso) ? iso : `${iso}Z`);
		}
	}

	if (!d || Number.isNaN(d.getTime())) return null;
	return d.toISOString();
}

/** ISO-8601 without milliseconds: 2025-01-01T00:00:00Z */
export function toIsoSeconds(d: Date): string {
	return d.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function toUnixSeconds(d: Date): number {
	return Math.floor(d.getTime() / 1000);
}

export function toDateOnly(d: Date): string {
	return d.toISOString().slice(0, 10);
}
