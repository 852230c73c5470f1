import { parseError } from "../shared/errors";

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecordArray(value: unknown[]): JsonRecord[] {
	return value.filter(isRecord);
}

/**
 * Find the record array in a vendor envelope: a bare array, or the first
 * of `keys` holding an array. Dotted keys walk nested objects.
 */
export function recordsAt(body: unknown, keys: readonly string[]): JsonRecord[] | undefined {
	if (Array.isArray(body)) return asRecordArray(body);
	if (!isRecord(body)) return undefined;

	for (const key of keys) {
		let cur: unknown = body;
		for (const part of key.split(".")) {
			cur = isRecord(cur) ? cur[part] : undefined;
		}
		if (Array.isArray(cur)) return asRecordArray(cur);
	}
	return undefined;
}

/** Parse a JSON body delivered as text; axios leaves text as-is under responseType "text". */
export function jsonBody(data: unknown): unknown {
	if (typeof data !== "string") return data;
	const text = data.trim();
	if (text === "") return null;
	try {
		return JSON.parse(text);
	} catch (err) {
		throw parseError("Response body is not valid JSON", { preview: text.slice(0, 200) }, err);
	}
}
