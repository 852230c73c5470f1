import type { Sensor, VendorName } from "@air-sensor-hub/common";

import type { SensorEntry } from "../shared/config";
import { parseError } from "../shared/errors";
import { jsonBody } from "../lib/records";
import type { RawPayload } from "./types";

export function toSensors(vendor: VendorName, entries: readonly SensorEntry[]): Sensor[] {
	return entries.map(e => ({ id: e.id, displayName: e.name, vendor }));
}

export function jsonPayload(data: unknown): RawPayload {
	return { kind: "json", body: jsonBody(data) };
}

export function requireJson(payload: RawPayload, label: string): unknown {
	if (payload.kind !== "json") {
		throw parseError(`${label}: expected a JSON payload, got ${payload.kind}`);
	}
	return payload.body;
}

export function unexpectedShape(label: string, body: unknown): never {
	const preview = JSON.stringify(body) ?? String(body);
	throw parseError(`${label}: unexpected response shape`, { preview: preview.slice(0, 200) });
}
