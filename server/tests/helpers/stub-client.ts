import type { Sensor, TimeWindow } from "@air-sensor-hub/common";

import { parseError } from "../../src/shared/errors";
import { recordsAt } from "../../src/lib/records";
import type { FetchOutcome, VendorClient } from "../../src/vendors/types";

export interface StubOptions {
	sensors: string[];
	fetch: (sensorId: string, window: TimeWindow) => Promise<FetchOutcome>;
	maxSpanMs?: number;
	filtersWindowLocally?: boolean;
}

/** A vendor client over canned payloads: JSON `{ data: [...] }` with a `timestamp` field. */
export function stubClient(opts: StubOptions): VendorClient {
	const sensors: Sensor[] = opts.sensors.map(id => ({ id, displayName: `Sensor ${id}`, vendor: "nebo" }));
	return {
		vendor: "nebo",
		label: "Stub",
		maxSpanMs: opts.maxSpanMs,
		filtersWindowLocally: opts.filtersWindowLocally,
		timestampFields: ["timestamp"],
		sensors: () => sensors,
		listSensors: async () => sensors,
		fetch: opts.fetch,
		extractRecords(payload) {
			if (payload.kind !== "json") throw parseError("Stub: expected JSON");
			const records = recordsAt(payload.body, ["data"]);
			if (!records) throw parseError("Stub: unexpected response shape");
			return records;
		}
	};
}

export function jsonOutcome(records: unknown[]): FetchOutcome {
	return { ok: true, payload: { kind: "json", body: { data: records } }, fromCache: false };
}
