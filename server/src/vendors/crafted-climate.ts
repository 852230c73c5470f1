import type { CraftedClimateConfig } from "../shared/config";
import { csvToRecords } from "../shared/csv";
import { parseError } from "../shared/errors";
import { attempt } from "../lib/http";
import { toDateOnly } from "../lib/timestamp";
import { toSensors } from "./common";
import type { VendorClient, VendorDeps } from "./types";

const LABEL = "Crafted Climate";

/**
 * Crafted Climate telemetry export. Only whole days can be requested, so
 * the CSV is filtered to the exact window afterwards.
 */
export function createCraftedClimateClient(cfg: CraftedClimateConfig, deps: VendorDeps): VendorClient {
	const sensors = toSensors("crafted-climate", cfg.auids);

	return {
		vendor: "crafted-climate",
		label: LABEL,
		filtersWindowLocally: true,
		timestampFields: ["timestamp", "time", "datetime", "date", "created_at"],

		sensors: () => sensors,
		listSensors: async () => sensors,

		fetch: (sensorId, window) =>
			attempt({ vendor: "crafted-climate", label: LABEL, sensorId, window }, async () => {
				const res = await deps.http.get(`${cfg.baseUrl}/pull-data/${encodeURIComponent(sensorId)}`, {
					params: { startDate: toDateOnly(window.start), endDate: toDateOnly(window.end) },
					headers: { "X-API-KEY": cfg.apiKey, Accept: "text/csv" },
					responseType: "text"
				});
				if (typeof res.data !== "string") {
					throw parseError(`${LABEL}: expected CSV text`);
				}
				return { kind: "csv", text: res.data };
			}),

		extractRecords(payload) {
			if (payload.kind !== "csv") {
				throw parseError(`${LABEL}: expected a CSV payload, got ${payload.kind}`);
			}
			return csvToRecords(payload.text).records;
		}
	};
}
