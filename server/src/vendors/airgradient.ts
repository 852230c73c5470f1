import type { AirGradientConfig } from "../shared/config";
import { attempt } from "../lib/http";
import { recordsAt } from "../lib/records";
import { toIsoSeconds } from "../lib/timestamp";
import { HOUR_MS } from "../lib/window";
import { jsonPayload, requireJson, toSensors, unexpectedShape } from "./common";
import type { VendorClient, VendorDeps } from "./types";

const LABEL = "AirGradient";

/** The public API serves at most two days of past measures per call. */
export const AIRGRADIENT_MAX_SPAN_MS = 48 * HOUR_MS;

export function createAirGradientClient(cfg: AirGradientConfig, deps: VendorDeps): VendorClient {
	const sensors = toSensors("airgradient", cfg.locations);

	return {
		vendor: "airgradient",
		label: LABEL,
		maxSpanMs: AIRGRADIENT_MAX_SPAN_MS,
		timestampFields: ["timestamp"],

		sensors: () => sensors,
		listSensors: async () => sensors,

		fetch: (sensorId, window) =>
			attempt({ vendor: "airgradient", label: LABEL, sensorId, window }, async () => {
				const res = await deps.http.get(
					`${cfg.baseUrl}/locations/${encodeURIComponent(sensorId)}/measures/past`,
					{
						params: {
							from: toIsoSeconds(window.start),
							to: toIsoSeconds(window.end),
							token: cfg.token
						},
						responseType: "text"
					}
				);
				return jsonPayload(res.data);
			}),

		extractRecords(payload) {
			const body = requireJson(payload, LABEL);
			return recordsAt(body, ["data"]) ?? unexpectedShape(LABEL, body);
		}
	};
}
