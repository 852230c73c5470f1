import type { AurassureConfig } from "../shared/config";
import { attempt } from "../lib/http";
import { recordsAt } from "../lib/records";
import { toUnixSeconds } from "../lib/timestamp";
import { jsonPayload, requireJson, toSensors, unexpectedShape } from "./common";
import type { VendorClient, VendorDeps } from "./types";

const LABEL = "Aurassure";

/**
 * Aurassure IoT platform: raw readings per "thing", signed with
 * Access-Id / Access-Key headers. Times are Unix seconds.
 */
export function createAurassureClient(cfg: AurassureConfig, deps: VendorDeps): VendorClient {
	const sensors = toSensors("aurassure", cfg.things);
	const url = `${cfg.baseUrl}/clients/${cfg.clientId}/applications/${cfg.applicationId}/things/data`;

	return {
		vendor: "aurassure",
		label: LABEL,
		timestampFields: ["time", "timestamp"],
		timestampUnit: "s",

		sensors: () => sensors,
		listSensors: async () => sensors,

		fetch: (sensorId, window) =>
			attempt({ vendor: "aurassure", label: LABEL, sensorId, window }, async () => {
				const res = await deps.http.post(
					url,
					{
						data_type: "raw",
						aggregation_period: 0,
						parameters: cfg.parameters,
						parameter_attributes: [],
						things: [/^\d+$/.test(sensorId) ? Number(sensorId) : sensorId],
						from_time: toUnixSeconds(window.start),
						upto_time: toUnixSeconds(window.end),
						data_source: ["processed", "callibrated"]
					},
					{
						headers: {
							"Access-Id": cfg.accessId,
							"Access-Key": cfg.accessKey,
							"Content-Type": "application/json"
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
