import type { EnviraConfig } from "../shared/config";
import { attempt } from "../lib/http";
import { recordsAt } from "../lib/records";
import { jsonPayload, requireJson, toSensors, unexpectedShape } from "./common";
import type { VendorClient, VendorDeps } from "./types";

const LABEL = "Envira";

/** Envira IoT devices, PM2.5 channel. Range bounds are epoch milliseconds. */
export function createEnviraClient(cfg: EnviraConfig, deps: VendorDeps): VendorClient {
	const sensors = toSensors("envira", cfg.devices);

	return {
		vendor: "envira",
		label: LABEL,
		timestampFields: ["timestamp", "ts"],
		timestampUnit: "ms",

		sensors: () => sensors,
		listSensors: async () => sensors,

		fetch: (sensorId, window) =>
			attempt({ vendor: "envira", label: LABEL, sensorId, window }, async () => {
				const res = await deps.http.get(`${cfg.baseUrl}/${encodeURIComponent(sensorId)}/data/pm2.5`, {
					params: { "range.from": window.start.getTime(), "range.to": window.end.getTime() },
					responseType: "text"
				});
				return jsonPayload(res.data);
			}),

		extractRecords(payload) {
			const body = requireJson(payload, LABEL);
			return recordsAt(body, ["data"]) ?? unexpectedShape(LABEL, body);
		}
	};
}
