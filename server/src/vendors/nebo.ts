import { createHash } from "node:crypto";

import type { NeboConfig } from "../shared/config";
import { attempt } from "../lib/http";
import { recordsAt } from "../lib/records";
import { toUnixSeconds } from "../lib/timestamp";
import { jsonPayload, requireJson, toSensors, unexpectedShape } from "./common";
import type { VendorClient, VendorDeps } from "./types";

const LABEL = "Nebo";

/** Request signature: characters 5..15 of hex sha1("<unix seconds><code>"). */
export function neboHash(unixSeconds: number, code: string): string {
	return createHash("sha1").update(`${unixSeconds}${code}`, "utf8").digest("hex").slice(5, 16);
}

/**
 * Nebo sensors. The minute endpoint only returns the latest readings; the
 * window is not sent. History is built up by the archiver.
 */
export function createNeboClient(cfg: NeboConfig, deps: VendorDeps): VendorClient {
	const sensors = toSensors("nebo", cfg.sensors);
	const now = deps.now ?? (() => new Date());

	return {
		vendor: "nebo",
		label: LABEL,
		timestampFields: ["timestamp", "time", "datetime"],

		sensors: () => sensors,
		listSensors: async () => sensors,

		fetch: (sensorId, window) =>
			attempt({ vendor: "nebo", label: LABEL, sensorId, window }, async () => {
				const time = toUnixSeconds(now());
				const res = await deps.http.get(`${cfg.baseUrl}/sensors/${encodeURIComponent(sensorId)}/minute`, {
					params: { time, hash: neboHash(time, cfg.code) },
					headers: { "X-Auth-Nebo": cfg.token },
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
