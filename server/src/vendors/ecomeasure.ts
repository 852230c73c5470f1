import type { Sensor } from "@air-sensor-hub/common";

import type { EcomeasureConfig } from "../shared/config";
import { describeError } from "../shared/errors";
import { attempt } from "../lib/http";
import { isRecord, jsonBody, recordsAt, type JsonRecord } from "../lib/records";
import { toIsoSeconds } from "../lib/timestamp";
import { requireJson, toSensors, unexpectedShape } from "./common";
import type { VendorClient, VendorDeps } from "./types";

const LABEL = "Ecomeasure";

export const ECOMEASURE_MAX_PAGES = 50;
/** The group endpoint accepts at most this many ids. */
export const ECOMEASURE_DIRECTORY_LIMIT = 10;

const ENVELOPE_KEYS = ["results", "measurements", "data"] as const;

function nextLink(body: unknown): string | undefined {
	return isRecord(body) && typeof body.next === "string" && body.next ? body.next : undefined;
}

function directoryEntries(body: unknown): JsonRecord[] {
	const list = recordsAt(body, ["results", "sensors", "data"]);
	if (list) return list;
	if (isRecord(body)) return Object.values(body).filter(isRecord);
	return [];
}

/**
 * Ecomeasure (i-comesure airlab) REST API. Measurements are paginated;
 * every `next` link is followed and the pages are concatenated.
 */
export function createEcomeasureClient(cfg: EcomeasureConfig, deps: VendorDeps): VendorClient {
	const sensors = toSensors("ecomeasure", cfg.sensors);
	const names = new Map(sensors.map(s => [s.id, s.displayName]));
	const headers = { Authorization: `TOKEN ${cfg.token}`, "Content-Type": "application/json" };

	async function listFromDirectory(): Promise<Sensor[]> {
		const ids = sensors.slice(0, ECOMEASURE_DIRECTORY_LIMIT).map(s => s.id);
		const res = await deps.http.get(`${cfg.baseUrl}/group/sensors/${ids.join(",")}`, {
			headers,
			responseType: "text"
		});

		return directoryEntries(jsonBody(res.data)).flatMap(entry => {
			const raw = entry.id ?? entry.sensor_id;
			if (typeof raw !== "string" && typeof raw !== "number") return [];
			const id = String(raw);
			const name = typeof entry.name === "string" && entry.name.trim() ? entry.name.trim() : undefined;
			return [{ id, displayName: name ?? names.get(id) ?? `${LABEL} Sensor ${id}`, vendor: "ecomeasure" as const }];
		});
	}

	return {
		vendor: "ecomeasure",
		label: LABEL,
		timestampFields: ["timestamp", "time", "datetime", "date"],

		sensors: () => sensors,

		async listSensors() {
			try {
				const found = await listFromDirectory();
				if (found.length > 0) return found;
				deps.log.warn(`${LABEL}: sensor directory returned no sensors; using configured list`);
			} catch (err) {
				deps.log.warn(`${LABEL}: sensor directory unavailable; using configured list`, describeError(err));
			}
			return sensors;
		},

		fetch: (sensorId, window) =>
			attempt({ vendor: "ecomeasure", label: LABEL, sensorId, window }, async () => {
				const first = await deps.http.get(`${cfg.baseUrl}/sensors/${encodeURIComponent(sensorId)}/measurements/`, {
					params: {
						start: toIsoSeconds(window.start),
						end: toIsoSeconds(window.end),
						unit: "false",
						limit: cfg.pageSize,
						offset: 0
					},
					headers,
					responseType: "text"
				});

				const body = jsonBody(first.data);
				if (!isRecord(body) || !Array.isArray(body.results)) {
					return { kind: "json", body };
				}

				const results: unknown[] = [...body.results];
				let next = nextLink(body);
				let pages = 1;
				while (next && pages < ECOMEASURE_MAX_PAGES) {
					const page = jsonBody((await deps.http.get(next, { headers, responseType: "text" })).data);
					pages++;
					if (isRecord(page) && Array.isArray(page.results)) results.push(...page.results);
					next = nextLink(page);
				}
				if (next) {
					deps.log.warn(`${LABEL}: sensor ${sensorId} stopped after ${ECOMEASURE_MAX_PAGES} pages`);
				}

				return { kind: "json", body: { results } };
			}),

		extractRecords(payload) {
			const body = requireJson(payload, LABEL);
			const list = recordsAt(body, ENVELOPE_KEYS);
			if (list) return list;
			// A single measurement object.
			if (isRecord(body) && Object.keys(body).length > 0) return [body];
			return unexpectedShape(LABEL, body);
		}
	};
}
