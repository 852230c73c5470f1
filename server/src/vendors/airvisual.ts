import fs from "node:fs/promises";
import path from "node:path";

import type { AirVisualConfig } from "../shared/config";
import { sanitizeFileName } from "../shared/csv";
import { describeError, vendorError } from "../shared/errors";
import { attempt } from "../lib/http";
import { isRecord, recordsAt, type JsonRecord } from "../lib/records";
import { jsonPayload, requireJson, toSensors, unexpectedShape } from "./common";
import type { FetchOutcome, RawPayload, VendorClient, VendorDeps } from "./types";

const LABEL = "AirVisual";

// Short device field names -> column names.
const RENAMES: Readonly<Record<string, string>> = {
	tp: "temperature",
	hm: "humidity",
	pr: "pressure"
};

function renameFields(rec: JsonRecord): JsonRecord {
	const out: JsonRecord = {};
	for (const [k, v] of Object.entries(rec)) out[RENAMES[k] ?? k] = v;
	return out;
}

/**
 * IQAir AirVisual device feeds: one public URL per device, no auth and no
 * time parameters. The feed carries recent history, so rows are filtered
 * to the requested window after fetching.
 *
 * With `cacheDir` set, each good payload is kept on disk and served
 * (flagged `fromCache`) when the live call fails.
 */
export function createAirVisualClient(cfg: AirVisualConfig, deps: VendorDeps): VendorClient {
	const sensors = toSensors("airvisual", cfg.devices);
	const urls = new Map(cfg.devices.map(d => [d.id, d.url]));

	const cachePath = (sensorId: string): string | undefined =>
		cfg.cacheDir ? path.join(cfg.cacheDir, `${sanitizeFileName(sensorId)}.json`) : undefined;

	async function writeCache(sensorId: string, payload: RawPayload): Promise<void> {
		const file = cachePath(sensorId);
		if (!file || payload.kind !== "json") return;
		try {
			await fs.mkdir(path.dirname(file), { recursive: true });
			await fs.writeFile(file, JSON.stringify(payload.body), "utf8");
		} catch (err) {
			deps.log.warn(`${LABEL}: could not write cache for ${sensorId}`, describeError(err));
		}
	}

	async function readCache(sensorId: string): Promise<unknown> {
		const file = cachePath(sensorId);
		if (!file) return undefined;
		try {
			return JSON.parse(await fs.readFile(file, "utf8"));
		} catch (err) {
			deps.log.debug(`${LABEL}: no usable cache for ${sensorId}`, describeError(err));
			return undefined;
		}
	}

	return {
		vendor: "airvisual",
		label: LABEL,
		filtersWindowLocally: true,
		timestampFields: ["ts", "timestamp"],

		sensors: () => sensors,
		listSensors: async () => sensors,

		async fetch(sensorId, window): Promise<FetchOutcome> {
			const live = await attempt({ vendor: "airvisual", label: LABEL, sensorId, window }, async () => {
				const url = urls.get(sensorId);
				if (!url) throw vendorError(`${LABEL}: no device URL configured for ${sensorId}`);

				const res = await deps.http.get(url, { responseType: "text" });
				const payload = jsonPayload(res.data);
				if (payload.kind === "json" && isRecord(payload.body) && "code" in payload.body) {
					throw vendorError(`${LABEL} device ${sensorId} returned error: ${String(payload.body.code)}`);
				}
				return payload;
			});

			if (live.ok) {
				await writeCache(sensorId, live.payload);
				return live;
			}

			const cached = await readCache(sensorId);
			if (cached === undefined) return live;

			deps.log.warn(`${LABEL}: live fetch for ${sensorId} failed (${live.failure.message}); serving cached payload`);
			return { ok: true, payload: { kind: "json", body: cached }, fromCache: true };
		},

		extractRecords(payload) {
			const body = requireJson(payload, LABEL);
			const records = recordsAt(body, ["historical.instant", "instant"]);
			if (!records) return unexpectedShape(LABEL, body);
			return records.map(renameFields);
		}
	};
}
