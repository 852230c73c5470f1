import type { RowSet, Sensor, TimeWindow } from "@air-sensor-hub/common";

import { concatRowSets, sortRowSet } from "../lib/normalize";
import { fetchAll, type FetchOptions, type WindowFailure } from "../lib/orchestrator";
import type { VendorClient } from "../vendors/types";
import type { Collected, RowSource } from "./types";

export function createLiveRowSource(client: VendorClient, opts: FetchOptions): RowSource {
	return {
		vendor: client.vendor,
		label: client.label,
		sensors: () => client.sensors(),
		listSensors: () => client.listSensors(),

		async collect(sensors: readonly Sensor[], window: TimeWindow): Promise<Collected> {
			const results = await fetchAll(client, sensors, window, opts);

			const sets: RowSet[] = [];
			const failures: WindowFailure[] = [];
			let fromCache = false;

			for (const sensor of sensors) {
				const r = results.get(sensor.id);
				if (!r) continue;
				failures.push(...r.failures);
				if (r.ok) {
					sets.push(r.rowSet);
					fromCache = fromCache || r.fromCache;
				}
			}

			return { rowSet: sortRowSet(concatRowSets(sets)), failures, fromCache };
		}
	};
}
