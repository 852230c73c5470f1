import type { RowSet, Sensor, TimeWindow } from "@air-sensor-hub/common";

import { asAppError, describeError } from "../shared/errors";
import type { Logger } from "../shared/log";
import { concatRowSets, filterRowSet, sortRowSet } from "../lib/normalize";
import type { WindowFailure } from "../lib/orchestrator";
import { archiveFileName, csvToRowSet } from "../archive/csv";
import type { ArchiveStore } from "../archive/store";
import type { VendorClient } from "../vendors/types";
import type { Collected, RowSource } from "./types";

/**
 * Serves a vendor from its archive files instead of the live API.
 */
export function createArchiveRowSource(client: VendorClient, store: ArchiveStore, log: Logger): RowSource {
	async function readSensor(sensor: Sensor, window: TimeWindow): Promise<RowSet | undefined> {
		const text = await store.read(archiveFileName(sensor.id));
		if (text === undefined) return undefined;

		const rs = csvToRowSet(text);
		const tagged: RowSet = {
			columns: rs.columns,
			rows: rs.rows.map(r => ({ ...r, sensor_id: sensor.id, sensor_name: sensor.displayName }))
		};
		return filterRowSet(tagged, window);
	}

	return {
		vendor: client.vendor,
		label: client.label,
		sensors: () => client.sensors(),
		listSensors: () => client.listSensors(),

		async collect(sensors: readonly Sensor[], window: TimeWindow): Promise<Collected> {
			const sets: RowSet[] = [];
			const failures: WindowFailure[] = [];

			for (const sensor of sensors) {
				try {
					const rs = await readSensor(sensor, window);
					if (rs) sets.push(rs);
				} catch (err) {
					const error = asAppError(err).withDetails({ vendor: client.vendor, sensorId: sensor.id });
					log.warn(`archive: could not read ${archiveFileName(sensor.id)}`, describeError(error));
					failures.push({ sensorId: sensor.id, window, error });
				}
			}

			return { rowSet: sortRowSet(concatRowSets(sets)), failures, fromCache: false };
		}
	};
}
