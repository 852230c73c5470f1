import type { RowSet, Sensor, TimeWindow } from "@air-sensor-hub/common";

import { asAppError, type AppError } from "../shared/errors";
import type { Logger } from "../shared/log";
import type { VendorClient } from "../vendors/types";
import { concatRowSets, emptyRowSet, filterRowSet, normalizeRecords } from "./normalize";
import { runPool } from "./pool";
import { describeWindow, splitWindow } from "./window";

export interface FetchOptions {
	concurrency: number;
	log: Logger;
}

export interface WindowFailure {
	sensorId: string;
	window: TimeWindow;
	error: AppError;
}

export type SensorResult =
	| { ok: true; sensor: Sensor; rowSet: RowSet; failures: WindowFailure[]; fromCache: boolean }
	| { ok: false; sensor: Sensor; failures: WindowFailure[] };

interface Task {
	sensor: Sensor;
	window: TimeWindow;
}

type TaskResult = { ok: true; rowSet: RowSet; fromCache: boolean } | { ok: false; error: AppError };

async function runTask(client: VendorClient, task: Task): Promise<TaskResult> {
	const outcome = await client.fetch(task.sensor.id, task.window);
	if (!outcome.ok) return { ok: false, error: outcome.failure };

	try {
		const records = client.extractRecords(outcome.payload, task.sensor.id);
		let rowSet = normalizeRecords(task.sensor, records, {
			timestampFields: client.timestampFields,
			timestampUnit: client.timestampUnit
		});
		if (client.filtersWindowLocally) rowSet = filterRowSet(rowSet, task.window);
		return { ok: true, rowSet, fromCache: outcome.fromCache };
	} catch (err) {
		return {
			ok: false,
			error: asAppError(err).withDetails({
				vendor: client.vendor,
				sensorId: task.sensor.id,
				window: describeWindow(task.window)
			})
		};
	}
}

/**
 * Fetch every sensor over `window`, split into the vendor's maximum span,
 * with at most `concurrency` calls in flight across all sensors.
 *
 * A sensor's rows are concatenated in window order, whatever order the
 * calls complete in. Failed windows are reported next to the rows.
 */
export async function fetchAll(
	client: VendorClient,
	sensors: readonly Sensor[],
	window: TimeWindow,
	opts: FetchOptions
): Promise<Map<string, SensorResult>> {
	const tasks: Task[] = sensors.flatMap(sensor =>
		splitWindow(window, client.maxSpanMs).map(w => ({ sensor, window: w }))
	);

	opts.log.debug(`${client.label}: ${tasks.length} request(s) for ${sensors.length} sensor(s)`);

	const settled = await runPool(tasks, opts.concurrency, task => runTask(client, task));

	const bySensor = new Map<string, { sets: RowSet[]; failures: WindowFailure[]; succeeded: number; fromCache: boolean }>();
	for (const sensor of sensors) {
		bySensor.set(sensor.id, { sets: [], failures: [], succeeded: 0, fromCache: false });
	}

	settled.forEach((s, idx) => {
		const task = tasks[idx];
		const acc = bySensor.get(task.sensor.id);
		if (!acc) return;

		const result: TaskResult = s.status === "fulfilled" ? s.value : { ok: false, error: asAppError(s.reason) };
		if (result.ok) {
			acc.sets.push(result.rowSet);
			acc.succeeded++;
			acc.fromCache = acc.fromCache || result.fromCache;
			return;
		}

		const w = describeWindow(task.window);
		opts.log.warn(
			`${client.label}: sensor ${task.sensor.id} window ${w.start}..${w.end} failed (${result.error.code}): ${result.error.message}`
		);
		acc.failures.push({ sensorId: task.sensor.id, window: task.window, error: result.error });
	});

	const out = new Map<string, SensorResult>();
	for (const sensor of sensors) {
		const acc = bySensor.get(sensor.id);
		if (!acc) continue;
		if (acc.succeeded === 0) {
			out.set(sensor.id, { ok: false, sensor, failures: acc.failures });
			continue;
		}
		out.set(sensor.id, {
			ok: true,
			sensor,
			rowSet: acc.sets.length ? concatRowSets(acc.sets) : emptyRowSet(),
			failures: acc.failures,
			fromCache: acc.fromCache
		});
	}
	return out;
}
