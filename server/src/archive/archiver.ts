import type { RowSet, Sensor } from "@air-sensor-hub/common";

import { asAppError, describeError, type AppError } from "../shared/errors";
import type { Logger } from "../shared/log";
import { KeyedLock } from "../lib/lock";
import { fetchAll, type SensorResult } from "../lib/orchestrator";
import type { VendorClient } from "../vendors/types";
import { archiveFileName, csvToRowSet, rowSetToCsv } from "./csv";
import { mergeRowSets } from "./merge";
import type { ArchiveStore } from "./store";

export interface ArchiverOptions {
	client: VendorClient;
	store: ArchiveStore;
	log: Logger;
	intervalMs: number;
	/** Each cycle asks for [now - lookbackMs, now). */
	lookbackMs: number;
	concurrency: number;
	now?: () => Date;
}

export type CycleStatus = "archived" | "skipped" | "failed";

export interface SensorCycleResult {
	sensorId: string;
	status: CycleStatus;
	/** Rows in the archive after the merge. */
	rows?: number;
	/** Rows the merge added. */
	added?: number;
	error?: AppError;
}

/**
 * Periodically pulls one vendor and folds the rows into per-sensor archive
 * files. Owned by the composition root: start() once, stop() on shutdown.
 */
export class Archiver {
	private readonly lock = new KeyedLock();
	private readonly now: () => Date;
	private timer: NodeJS.Timeout | null = null;
	private inFlight: Promise<void> | null = null;
	private lastCycle: Date | undefined;

	constructor(private readonly opts: ArchiverOptions) {
		this.now = opts.now ?? (() => new Date());
	}

	get running(): boolean {
		return this.timer !== null;
	}

	get lastCycleAt(): Date | undefined {
		return this.lastCycle;
	}

	get vendor(): string {
		return this.opts.client.vendor;
	}

	/** One pass over every configured sensor. Never rejects. */
	async runCycle(): Promise<SensorCycleResult[]> {
		const { client, log } = this.opts;
		const end = this.now();
		const window = { start: new Date(end.getTime() - this.opts.lookbackMs), end };
		const sensors = client.sensors();

		log.debug(`archive: ${client.label} cycle for ${sensors.length} sensor(s)`);

		let fetched: Map<string, SensorResult>;
		try {
			fetched = await fetchAll(client, sensors, window, { concurrency: this.opts.concurrency, log });
		} catch (err) {
			const error = asAppError(err);
			log.error(`archive: ${client.label} fetch failed: ${error.message}`, describeError(error));
			return sensors.map((s): SensorCycleResult => ({ sensorId: s.id, status: "failed", error }));
		}

		const results = await Promise.all(
			sensors.map(sensor =>
				this.lock.run(sensor.id, () => this.archiveSensor(sensor, fetched.get(sensor.id)))
			)
		);

		this.lastCycle = this.now();
		const archived = results.filter(r => r.status === "archived").length;
		const failed = results.filter(r => r.status === "failed").length;
		log.info(`archive: ${client.label} cycle done (archived=${archived} failed=${failed} skipped=${results.length - archived - failed})`);
		return results;
	}

	private async archiveSensor(sensor: Sensor, result: SensorResult | undefined): Promise<SensorCycleResult> {
		const { store, log, client } = this.opts;

		if (!result || !result.ok) {
			const error = result?.failures[0]?.error ?? asAppError(new Error(`No result for sensor ${sensor.id}`));
			log.error(`archive: ${client.label} sensor ${sensor.id} not fetched (${error.code}): ${error.message}`);
			return { sensorId: sensor.id, status: "failed", error };
		}

		if (result.rowSet.rows.length === 0) {
			log.debug(`archive: ${client.label} sensor ${sensor.id} returned no rows`);
			return { sensorId: sensor.id, status: "skipped" };
		}

		const name = archiveFileName(sensor.id);
		try {
			const text = await store.read(name);
			const existing: RowSet | undefined = text !== undefined ? csvToRowSet(text) : undefined;
			const merged = mergeRowSets(existing, result.rowSet);
			await store.write(name, rowSetToCsv(merged));

			const added = merged.rows.length - (existing?.rows.length ?? 0);
			log.info(`archive: ${name} now has ${merged.rows.length} rows (+${added}) in ${store.describe}`);
			return { sensorId: sensor.id, status: "archived", rows: merged.rows.length, added };
		} catch (err) {
			const error = asAppError(err);
			log.error(`archive: ${name} not updated (${error.code}): ${error.message}`, describeError(error));
			return { sensorId: sensor.id, status: "failed", error };
		}
	}

	private tick(): void {
		if (this.inFlight) {
			this.opts.log.warn("archive: previous cycle still running; skipping this tick");
			return;
		}
		this.inFlight = this.runCycle()
			.then(() => undefined)
			.catch((err: unknown) => {
				this.opts.log.error("archive: cycle crashed", describeError(err));
			})
			.finally(() => {
				this.inFlight = null;
			});
	}

	/** Runs a cycle now, then every intervalMs. */
	start(): void {
		if (this.timer) return;
		this.opts.log.info(`archive: ${this.opts.client.label} every ${this.opts.intervalMs} ms into ${this.opts.store.describe}`);
		this.timer = setInterval(() => this.tick(), this.opts.intervalMs);
		this.tick();
	}

	/** Stops scheduling and waits for a cycle in flight to finish. */
	async stop(): Promise<void> {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
		if (this.inFlight) await this.inFlight;
	}
}
