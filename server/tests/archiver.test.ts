import { afterEach, describe, expect, test, vi } from "vitest";
import type { TimeWindow } from "@air-sensor-hub/common";

import { vendorError } from "../src/shared/errors";
import { Archiver } from "../src/archive/archiver";
import { LayeredArchiveStore } from "../src/archive/store";
import { csvToRowSet } from "../src/archive/csv";
import type { FetchOutcome } from "../src/vendors/types";
import { silentLogger } from "./helpers/log";
import { MemoryArchiveStore } from "./helpers/memory-store";
import { jsonOutcome, stubClient } from "./helpers/stub-client";

const NOW = new Date("2025-01-01T12:00:00Z");
const INTERVAL_MS = 120_000;

function makeArchiver(
	sensors: string[],
	fetch: (sensorId: string, window: TimeWindow) => Promise<FetchOutcome>,
	store = new MemoryArchiveStore()
) {
	const client = stubClient({ sensors, fetch });
	const archiver = new Archiver({
		client,
		store,
		log: silentLogger,
		intervalMs: INTERVAL_MS,
		lookbackMs: 60 * 60 * 1000,
		concurrency: 2,
		now: () => NOW
	});
	return { archiver, store };
}

afterEach(() => {
	vi.useRealTimers();
});

describe("Archiver.runCycle", () => {
	test("creates the archive on the first cycle and merges on the next", async () => {
		let batch = [
			{ timestamp: "2025-01-01T11:58:00Z", pm25: 4 },
			{ timestamp: "2025-01-01T11:59:00Z", pm25: 5 }
		];
		const { archiver, store } = makeArchiver(["n1"], async () => jsonOutcome(batch));

		expect(await archiver.runCycle()).toEqual([{ sensorId: "n1", status: "archived", rows: 2, added: 2 }]);

		batch = [
			{ timestamp: "2025-01-01T11:59:00Z", pm25: 99 },
			{ timestamp: "2025-01-01T12:00:00Z", pm25: 6 }
		];
		expect(await archiver.runCycle()).toEqual([{ sensorId: "n1", status: "archived", rows: 3, added: 1 }]);

		const content = store.files.get("n1_history.csv");
		expect(content).toBeDefined();
		const archived = csvToRowSet(content ?? "");
		expect(archived.rows.map(r => [r.timestamp, r.pm25])).toEqual([
			["2025-01-01T11:58:00.000Z", 4],
			["2025-01-01T11:59:00.000Z", 5],
			["2025-01-01T12:00:00.000Z", 6]
		]);
		expect(archiver.lastCycleAt).toEqual(NOW);
	});

	test("asks for the lookback window ending now", async () => {
		const windows: TimeWindow[] = [];
		const { archiver } = makeArchiver(["n1"], async (_id, window) => {
			windows.push(window);
			return jsonOutcome([]);
		});

		await archiver.runCycle();
		expect(windows.map(w => [w.start.toISOString(), w.end.toISOString()])).toEqual([
			["2025-01-01T11:00:00.000Z", "2025-01-01T12:00:00.000Z"]
		]);
	});

	test("one failing sensor does not stop the others", async () => {
		const { archiver, store } = makeArchiver(["good", "bad"], async id =>
			id === "bad"
				? { ok: false, failure: vendorError("HTTP 503") }
				: jsonOutcome([{ timestamp: "2025-01-01T11:30:00Z", pm25: 1 }])
		);

		const results = await archiver.runCycle();
		expect(results.map(r => [r.sensorId, r.status])).toEqual([
			["good", "archived"],
			["bad", "failed"]
		]);
		expect(results[1].error?.code).toBe("VENDOR_ERROR");
		expect([...store.files.keys()]).toEqual(["good_history.csv"]);
	});

	test("a write failure is reported for that sensor only", async () => {
		const store = new MemoryArchiveStore();
		store.failWrites.add("a_history.csv");
		const { archiver } = makeArchiver(
			["a", "b"],
			async () => jsonOutcome([{ timestamp: "2025-01-01T11:30:00Z", pm25: 1 }]),
			store
		);

		const results = await archiver.runCycle();
		expect(results.map(r => r.status)).toEqual(["failed", "archived"]);
		expect(results[0].error?.code).toBe("PERSISTENCE_ERROR");
	});

	test("no rows means nothing is written", async () => {
		const { archiver, store } = makeArchiver(["n1"], async () => jsonOutcome([]));

		expect(await archiver.runCycle()).toEqual([{ sensorId: "n1", status: "skipped" }]);
		expect(store.writes).toEqual([]);
	});
});

describe("Archiver scheduling", () => {
	test("runs at start and then on every interval until stopped", async () => {
		vi.useFakeTimers();
		let calls = 0;
		const { archiver } = makeArchiver(["n1"], async () => {
			calls++;
			return jsonOutcome([{ timestamp: "2025-01-01T11:30:00Z", pm25: 1 }]);
		});

		archiver.start();
		expect(archiver.running).toBe(true);
		await vi.advanceTimersByTimeAsync(INTERVAL_MS);
		await vi.advanceTimersByTimeAsync(INTERVAL_MS);
		await archiver.stop();

		expect(archiver.running).toBe(false);
		expect(calls).toBe(3);

		await vi.advanceTimersByTimeAsync(5 * INTERVAL_MS);
		expect(calls).toBe(3);
	});

	test("skips a tick while the previous cycle is still running", async () => {
		vi.useFakeTimers();
		let calls = 0;
		let release: () => void = () => undefined;
		const gate = new Promise<void>(resolve => {
			release = resolve;
		});

		const { archiver } = makeArchiver(["n1"], async () => {
			calls++;
			await gate;
			return jsonOutcome([]);
		});

		archiver.start();
		await vi.advanceTimersByTimeAsync(INTERVAL_MS);
		expect(calls).toBe(1);

		release();
		await vi.advanceTimersByTimeAsync(INTERVAL_MS);
		await archiver.stop();
		expect(calls).toBe(2);
	});

	test("a failing vendor keeps the schedule going", async () => {
		vi.useFakeTimers();
		let calls = 0;
		const { archiver } = makeArchiver(["n1"], async () => {
			calls++;
			return { ok: false, failure: vendorError("HTTP 500") };
		});

		archiver.start();
		await vi.advanceTimersByTimeAsync(INTERVAL_MS);
		await archiver.stop();
		expect(calls).toBe(2);
	});
});

describe("Archiver over remote and local stores", () => {
	const header = "sensor_id,sensor_name,timestamp,pm25\n";

	function layeredArchiver(fetch: () => Promise<FetchOutcome>, now: () => Date) {
		const remote = new MemoryArchiveStore();
		const local = new MemoryArchiveStore();
		const archiver = new Archiver({
			client: stubClient({ sensors: ["n1"], fetch }),
			store: new LayeredArchiveStore(remote, local, silentLogger),
			log: silentLogger,
			intervalMs: INTERVAL_MS,
			lookbackMs: 60 * 60 * 1000,
			concurrency: 1,
			now
		});
		return { archiver, remote, local };
	}

	test("an unreadable remote copy fails the cycle and leaves it intact", async () => {
		const { archiver, remote, local } = layeredArchiver(
			async () => jsonOutcome([{ timestamp: "2025-01-01T12:00:00Z", pm25: 6 }]),
			() => NOW
		);
		const history =
			header +
			"n1,Sensor n1,2025-01-01T11:58:00.000Z,4\n" +
			"n1,Sensor n1,2025-01-01T11:59:00.000Z,5\n";
		remote.files.set("n1_history.csv", history);
		remote.failReads.add("n1_history.csv");

		const [failed] = await archiver.runCycle();
		expect(failed.status).toBe("failed");
		expect(failed.error?.code).toBe("PERSISTENCE_ERROR");
		expect(remote.files.get("n1_history.csv")).toBe(history);
		expect(local.files.size).toBe(0);

		remote.failReads.clear();
		expect(await archiver.runCycle()).toEqual([{ sensorId: "n1", status: "archived", rows: 3, added: 1 }]);
	});

	test("rows whose upload failed reach the remote copy on the next cycle", async () => {
		let minute = 0;
		const at = () => new Date(Date.UTC(2025, 0, 1, 11, minute));
		const { archiver, remote } = layeredArchiver(
			async () => jsonOutcome([{ timestamp: at().toISOString(), pm25: minute }]),
			at
		);

		expect((await archiver.runCycle())[0].status).toBe("archived");

		minute = 1;
		remote.failWrites.add("n1_history.csv");
		const [failed] = await archiver.runCycle();
		expect(failed.status).toBe("failed");
		expect(failed.error?.code).toBe("PERSISTENCE_ERROR");

		minute = 2;
		remote.failWrites.clear();
		expect(await archiver.runCycle()).toEqual([{ sensorId: "n1", status: "archived", rows: 3, added: 1 }]);

		const archived = csvToRowSet(remote.files.get("n1_history.csv") ?? "");
		expect(archived.rows.map(r => [r.timestamp, r.pm25])).toEqual([
			["2025-01-01T11:00:00.000Z", 0],
			["2025-01-01T11:01:00.000Z", 1],
			["2025-01-01T11:02:00.000Z", 2]
		]);
	});
});
