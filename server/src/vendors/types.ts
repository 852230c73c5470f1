import type { AxiosInstance } from "axios";
import type { Sensor, TimeWindow, VendorName } from "@air-sensor-hub/common";

import type { AppError } from "../shared/errors";
import type { Logger } from "../shared/log";
import type { JsonRecord } from "../lib/records";
import type { EpochUnit } from "../lib/timestamp";

/** What a vendor returned, before any normalization. */
export type RawPayload =
	| { kind: "json"; body: unknown }
	| { kind: "csv"; text: string };

export type FetchOutcome =
	| { ok: true; payload: RawPayload; fromCache: boolean }
	| { ok: false; failure: AppError };

export interface VendorDeps {
	http: AxiosInstance;
	log: Logger;
	now?: () => Date;
}

/**
 * One vendor API. Everything vendor-specific lives behind this; the
 * orchestrator, normalizer and archiver only talk to this interface.
 */
export interface VendorClient {
	readonly vendor: VendorName;
	/** Human readable name used in logs and error messages. */
	readonly label: string;
	/** Longest window one request may cover. Undefined: no limit. */
	readonly maxSpanMs?: number;
	/** The vendor ignores the requested window; rows are filtered after fetching. */
	readonly filtersWindowLocally?: boolean;
	/** Candidate timestamp fields, in priority order. */
	readonly timestampFields: readonly string[];
	/** Forces the epoch unit for numeric timestamps. */
	readonly timestampUnit?: EpochUnit;

	/** Statically configured sensors. */
	sensors(): Sensor[];
	/** Directory lookup where the vendor has one, else `sensors()`. */
	listSensors(): Promise<Sensor[]>;
	/** Never rejects: transport and vendor faults come back as `{ ok: false }`. */
	fetch(sensorId: string, window: TimeWindow): Promise<FetchOutcome>;
	/** Unwrap the vendor envelope. Throws a PARSE_ERROR on an unknown shape. */
	extractRecords(payload: RawPayload, sensorId: string): JsonRecord[];
}
