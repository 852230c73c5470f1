import type { RowSet, Sensor, TimeWindow, VendorName } from "@air-sensor-hub/common";

import type { WindowFailure } from "../lib/orchestrator";

export interface Collected {
	rowSet: RowSet;
	failures: WindowFailure[];
	/** Some rows came from a cached payload rather than a live call. */
	fromCache: boolean;
}

/**
 * Where the HTTP layer gets a vendor's rows from: the vendor itself, or the
 * archive the background job maintains.
 */
export interface RowSource {
	readonly vendor: VendorName;
	readonly label: string;
	/** Sensors a request may name. */
	sensors(): Sensor[];
	listSensors(): Promise<Sensor[]>;
	collect(sensors: readonly Sensor[], window: TimeWindow): Promise<Collected>;
}
