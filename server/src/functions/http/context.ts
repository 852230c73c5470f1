import { isVendorName, type VendorName } from "@air-sensor-hub/common";

import { configError, notFound, type AppError } from "../../shared/errors";
import type { Logger } from "../../shared/log";
import type { WindowFailure } from "../../lib/orchestrator";
import type { RowSource } from "../../sources/types";

export interface ArchiveStatus {
	running: boolean;
	lastCycleAt?: Date;
}

/** Everything the routes need, built once by the composition root. */
export interface ApiContext {
	sources: ReadonlyMap<VendorName, RowSource>;
	defaultRangeHours: number;
	log: Logger;
	apiKey?: string;
	archiveStatus?: () => ArchiveStatus;
	now?: () => Date;
}

export function resolveSource(ctx: ApiContext, slug: string): RowSource {
	if (!isVendorName(slug)) throw notFound(`Unknown vendor '${slug}'`);
	const source = ctx.sources.get(slug);
	if (!source) throw configError(`${slug} integration is not configured`);
	return source;
}

export function vendorParam(params: unknown): string {
	if (typeof params === "object" && params !== null && "vendor" in params && typeof params.vendor === "string") {
		return params.vendor;
	}
	return "";
}

/** Zero rows: the first recorded failure explains why, else plain 404. */
export function noDataError(failures: readonly WindowFailure[]): AppError {
	return failures[0]?.error ?? notFound("No data found for the given parameters");
}

export function failureView(f: WindowFailure): Record<string, string> {
	return {
		sensor_id: f.sensorId,
		start: f.window.start.toISOString(),
		end: f.window.end.toISOString(),
		code: f.error.code,
		message: f.error.message
	};
}
