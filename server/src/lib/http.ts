import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import type { TimeWindow, VendorName } from "@air-sensor-hub/common";

import { isAppError, networkFailure, vendorError, type AppError } from "../shared/errors";
import type { FetchOutcome, RawPayload } from "../vendors/types";
import { describeWindow } from "./window";

export interface HttpClientOptions {
	timeoutMs: number;
	/** Replaces the network layer (tests). */
	adapter?: AxiosAdapter;
}

export function createHttpClient(opts: HttpClientOptions): AxiosInstance {
	return axios.create({
		timeout: opts.timeoutMs,
		headers: { "User-Agent": "air-sensor-hub/0.1" },
		...(opts.adapter ? { adapter: opts.adapter } : {})
	});
}

export interface FetchContext {
	vendor: VendorName;
	label: string;
	sensorId: string;
	window: TimeWindow;
}

function contextDetails(ctx: FetchContext): Record<string, unknown> {
	return { vendor: ctx.vendor, sensorId: ctx.sensorId, window: describeWindow(ctx.window) };
}

/**
 * Map anything thrown while talking to a vendor onto the error taxonomy.
 * No response: NETWORK_FAILURE. A response: VENDOR_ERROR.
 */
export function toFetchFailure(err: unknown, ctx: FetchContext): AppError {
	const details = contextDetails(ctx);

	if (isAppError(err)) {
		return err.withDetails(details);
	}

	if (axios.isAxiosError(err)) {
		if (err.response) {
			return vendorError(
				`${ctx.label} returned HTTP ${err.response.status} for sensor ${ctx.sensorId}`,
				{ ...details, status: err.response.status },
				err
			);
		}
		if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") {
			return networkFailure(`${ctx.label} request timed out for sensor ${ctx.sensorId}`, details, err);
		}
		return networkFailure(`${ctx.label} request failed for sensor ${ctx.sensorId}: ${err.message}`, details, err);
	}

	const message = err instanceof Error ? err.message : String(err);
	return vendorError(`${ctx.label} request failed for sensor ${ctx.sensorId}: ${message}`, details, err);
}

/**
 * Run one vendor call; the returned promise never rejects.
 */
export async function attempt(ctx: FetchContext, run: () => Promise<RawPayload>): Promise<FetchOutcome> {
	try {
		return { ok: true, payload: await run(), fromCache: false };
	} catch (err) {
		return { ok: false, failure: toFetchFailure(err, ctx) };
	}
}
