import { httpEndpoint, json } from "../../shared/http/endpoint";
import { resolveDataRequest } from "../../shared/http/body";
import { failureView, noDataError, resolveSource, vendorParam, type ApiContext } from "./context";

export const PREVIEW_ROWS = 10;

// POST /api/:vendor/preview
//
// Body: { sensors: "all" | [ids], start_time?, end_time?, format? }
// Returns the first rows (by timestamp) plus totals and any per-window failures.
export function postPreview(ctx: ApiContext) {
	return httpEndpoint(
		async ({ req, log }) => {
			const source = resolveSource(ctx, vendorParam(req.params));
			const now = ctx.now?.() ?? new Date();
			const request = resolveDataRequest(req.body, {
				now,
				defaultRangeHours: ctx.defaultRangeHours,
				available: source.sensors()
			});

			log.debug(`preview.post: ${source.vendor} sensors=${request.sensors.map(s => s.id).join(",")}`);
			const { rowSet, failures, fromCache } = await source.collect(request.sensors, request.window);
			if (rowSet.rows.length === 0) throw noDataError(failures);

			return json(200, {
				preview: rowSet.rows.slice(0, PREVIEW_ROWS),
				total_rows: rowSet.rows.length,
				columns: rowSet.columns,
				failures: failures.map(failureView),
				from_cache: fromCache
			});
		},
		{ name: "preview.post", log: ctx.log, apiKey: ctx.apiKey }
	);
}
