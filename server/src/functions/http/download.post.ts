import type { Row } from "@air-sensor-hub/common";

import { makeDownloadFilename, toCsv } from "../../shared/csv";
import { httpEndpoint } from "../../shared/http/endpoint";
import { resolveDataRequest } from "../../shared/http/body";
import { noDataError, resolveSource, vendorParam, type ApiContext } from "./context";

// POST /api/:vendor/download
//
// Same body as preview. Responds with an attachment named
// <vendor>_data_<YYYYMMDD_HHMMSS>.<csv|json>; x-fetch-failures counts failed windows.
export function postDownload(ctx: ApiContext) {
	return httpEndpoint(
		async ({ req, log }) => {
			const source = resolveSource(ctx, vendorParam(req.params));
			const now = ctx.now?.() ?? new Date();
			const request = resolveDataRequest(req.body, {
				now,
				defaultRangeHours: ctx.defaultRangeHours,
				available: source.sensors()
			});

			const { rowSet, failures } = await source.collect(request.sensors, request.window);
			if (rowSet.rows.length === 0) throw noDataError(failures);

			const filename = makeDownloadFilename(source.vendor, now, request.format);
			log.info(`download.post: ${filename} rows=${rowSet.rows.length} failures=${failures.length}`);

			const headers = {
				"content-disposition": `attachment; filename="${filename}"`,
				"x-fetch-failures": String(failures.length)
			};

			if (request.format === "json") {
				return {
					status: 200,
					headers: { ...headers, "content-type": "application/json; charset=utf-8" },
					body: JSON.stringify(rowSet.rows)
				};
			}

			const columns = rowSet.columns.map(c => ({ header: c, accessor: (r: Row) => r[c] }));
			return {
				status: 200,
				headers: { ...headers, "content-type": "text/csv; charset=utf-8" },
				body: toCsv(rowSet.rows, columns)
			};
		},
		{ name: "download.post", log: ctx.log, apiKey: ctx.apiKey }
	);
}
