import { VENDORS } from "@air-sensor-hub/common";

import { httpEndpoint, json } from "../../shared/http/endpoint";
import type { ApiContext } from "./context";

// GET /api/health
//
// Always public. Reports which vendors are configured and the archive state.
export function getHealth(ctx: ApiContext) {
	return httpEndpoint(
		async () => {
			const vendors: Record<string, boolean> = {};
			for (const v of VENDORS) vendors[v] = ctx.sources.has(v);

			const archive = ctx.archiveStatus?.();
			return json(200, {
				status: "ok",
				vendors,
				archive: {
					running: archive?.running ?? false,
					lastCycleAt: archive?.lastCycleAt?.toISOString() ?? null
				}
			});
		},
		{ name: "health.get", log: ctx.log, requireAuth: false }
	);
}
