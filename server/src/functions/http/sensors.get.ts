import type { SensorListing } from "@air-sensor-hub/common";

import { httpEndpoint, json } from "../../shared/http/endpoint";
import { resolveSource, vendorParam, type ApiContext } from "./context";

// GET /api/:vendor/sensors
//
// [{ id, name }] from the vendor directory where it has one, else configuration.
export function getSensors(ctx: ApiContext) {
	return httpEndpoint(
		async ({ req, log }) => {
			const source = resolveSource(ctx, vendorParam(req.params));
			const sensors = await source.listSensors();

			log.debug(`sensors.get: ${source.vendor} -> ${sensors.length}`);
			const body: SensorListing[] = sensors.map(s => ({ id: s.id, name: s.displayName }));
			return json(200, body);
		},
		{ name: "sensors.get", log: ctx.log, apiKey: ctx.apiKey }
	);
}
