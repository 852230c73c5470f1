import type { VendorName } from "@air-sensor-hub/common";

import type { VendorsConfig } from "../shared/config";
import { createAirGradientClient } from "./airgradient";
import { createAirVisualClient } from "./airvisual";
import { createAurassureClient } from "./aurassure";
import { createCraftedClimateClient } from "./crafted-climate";
import { createEcomeasureClient } from "./ecomeasure";
import { createEnviraClient } from "./envira";
import { createNeboClient } from "./nebo";
import type { VendorClient, VendorDeps } from "./types";

export type { FetchOutcome, RawPayload, VendorClient, VendorDeps } from "./types";

/**
 * Build a client for every vendor whose configuration is present.
 * Vendors missing from the map are disabled.
 */
export function createVendorClients(cfg: VendorsConfig, deps: VendorDeps): Map<VendorName, VendorClient> {
	const clients: VendorClient[] = [];

	if (cfg.aurassure) clients.push(createAurassureClient(cfg.aurassure, deps));
	if (cfg.airgradient) clients.push(createAirGradientClient(cfg.airgradient, deps));
	if (cfg.airvisual) clients.push(createAirVisualClient(cfg.airvisual, deps));
	if (cfg.craftedClimate) clients.push(createCraftedClimateClient(cfg.craftedClimate, deps));
	if (cfg.ecomeasure) clients.push(createEcomeasureClient(cfg.ecomeasure, deps));
	if (cfg.envira) clients.push(createEnviraClient(cfg.envira, deps));
	if (cfg.nebo) clients.push(createNeboClient(cfg.nebo, deps));

	return new Map(clients.map(c => [c.vendor, c]));
}
