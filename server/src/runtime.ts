import type { FastifyInstance } from "fastify";
import type { AxiosInstance } from "axios";
import { isVendorName, type VendorName } from "@air-sensor-hub/common";

import type { AppConfig } from "./shared/config";
import type { Logger } from "./shared/log";
import { createHttpClient } from "./lib/http";
import type { FetchOptions } from "./lib/orchestrator";
import { createVendorClients, type VendorClient } from "./vendors";
import { Archiver } from "./archive/archiver";
import { createBlobArchiveStore } from "./archive/blob-store";
import { LayeredArchiveStore, LocalArchiveStore, type ArchiveStore } from "./archive/store";
import { createArchiveRowSource } from "./sources/archive";
import { createLiveRowSource } from "./sources/live";
import type { RowSource } from "./sources/types";
import { buildServer } from "./server";

export interface RuntimeDeps {
	log: Logger;
	/** Defaults to an axios instance with the configured timeout. */
	http?: AxiosInstance;
	/** Defaults to local files, layered under blob storage when configured. */
	store?: ArchiveStore;
	now?: () => Date;
	/** false: never build the archiver (--no-archive). */
	archive?: boolean;
}

export interface Runtime {
	clients: Map<VendorName, VendorClient>;
	sources: Map<VendorName, RowSource>;
	store: ArchiveStore;
	archiver?: Archiver;
	server: FastifyInstance;
}

export function createArchiveStore(cfg: AppConfig["archive"], log: Logger): ArchiveStore {
	const local = new LocalArchiveStore(cfg.localDir);
	if (!cfg.blob) return local;
	return new LayeredArchiveStore(createBlobArchiveStore(cfg.blob), local, log);
}

/**
 * Wire clients, sources, the archiver and the HTTP server from one config.
 * Nothing is started here.
 */
export async function createRuntime(config: AppConfig, deps: RuntimeDeps): Promise<Runtime> {
	const { log } = deps;
	const http = deps.http ?? createHttpClient({ timeoutMs: config.fetch.timeoutMs });
	const clients = createVendorClients(config.vendors, { http, log, now: deps.now });
	const store = deps.store ?? createArchiveStore(config.archive, log);
	const fetchOptions: FetchOptions = { concurrency: config.fetch.concurrency, log };

	let archiver: Archiver | undefined;
	if (config.archive.enabled && deps.archive !== false) {
		const vendor = config.archive.vendor;
		const client = isVendorName(vendor) ? clients.get(vendor) : undefined;
		if (client) {
			archiver = new Archiver({
				client,
				store,
				log,
				intervalMs: config.archive.intervalMs,
				lookbackMs: config.archive.lookbackMs,
				concurrency: config.fetch.concurrency,
				now: deps.now
			});
		} else {
			log.warn(`archive: vendor '${vendor}' is not configured; archiving disabled`);
		}
	}

	const sources = new Map<VendorName, RowSource>();
	for (const [vendor, client] of clients) {
		// The archived vendor only reports its latest minute live; history comes from the archive.
		const source = archiver && archiver.vendor === vendor
			? createArchiveRowSource(client, store, log)
			: createLiveRowSource(client, fetchOptions);
		sources.set(vendor, source);
	}

	log.info(`vendors enabled: ${[...clients.keys()].join(", ") || "none"}`);

	const server = await buildServer(
		{
			sources,
			defaultRangeHours: config.fetch.defaultRangeHours,
			log,
			apiKey: config.http.apiKey,
			now: deps.now,
			archiveStatus: () => ({ running: archiver?.running ?? false, lastCycleAt: archiver?.lastCycleAt })
		},
		{ corsOrigins: config.http.corsOrigins }
	);

	return { clients, sources, store, archiver, server };
}
