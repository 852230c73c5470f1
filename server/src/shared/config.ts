import { config as loadDotenv } from "dotenv";

import { configError } from "./errors";

export type Env = Record<string, string | undefined>;

export interface SensorEntry {
	id: string;
	name: string;
}

export interface HttpConfig {
	port: number;
	host: string;
	/** Empty: any origin. */
	corsOrigins: string[];
	/** When set, /api/* (except health) requires x-api-key. */
	apiKey?: string;
}

export interface FetchConfig {
	concurrency: number;
	timeoutMs: number;
	defaultRangeHours: number;
}

export interface LogConfig {
	level: string;
	dir?: string;
}

export interface AurassureConfig {
	baseUrl: string;
	accessId: string;
	accessKey: string;
	clientId: string;
	applicationId: string;
	things: SensorEntry[];
	parameters: string[];
}

export interface AirGradientConfig {
	baseUrl: string;
	token: string;
	locations: SensorEntry[];
}

export interface AirVisualDevice extends SensorEntry {
	url: string;
}

export interface AirVisualConfig {
	devices: AirVisualDevice[];
	/** Opt-in: serve the last good payload when the live call fails. */
	cacheDir?: string;
}

export interface CraftedClimateConfig {
	baseUrl: string;
	apiKey: string;
	auids: SensorEntry[];
}

export interface EcomeasureConfig {
	baseUrl: string;
	token: string;
	sensors: SensorEntry[];
	pageSize: number;
}

export interface EnviraConfig {
	baseUrl: string;
	devices: SensorEntry[];
}

export interface NeboConfig {
	baseUrl: string;
	token: string;
	code: string;
	sensors: SensorEntry[];
}

/** A vendor is disabled when its section is undefined. */
export interface VendorsConfig {
	aurassure?: AurassureConfig;
	airgradient?: AirGradientConfig;
	airvisual?: AirVisualConfig;
	craftedClimate?: CraftedClimateConfig;
	ecomeasure?: EcomeasureConfig;
	envira?: EnviraConfig;
	nebo?: NeboConfig;
}

export interface BlobArchiveConfig {
	connectionString: string;
	container: string;
	prefix: string;
}

export interface ArchiveConfig {
	enabled: boolean;
	vendor: string;
	intervalMs: number;
	lookbackMs: number;
	localDir: string;
	blob?: BlobArchiveConfig;
}

export interface AppConfig {
	http: HttpConfig;
	fetch: FetchConfig;
	log: LogConfig;
	vendors: VendorsConfig;
	archive: ArchiveConfig;
}

/** Load a .env file into process.env (no-op when the file is missing). */
export function loadEnvFile(path?: string): void {
	loadDotenv(path ? { path } : undefined);
}

function readEnv(env: Env, name: string): string | undefined {
	const value = env[name];
	if (value === undefined || value.trim() === "") return undefined;
	return value.trim();
}

function requireEnv(env: Env, name: string): string {
	const value = readEnv(env, name);
	if (value === undefined) {
		throw configError(`Missing required environment variable: ${name}`);
	}
	return value;
}

function optionalNumberEnv(env: Env, name: string, def: number): number {
	const raw = readEnv(env, name);
	if (raw === undefined) return def;
	const n = Number(raw);
	if (!Number.isFinite(n) || n <= 0) {
		throw configError(`Environment variable ${name} must be a positive number`);
	}
	return n;
}

function optionalStringEnv(env: Env, name: string, def: string): string {
	return readEnv(env, name) ?? def;
}

function optionalBooleanEnv(env: Env, name: string, def: boolean): boolean {
	const value = readEnv(env, name);
	if (value === undefined) return def;
	const lower = value.toLowerCase();
	if (lower === "true") return true;
	if (lower === "false") return false;
	throw configError(`Environment variable ${name} must be "true" or "false"`);
}

function optionalListEnv(env: Env, name: string, def: readonly string[] = []): string[] {
	const value = readEnv(env, name);
	if (value === undefined) return [...def];
	return value
		.split(",")
		.map(s => s.trim())
		.filter(s => s.length > 0);
}

/**
 * Parse "id=Display name,id2=Other" pairs. A bare "id" uses `fallbackName(id)`.
 */
function optionalMapEnv(
	env: Env,
	name: string,
	fallbackName: (id: string) => string,
	def: readonly SensorEntry[] = []
): SensorEntry[] {
	const items = optionalListEnv(env, name);
	if (items.length === 0) return def.map(e => ({ ...e }));

	return items.map(item => {
		const eq = item.indexOf("=");
		if (eq === -1) return { id: item, name: fallbackName(item) };
		const id = item.slice(0, eq).trim();
		const label = item.slice(eq + 1).trim();
		if (!id) throw configError(`Environment variable ${name} has an entry without an id: "${item}"`);
		return { id, name: label || fallbackName(id) };
	});
}

/* ---------- vendors ---------- */

const DEFAULT_AURASSURE_THINGS: SensorEntry[] = [
	{ id: "23883", name: "Sensor 1" },
	{ id: "23884", name: "Sensor 2" },
	{ id: "23885", name: "Sensor 3" }
];

const DEFAULT_AIRGRADIENT_LOCATIONS: SensorEntry[] = [
	{ id: "170379", name: "AirGradient Sensor 1" },
	{ id: "170380", name: "AirGradient Sensor 2" },
	{ id: "170381", name: "AirGradient Sensor 3" }
];

const DEFAULT_ECOMEASURE_SENSORS: SensorEntry[] = [
	{ id: "20053", name: "Ecomeasure Sensor 20053" },
	{ id: "20055", name: "Ecomeasure Sensor 20055" },
	{ id: "20054", name: "Ecomeasure Sensor 20054" }
];

function loadAurassure(env: Env): AurassureConfig | undefined {
	const accessId = readEnv(env, "AURASSURE_ACCESS_ID");
	const accessKey = readEnv(env, "AURASSURE_ACCESS_KEY");
	if (!accessId || !accessKey) return undefined;

	return {
		baseUrl: optionalStringEnv(env, "AURASSURE_BASE_URL", "https://app.aurassure.com/-/api/iot-platform/v1.1.0"),
		accessId,
		accessKey,
		clientId: optionalStringEnv(env, "AURASSURE_CLIENT_ID", "17067"),
		applicationId: optionalStringEnv(env, "AURASSURE_APPLICATION_ID", "16"),
		things: optionalMapEnv(env, "AURASSURE_THINGS", id => `Sensor ${id}`, DEFAULT_AURASSURE_THINGS),
		parameters: optionalListEnv(env, "AURASSURE_PARAMETERS", ["temp", "humid", "pm1", "pm2.5", "no2", "o3", "co"])
	};
}

function loadAirGradient(env: Env): AirGradientConfig | undefined {
	const token = readEnv(env, "AIRGRADIENT_API_TOKEN") ?? readEnv(env, "AIRGRADIENT_API_KEY");
	if (!token) return undefined;

	return {
		baseUrl: optionalStringEnv(env, "AIRGRADIENT_BASE_URL", "https://api.airgradient.com/public/api/v1"),
		token,
		locations: optionalMapEnv(
			env,
			"AIRGRADIENT_LOCATIONS",
			id => `AirGradient ${id}`,
			DEFAULT_AIRGRADIENT_LOCATIONS
		)
	};
}

function loadAirVisual(env: Env): AirVisualConfig | undefined {
	// AIRVISUAL_DEVICES is "CODE=https://device.iqair.com/v2/<id>,..."
	const entries = optionalMapEnv(env, "AIRVISUAL_DEVICES", () => "");
	if (entries.length === 0) return undefined;

	const devices = entries.map(e => {
		if (!/^https?:\/\//.test(e.name)) {
			throw configError(`AIRVISUAL_DEVICES entry "${e.id}" must map to a device URL`);
		}
		return { id: e.id, name: `AirVisual ${e.id}`, url: e.name };
	});

	return {
		devices,
		cacheDir: readEnv(env, "AIRVISUAL_CACHE_DIR")
	};
}

function loadCraftedClimate(env: Env): CraftedClimateConfig | undefined {
	const apiKey = readEnv(env, "CRAFTED_CLIMATE_API_KEY");
	const auids = optionalMapEnv(env, "CRAFTED_CLIMATE_AUIDS", id => `Crafted Climate Sensor (${id})`);
	if (!apiKey || auids.length === 0) return undefined;

	return {
		baseUrl: optionalStringEnv(env, "CRAFTED_CLIMATE_BASE_URL", "https://cctelemetry-dev.azurewebsites.net"),
		apiKey,
		auids
	};
}

function loadEcomeasure(env: Env): EcomeasureConfig | undefined {
	const token = readEnv(env, "ECOMEASURE_TOKEN");
	if (!token) return undefined;

	return {
		baseUrl: optionalStringEnv(env, "ECOMEASURE_BASE_URL", "https://airlab-ws.i-comesure.com/api"),
		token,
		sensors: optionalMapEnv(
			env,
			"ECOMEASURE_SENSOR_IDS",
			id => `Ecomeasure Sensor ${id}`,
			DEFAULT_ECOMEASURE_SENSORS
		),
		pageSize: optionalNumberEnv(env, "ECOMEASURE_PAGE_SIZE", 500)
	};
}

function loadEnvira(env: Env): EnviraConfig | undefined {
	// ENVIRA_DEVICES is "device_1=<uuid>,..."; the uuid is the sensor id.
	const entries = optionalMapEnv(env, "ENVIRA_DEVICES", () => "");
	if (entries.length === 0) return undefined;

	return {
		baseUrl: optionalStringEnv(env, "ENVIRA_BASE_URL", "https://airlab.enviraiot.es/api/device"),
		devices: entries.map(e => {
			if (!e.name) throw configError(`ENVIRA_DEVICES entry "${e.id}" must be name=uuid`);
			return { id: e.name, name: `Envira ${titleCase(e.id)}` };
		})
	};
}

function loadNebo(env: Env): NeboConfig | undefined {
	const token = readEnv(env, "NEBO_TOKEN");
	const code = readEnv(env, "NEBO_CODE");
	const sensors = optionalMapEnv(env, "NEBO_SENSORS", slug => `Nebo Sensor ${slug.slice(0, 8)}`);
	if (!token || !code || sensors.length === 0) return undefined;

	return {
		baseUrl: optionalStringEnv(env, "NEBO_BASE_URL", "https://nebo.live/api/v2"),
		token,
		code,
		sensors
	};
}

function titleCase(s: string): string {
	return s
		.split(/[_\s]+/)
		.filter(Boolean)
		.map(w => w.charAt(0).toUpperCase() + w.slice(1))
		.join(" ");
}

/* ---------- archive ---------- */

function loadArchive(env: Env): ArchiveConfig {
	const connectionString = readEnv(env, "ARCHIVE_BLOB_CONNECTION_STRING");
	const blob = connectionString
		? {
			connectionString,
			container: requireEnv(env, "ARCHIVE_BLOB_CONTAINER"),
			prefix: optionalStringEnv(env, "ARCHIVE_BLOB_PREFIX", "archive")
		}
		: undefined;

	return {
		enabled: optionalBooleanEnv(env, "ARCHIVE_ENABLED", true),
		vendor: optionalStringEnv(env, "ARCHIVE_VENDOR", "nebo"),
		intervalMs: optionalNumberEnv(env, "ARCHIVE_INTERVAL_MS", 2 * 60 * 1000),
		lookbackMs: optionalNumberEnv(env, "ARCHIVE_LOOKBACK_MS", 60 * 60 * 1000),
		localDir: optionalStringEnv(env, "ARCHIVE_LOCAL_DIR", "./data/archive"),
		blob
	};
}

/* ---------- public API ---------- */

export function loadConfig(env: Env = process.env): AppConfig {
	return {
		http: {
			port: optionalNumberEnv(env, "PORT", 5000),
			host: optionalStringEnv(env, "HOST", "0.0.0.0"),
			corsOrigins: optionalListEnv(env, "CORS_ORIGINS"),
			apiKey: readEnv(env, "HTTP_API_KEY")
		},
		fetch: {
			concurrency: optionalNumberEnv(env, "FETCH_CONCURRENCY", 4),
			timeoutMs: optionalNumberEnv(env, "VENDOR_TIMEOUT_MS", 30_000),
			defaultRangeHours: optionalNumberEnv(env, "DEFAULT_RANGE_HOURS", 48)
		},
		log: {
			level: optionalStringEnv(env, "LOG_LEVEL", "info").toLowerCase(),
			dir: readEnv(env, "LOG_DIR")
		},
		vendors: {
			aurassure: loadAurassure(env),
			airgradient: loadAirGradient(env),
			airvisual: loadAirVisual(env),
			craftedClimate: loadCraftedClimate(env),
			ecomeasure: loadEcomeasure(env),
			envira: loadEnvira(env),
			nebo: loadNebo(env)
		},
		archive: loadArchive(env)
	};
}
