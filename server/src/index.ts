import process from "node:process";
import { Command } from "commander";

import { loadConfig, loadEnvFile } from "./shared/config";
import { configError } from "./shared/errors";
import { createLogger } from "./shared/log";
import { createRuntime } from "./runtime";

interface CliOptions {
	port?: string;
	envFile?: string;
	archiveOnce?: boolean;
	archive: boolean;
}

function parseCommandLine(argv: string[]): CliOptions {
	const program = new Command();

	program
		.name("air-sensor-hub")
		.option("-p, --port <port>", "HTTP port (overrides PORT)")
		.option("-e, --env-file <path>", "Path to a .env file")
		.option("--archive-once", "Run one archive cycle and exit")
		.option("--no-archive", "Do not start the background archiver");

	program.parse(argv);
	return program.opts<CliOptions>();
}

function waitForSignal(): Promise<string> {
	return new Promise(resolve => {
		process.once("SIGINT", () => resolve("SIGINT"));
		process.once("SIGTERM", () => resolve("SIGTERM"));
	});
}

async function main(): Promise<void> {
	const opts = parseCommandLine(process.argv);
	loadEnvFile(opts.envFile);

	const config = loadConfig();
	if (opts.port !== undefined) {
		const port = Number(opts.port);
		if (!Number.isInteger(port) || port <= 0) throw configError(`Invalid --port '${opts.port}'`);
		config.http.port = port;
	}

	const logger = createLogger({
		serviceName: "air-sensor-hub",
		level: config.log.level,
		logDir: config.log.dir
	});

	const runtime = await createRuntime(config, { log: logger, archive: opts.archive });

	if (opts.archiveOnce) {
		if (!runtime.archiver) throw configError("Archiving is not configured (ARCHIVE_ENABLED / ARCHIVE_VENDOR)");
		const results = await runtime.archiver.runCycle();
		for (const r of results) {
			logger.info("archive-once: sensor=%s status=%s rows=%s", r.sensorId, r.status, r.rows ?? "-");
		}
		await runtime.server.close();
		return;
	}

	await runtime.server.listen({ port: config.http.port, host: config.http.host });
	logger.info("Listening on http://%s:%d", config.http.host, config.http.port);
	runtime.archiver?.start();

	const signal = await waitForSignal();
	logger.info("Stopping (signal=%s)", signal);

	try {
		// Let an in-flight archive cycle finish writing before exit.
		await runtime.archiver?.stop();
	} finally {
		await runtime.server.close();
		logger.info("Stopped");
	}
}

main()
	.then(() => process.exit(0))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});
