import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";

import { describeError } from "./shared/errors";
import type { ApiContext } from "./functions/http/context";
import { getHealth } from "./functions/http/health.get";
import { getSensors } from "./functions/http/sensors.get";
import { postPreview } from "./functions/http/preview.post";
import { postDownload } from "./functions/http/download.post";

export interface BuildServerOptions {
	/** Empty: any origin. */
	corsOrigins?: readonly string[];
	bodyLimit?: number;
}

export async function buildServer(ctx: ApiContext, opts: BuildServerOptions = {}): Promise<FastifyInstance> {
	const app = Fastify({
		// Requests are logged through winston by the endpoints.
		logger: false,
		bodyLimit: opts.bodyLimit ?? 1_048_576
	});

	const origins = opts.corsOrigins ?? [];
	await app.register(cors, {
		origin: origins.length > 0 ? [...origins] : true,
		exposedHeaders: ["content-disposition", "x-fetch-failures"]
	});

	app.get("/api/health", getHealth(ctx));
	app.get("/api/:vendor/sensors", getSensors(ctx));
	app.post("/api/:vendor/preview", postPreview(ctx));
	app.post("/api/:vendor/download", postDownload(ctx));

	app.setNotFoundHandler((req, reply) =>
		reply.code(404).send({ error: `Route ${req.method} ${req.url} not found`, code: "NOT_FOUND" })
	);

	// Errors raised before a handler runs (body parsing, size limit).
	app.setErrorHandler((err, _req, reply) => {
		const status = err.statusCode && err.statusCode >= 400 ? err.statusCode : 500;
		if (status >= 500) ctx.log.error(`http: ${err.message}`, describeError(err));
		return reply.code(status).send({
			error: status >= 500 ? "Internal server error" : err.message,
			code: status >= 500 ? "INTERNAL_ERROR" : "BAD_REQUEST"
		});
	});

	return app;
}
