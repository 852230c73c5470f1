import { timingSafeEqual } from "node:crypto";
import type { FastifyRequest } from "fastify";

import type { Logger } from "../log";
import { forbidden, unauthorized, type AppError } from "../errors";

function headerValue(req: FastifyRequest, name: string): string | undefined {
	const h = req.headers[name];
	const v = Array.isArray(h) ? h[0] : h;
	return typeof v === "string" && v.trim().length > 0 ? v.trim() : undefined;
}

function sameSecret(a: string, b: string): boolean {
	const ab = Buffer.from(a, "utf8");
	const bb = Buffer.from(b, "utf8");
	return ab.length === bb.length && timingSafeEqual(ab, bb);
}

/**
 * Validate the API key from request headers.
 *
 * Expected header:
 *   x-api-key: <secret>
 *
 * Without a configured key every request is allowed.
 */
export function verifyApiKey(
	req: FastifyRequest,
	expectedKey: string | undefined,
	log: Logger
): { ok: true } | { ok: false; error: AppError } {
	if (!expectedKey) return { ok: true };

	const providedKey = headerValue(req, "x-api-key");
	if (!providedKey) {
		log.info("auth: no api key");
		return { ok: false, error: unauthorized("Unauthenticated") };
	}

	if (!sameSecret(providedKey, expectedKey)) {
		log.info("auth: invalid api key");
		return { ok: false, error: forbidden("Invalid API key") };
	}

	log.debug("auth: api key accepted");
	return { ok: true };
}
