// src/shared/http/endpoint.ts
//
// Shared helpers for the HTTP routes.
//
// Handlers only parse input, call a row source and shape the response;
// auth, logging and error -> status mapping live here.

import type { FastifyReply, FastifyRequest } from "fastify";

import { describeError, toSafeErrorResponse } from "../errors";
import type { Logger } from "../log";
import { verifyApiKey } from "./auth";

export type EndpointResponse = {
	status: number;
	headers?: Record<string, string>;
	/** Serialized as JSON. */
	jsonBody?: unknown;
	/** Sent as-is. */
	body?: string;
};

export type EndpointArgs = {
	req: FastifyRequest;
	log: Logger;
};

export type EndpointHandler = (args: EndpointArgs) => Promise<EndpointResponse>;

export type EndpointOptions = {
	/** Operation name used in logs. */
	name: string;
	log: Logger;
	/** When set, requests must carry it in x-api-key. */
	apiKey?: string;
	/** Default: true */
	requireAuth?: boolean;
};

export function json(status: number, body: unknown): EndpointResponse {
	return { status, jsonBody: body };
}

async function send(reply: FastifyReply, res: EndpointResponse): Promise<FastifyReply> {
	reply.code(res.status);
	for (const [k, v] of Object.entries(res.headers ?? {})) reply.header(k, v);
	if (res.body !== undefined) return reply.send(res.body);
	return reply.send(res.jsonBody ?? null);
}

/**
 * Wrap a handler with standard concerns:
 * - API key auth (when configured)
 * - consistent error -> response mapping, no stack in the body
 */
export function httpEndpoint(handler: EndpointHandler, opts: EndpointOptions) {
	const requireAuth = opts.requireAuth ?? true;
	const { name, log } = opts;

	return async (req: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> => {
		try {
			if (requireAuth) {
				const auth = verifyApiKey(req, opts.apiKey, log);
				if (!auth.ok) {
					const safe = toSafeErrorResponse(auth.error);
					return await send(reply, json(safe.status, safe.body));
				}
			}

			return await send(reply, await handler({ req, log }));
		} catch (err) {
			const safe = toSafeErrorResponse(err);
			if (safe.status >= 500) {
				log.error(`${name}: request failed (${safe.body.code})`, describeError(err));
			} else {
				log.info(`${name}: ${safe.status} ${safe.body.error}`);
			}
			return send(reply, json(safe.status, safe.body));
		}
	};
}
