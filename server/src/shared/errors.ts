export type ErrorCode =
	| "NETWORK_FAILURE"
	| "VENDOR_ERROR"
	| "PARSE_ERROR"
	| "CONFIG_ERROR"
	| "PERSISTENCE_ERROR"
	| "VALIDATION_ERROR"
	| "NOT_FOUND"
	| "UNAUTHORIZED"
	| "FORBIDDEN"
	| "BAD_REQUEST"
	| "INTERNAL_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly status: number;
	public readonly details?: Record<string, unknown>;

	constructor(params: {
		code: ErrorCode;
		message: string;
		status: number;
		details?: Record<string, unknown>;
		cause?: unknown;
	}) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AppError";
		this.code = params.code;
		this.status = params.status;
		this.details = params.details;
	}

	/** Same failure, with extra context merged into `details`. */
	withDetails(details: Record<string, unknown>): AppError {
		return new AppError({
			code: this.code,
			status: this.status,
			message: this.message,
			details: { ...this.details, ...details },
			cause: this.cause
		});
	}
}

export function isAppError(err: unknown): err is AppError {
	return err instanceof AppError;
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			status: 500,
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		status: 500,
		message: "Unknown error",
		details: { value: String(err) }
	});
}

export function networkFailure(message: string, details?: Record<string, unknown>, cause?: unknown): AppError {
	return new AppError({ code: "NETWORK_FAILURE", status: 504, message, details, cause });
}

export function vendorError(message: string, details?: Record<string, unknown>, cause?: unknown): AppError {
	return new AppError({ code: "VENDOR_ERROR", status: 502, message, details, cause });
}

export function parseError(message: string, details?: Record<string, unknown>, cause?: unknown): AppError {
	return new AppError({ code: "PARSE_ERROR", status: 502, message, details, cause });
}

export function configError(message: string, details?: Record<string, unknown>): AppError {
	return new AppError({ code: "CONFIG_ERROR", status: 503, message, details });
}

export function persistenceError(message: string, details?: Record<string, unknown>, cause?: unknown): AppError {
	return new AppError({ code: "PERSISTENCE_ERROR", status: 500, message, details, cause });
}

export function badRequest(message: string, details?: Record<string, unknown>): AppError {
	return new AppError({ code: "BAD_REQUEST", status: 400, message, details });
}

export function unauthorized(message = "Unauthorized"): AppError {
	return new AppError({ code: "UNAUTHORIZED", status: 401, message });
}

export function forbidden(message = "Forbidden"): AppError {
	return new AppError({ code: "FORBIDDEN", status: 403, message });
}

export function notFound(message = "Not found"): AppError {
	return new AppError({ code: "NOT_FOUND", status: 404, message });
}

export function toSafeErrorResponse(err: unknown): { status: number; body: { error: string; code: ErrorCode } } {
	const e = asAppError(err);

	// No stack or details: those stay in the server log.
	return {
		status: e.status,
		body: {
			error: e.status >= 500 && e.code === "INTERNAL_ERROR" ? "Internal server error" : e.message,
			code: e.code
		}
	};
}

/** Flatten an error into something winston can print. */
export function describeError(err: unknown): Record<string, unknown> {
	if (err instanceof AppError) {
		return {
			name: err.name,
			code: err.code,
			message: err.message,
			details: err.details,
			cause: err.cause instanceof Error ? err.cause.message : err.cause,
			stack: err.stack
		};
	}
	if (err instanceof Error) {
		return { name: err.name, message: err.message, stack: err.stack };
	}
	return { err: String(err) };
}
