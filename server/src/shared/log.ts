import fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

/** The part of winston the rest of the service talks to. */
export type Logger = Pick<winston.Logger, "error" | "warn" | "info" | "debug">;

export interface LoggerOptions {
	serviceName: string;
	level?: string;
	/** When set, daily rotated files are written here besides the console. */
	logDir?: string;
	console?: boolean;
	silent?: boolean;
}

function ensureDir(dir: string): void {
	fs.mkdirSync(dir, { recursive: true });
}

function getLevel(level?: string): string {
	return (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
}

export function createLogger(opts: LoggerOptions): winston.Logger {
	const level = getLevel(opts.level);

	const baseFormat = winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const ts = String(info.timestamp);
			const meta = typeof info.stack === "string" ? `\n${info.stack}` : "";
			return `${ts} [${opts.serviceName}] ${info.level}: ${String(info.message)}${meta}`;
		})
	);

	const transports: winston.transport[] = [];

	if (opts.console ?? true) {
		transports.push(
			new winston.transports.Console({
				level,
				format: baseFormat
			})
		);
	}

	if (opts.logDir) {
		ensureDir(opts.logDir);

		transports.push(
			new DailyRotateFile({
				level,
				dirname: opts.logDir,
				filename: `${opts.serviceName}.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "14d",
				zippedArchive: false
			})
		);

		transports.push(
			new DailyRotateFile({
				level: "error",
				dirname: opts.logDir,
				filename: `${opts.serviceName}.error.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "30d",
				zippedArchive: false
			})
		);
	}

	return winston.createLogger({
		level,
		format: baseFormat,
		transports,
		silent: opts.silent ?? false
	});
}

