import fs from "node:fs";
import path from "node:path";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

import type { LogLevel } from "./config";

export interface LoggerOptions {
	serviceName: string;
	// No file transports when omitted
	logDir?: string;
	level?: LogLevel;
	console?: boolean;
	rotate?: boolean;
}

function getLevel(level?: string): string {
	return (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
}

function fileTransports(logDir: string, serviceName: string, level: string, rotate: boolean): winston.transport[] {
	fs.mkdirSync(logDir, { recursive: true });

	if (rotate) {
		return [
			new DailyRotateFile({
				level,
				dirname: logDir,
				filename: `${serviceName}.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "14d",
				zippedArchive: false
			}),
			new DailyRotateFile({
				level: "error",
				dirname: logDir,
				filename: `${serviceName}.error.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "30d",
				zippedArchive: false
			})
		];
	}

	return [
		new winston.transports.File({ level, filename: path.join(logDir, `${serviceName}.log`) }),
		new winston.transports.File({ level: "error", filename: path.join(logDir, `${serviceName}.error.log`) })
	];
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

	// Dropped with detachConsole once the live chart owns the terminal
	if (opts.console ?? true) {
		transports.push(new winston.transports.Console({ level, format: baseFormat }));
	}

	if (opts.logDir) {
		transports.push(...fileTransports(opts.logDir, opts.serviceName, level, opts.rotate ?? true));
	}

	return winston.createLogger({
		level,
		format: baseFormat,
		// winston complains about writing to a logger without transports
		silent: transports.length === 0,
		transports
	});
}

/**
 * Stop writing to the terminal, e.g. once the live chart owns it.
 * Other transports keep logging.
 */
export function detachConsole(logger: winston.Logger): void {
	for (const t of logger.transports.filter(t => t instanceof winston.transports.Console)) {
		logger.remove(t);
	}
	if (logger.transports.length === 0) {
		logger.silent = true;
	}
}
