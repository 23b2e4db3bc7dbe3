import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { Command } from "commander";
import { z } from "zod";

import { KTH_SENSORS } from "../sensors";
import { configError } from "./errors";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

export type DataBits = 5 | 6 | 7 | 8;
export type StopBits = 1 | 1.5 | 2;

export interface SerialSettings {
	path: string;
	baudRate: number;
	dataBits: DataBits;
	stopBits: StopBits;
	timeoutMs: number;
}

export interface AppConfig {
	serial: SerialSettings;

	// Print the available serial ports before connecting
	listPorts: boolean;

	csv: {
		enabled: boolean;
		path: string;
	};

	buffer: {
		maxLength: number;
	};

	// Pause between two collection cycles; 0 polls as fast as the device answers
	pollIntervalMs: number;

	// Reject responses shorter than the register width instead of decoding them
	strictReads: boolean;

	chart: {
		enabled: boolean;
		renderIntervalMs: number;
		height: number;
		width: number;
	};

	paths: {
		logDir: string;
	};

	logLevel: LogLevel;
}

interface CliOptions {
	config?: string;
	port?: string;
	listPorts?: boolean;
	csv?: boolean;
	chart?: boolean;
}

/* ---------- defaults ---------- */

const DEFAULT_SERIAL: SerialSettings = {
	path: "COM9",
	baudRate: 9600,
	dataBits: 8,
	stopBits: 1,
	timeoutMs: 1000
};

const DEFAULT_CSV_PATH = "temperature_measurements.csv";
const DEFAULT_MAX_LENGTH = 500;
const DEFAULT_POLL_INTERVAL_MS = 0;
const DEFAULT_RENDER_INTERVAL_MS = 250;
const DEFAULT_CHART_HEIGHT = 20;
const DEFAULT_CHART_WIDTH = 80;
const DEFAULT_LOG_DIR = "./logs";
const DEFAULT_LOG_LEVEL: LogLevel = "info";

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

/* ---------- config file ---------- */

const FileConfigSchema = z.object({
	serial: z
		.object({
			path: z.string(),
			baudRate: z.number(),
			dataBits: z.union([z.literal(5), z.literal(6), z.literal(7), z.literal(8)]),
			stopBits: z.union([z.literal(1), z.literal(1.5), z.literal(2)]),
			timeoutMs: z.number()
		})
		.partial()
		.optional(),
	listPorts: z.boolean().optional(),
	csv: z.object({ enabled: z.boolean(), path: z.string() }).partial().optional(),
	buffer: z.object({ maxLength: z.number() }).partial().optional(),
	pollIntervalMs: z.number().optional(),
	strictReads: z.boolean().optional(),
	chart: z
		.object({
			enabled: z.boolean(),
			renderIntervalMs: z.number(),
			height: z.number(),
			width: z.number()
		})
		.partial()
		.optional(),
	paths: z.object({ logDir: z.string() }).partial().optional(),
	logLevel: z.string().optional()
});

type FileConfig = z.infer<typeof FileConfigSchema>;

function parseCommandLine(argv: readonly string[]): CliOptions {
	const program = new Command();

	program
		.option("-c, --config <path>", "Path to configuration file")
		.option("-p, --port <path>", "Serial port of the thermometer (e.g. COM9 or /dev/ttyACM0)")
		.option("--list-ports", "List available serial ports at startup")
		.option("--no-list-ports", "Do not list serial ports at startup")
		.option("--csv", "Append readings to the CSV log")
		.option("--no-csv", "Do not write the CSV log")
		.option("--chart", "Draw the live temperature chart")
		.option("--no-chart", "Run headless, readings are only logged")
		.allowUnknownOption(true)
		.allowExcessArguments(true);

	program.parse([...argv]);

	return program.opts<CliOptions>();
}

function readConfigFile(configPath: string): FileConfig {
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(configPath, "utf8"));
	} catch (e) {
		throw configError(`Cannot read configuration file '${configPath}'`, e);
	}

	const res = FileConfigSchema.safeParse(parsed);
	if (!res.success) {
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw configError(`Invalid configuration file '${configPath}': ${issues}`);
	}

	return res.data;
}

function ensureDir(p: string): void {
	fs.mkdirSync(p, { recursive: true });
}

function envString(name: string): string | undefined {
	const value = process.env[name]?.trim();
	return value ? value : undefined;
}

/* ---------- validation ---------- */

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(l => l === value);
}

function requirePositiveInt(value: number, name: string): void {
	if (!Number.isInteger(value) || value <= 0) {
		throw configError(`config.${name} must be a positive integer`);
	}
}

function validateConfig(cfg: AppConfig): void {
	if (!cfg.serial.path.trim()) {
		throw configError("config.serial.path is required");
	}
	requirePositiveInt(cfg.serial.baudRate, "serial.baudRate");
	if (!Number.isFinite(cfg.serial.timeoutMs) || cfg.serial.timeoutMs <= 0) {
		throw configError("config.serial.timeoutMs must be a positive number");
	}

	if (!cfg.csv.path.trim()) {
		throw configError("config.csv.path is required");
	}

	requirePositiveInt(cfg.buffer.maxLength, "buffer.maxLength");
	// A smaller buffer evicts every batch it is given and never holds a reading
	if (cfg.buffer.maxLength < KTH_SENSORS.length) {
		throw configError(`config.buffer.maxLength must be at least ${KTH_SENSORS.length} (one reading per sensor)`);
	}

	if (!Number.isFinite(cfg.pollIntervalMs) || cfg.pollIntervalMs < 0) {
		throw configError("config.pollIntervalMs must be zero or a positive number");
	}

	if (!Number.isFinite(cfg.chart.renderIntervalMs) || cfg.chart.renderIntervalMs <= 0) {
		throw configError("config.chart.renderIntervalMs must be a positive number");
	}
	requirePositiveInt(cfg.chart.height, "chart.height");
	requirePositiveInt(cfg.chart.width, "chart.width");
}

/* ---------- public API ---------- */

/**
 * Resolve the runtime configuration.
 * Precedence: command line > environment (KTH_PORT, LOG_LEVEL) > config file > defaults.
 */
export function loadConfig(argv: readonly string[] = process.argv): AppConfig {
	const cli = parseCommandLine(argv);
	const file: FileConfig = cli.config ? readConfigFile(cli.config) : {};

	const logLevel = (envString("LOG_LEVEL") ?? file.logLevel ?? DEFAULT_LOG_LEVEL).toLowerCase();
	if (!isLogLevel(logLevel)) {
		throw configError(`config.logLevel must be one of: ${LOG_LEVELS.join(", ")}`);
	}

	const cfg: AppConfig = {
		serial: {
			path: cli.port ?? envString("KTH_PORT") ?? file.serial?.path ?? DEFAULT_SERIAL.path,
			baudRate: file.serial?.baudRate ?? DEFAULT_SERIAL.baudRate,
			dataBits: file.serial?.dataBits ?? DEFAULT_SERIAL.dataBits,
			stopBits: file.serial?.stopBits ?? DEFAULT_SERIAL.stopBits,
			timeoutMs: file.serial?.timeoutMs ?? DEFAULT_SERIAL.timeoutMs
		},
		listPorts: cli.listPorts ?? file.listPorts ?? true,
		csv: {
			enabled: cli.csv ?? file.csv?.enabled ?? true,
			path: file.csv?.path ?? DEFAULT_CSV_PATH
		},
		buffer: {
			maxLength: file.buffer?.maxLength ?? DEFAULT_MAX_LENGTH
		},
		pollIntervalMs: file.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
		strictReads: file.strictReads ?? false,
		chart: {
			enabled: cli.chart ?? file.chart?.enabled ?? true,
			renderIntervalMs: file.chart?.renderIntervalMs ?? DEFAULT_RENDER_INTERVAL_MS,
			height: file.chart?.height ?? DEFAULT_CHART_HEIGHT,
			width: file.chart?.width ?? DEFAULT_CHART_WIDTH
		},
		paths: {
			logDir: file.paths?.logDir ?? DEFAULT_LOG_DIR
		},
		logLevel
	};

	validateConfig(cfg);

	ensureDir(cfg.paths.logDir);
	if (cfg.csv.enabled) {
		ensureDir(path.dirname(cfg.csv.path));
	}

	return cfg;
}
