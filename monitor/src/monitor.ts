import type winston from "winston";
import { isTemperature } from "@kth-monitor/common";
import type { Reading } from "@kth-monitor/common";

import { ReadingCollector } from "./collector";
import { identifyDevice } from "./identify";
import { ReadingBuffer } from "./lib/buffer";
import type { ChartRenderer } from "./lib/chart";
import type { AppConfig } from "./lib/config";
import { CsvLog } from "./lib/csv-log";
import { startPolling } from "./lib/poller";
import { listPorts } from "./lib/serial";
import type { SerialTransport } from "./lib/serial";

export interface MonitorContext {
	config: AppConfig;
	logger: winston.Logger;
	transport: SerialTransport;
	renderer?: ChartRenderer;
	// Called once, right before the first frame takes over the terminal
	detachConsole?: () => void;
}

export interface MonitorHandle {
	readonly buffer: ReadingBuffer;
	readonly done: Promise<void>;
	stop(): void;
}

export async function printPorts(logger: winston.Logger): Promise<void> {
	const ports = await listPorts();
	logger.info("Serial ports found: %d", ports.length);
	for (const p of ports) {
		logger.info("  %s %s", p.path, p.manufacturer ?? "");
	}
}

function logBatch(logger: winston.Logger, batch: readonly Reading[]): void {
	logger.info(batch.map(r => `${r.sensorId}=${r.value}${isTemperature(r) ? "C" : ` ${r.unit}`}`).join(" "));
}

/**
 * Handshake, first batch, then poll and redraw until stopped.
 * The returned `done` rejects with the first fatal error.
 */
export async function startMonitor(ctx: MonitorContext): Promise<MonitorHandle> {
	const { config, logger, transport, renderer } = ctx;

	await identifyDevice(transport, logger);

	const collector = new ReadingCollector(transport, { logger, strictReads: config.strictReads });
	const csvLog = config.csv.enabled ? new CsvLog(config.csv.path) : null;
	const buffer = new ReadingBuffer(config.buffer.maxLength);

	// The log is written before the buffer so every buffered reading is on disk
	const publish = async (batch: Reading[]): Promise<void> => {
		await csvLog?.append(batch);
		buffer.ingest(batch);
		logBatch(logger, batch);
	};

	await publish(await collector.collect());
	if (csvLog) {
		logger.info("Appending readings to %s", csvLog.filePath);
	}

	if (renderer) {
		ctx.detachConsole?.();
		renderer.render(buffer.snapshot());
	}
	const redraw = renderer
		? setInterval(() => renderer.render(buffer.snapshot()), config.chart.renderIntervalMs)
		: undefined;

	const poller = startPolling({
		intervalMs: config.pollIntervalMs,
		collect: () => collector.collect(),
		onBatch: publish,
		logger
	});

	const done = poller.done.finally(() => {
		if (redraw) clearInterval(redraw);
	});

	return {
		buffer,
		done,
		stop: () => poller.stop()
	};
}
