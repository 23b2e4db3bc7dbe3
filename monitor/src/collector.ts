import type winston from "winston";
import { createReading } from "@kth-monitor/common";
import type { Reading } from "@kth-monitor/common";

import { shortReadError } from "./lib/errors";
import { withConnection } from "./lib/serial";
import type { SerialTransport } from "./lib/serial";
import { KTH_SENSORS, decodeSensorValue } from "./sensors";
import type { SensorSpec } from "./sensors";

export interface CollectorOptions {
	logger: winston.Logger;
	strictReads?: boolean;
	sensors?: readonly SensorSpec[];
	now?: () => Date;
}

/**
 * Reads every register once per cycle, in table order.
 * Each register gets its own connection; a failure aborts the whole cycle.
 */
export class ReadingCollector {
	private readonly logger: winston.Logger;
	private readonly strictReads: boolean;
	private readonly sensors: readonly SensorSpec[];
	private readonly now: () => Date;

	constructor(
		private readonly transport: SerialTransport,
		opts: CollectorOptions
	) {
		this.logger = opts.logger;
		this.strictReads = opts.strictReads ?? false;
		this.sensors = opts.sensors ?? KTH_SENSORS;
		this.now = opts.now ?? (() => new Date());
	}

	async collect(): Promise<Reading[]> {
		const batch: Reading[] = [];

		for (const spec of this.sensors) {
			batch.push(await this.readSensor(spec));
		}

		this.logger.debug("Collected %d readings", batch.length);
		return batch;
	}

	async readSensor(spec: SensorSpec): Promise<Reading> {
		const timestamp = this.now();
		const bytes = await withConnection(this.transport, conn => conn.exchange(spec.command, spec.width));

		if (bytes.length < spec.width) {
			if (this.strictReads) {
				throw shortReadError(`${spec.id}: expected ${spec.width} bytes, got ${bytes.length}`, {
					sensorId: spec.id,
					received: bytes.toString("hex")
				});
			}
			this.logger.warn("Short read for %s: expected %d bytes, got %d", spec.id, spec.width, bytes.length);
		}

		const reading = createReading({
			timestamp,
			sensorId: spec.id,
			unit: spec.unit,
			value: decodeSensorValue(spec, bytes)
		});

		this.logger.debug("Read %s = %s %s", reading.sensorId, String(reading.value), reading.unit);
		return reading;
	}
}
