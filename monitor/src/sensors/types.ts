import type { SensorId } from "@kth-monitor/common";

/**
 * SensorSpec describes one readable register of the KTH thermometer.
 * - command: single byte selecting the register
 * - width: response length in bytes (little-endian integer)
 * - scale: multiplier applied to the decoded integer
 * - unit: label stored with every reading
 * - signed: two's complement decoding
 */
export interface SensorSpec {
	readonly id: SensorId;
	readonly command: number;
	readonly width: number;
	readonly scale: number;
	readonly unit: string;
	readonly signed: boolean;
}
