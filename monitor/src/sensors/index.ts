import { TEMPERATURE_UNIT } from "@kth-monitor/common";
import type { SensorId } from "@kth-monitor/common";

import type { SensorSpec } from "./types";

export type { SensorSpec } from "./types";
export { decodeLittleEndian, decodeSensorValue } from "./decode";

/**
 * Readable registers in the order they are polled.
 * The renderer and the CSV log rely on this order.
 */
export const KTH_SENSORS = [
	{ id: "TC1", command: 0x10, width: 2, scale: 0.1, unit: TEMPERATURE_UNIT, signed: true },
	{ id: "TC2", command: 0x11, width: 2, scale: 0.1, unit: TEMPERATURE_UNIT, signed: true },
	{ id: "VDD", command: 0x12, width: 4, scale: 1, unit: "uV", signed: true },
	{ id: "TH1", command: 0x14, width: 2, scale: 1, unit: "ADC value", signed: false },
	{ id: "TH2", command: 0x15, width: 2, scale: 1, unit: "ADC value", signed: false }
] as const satisfies readonly SensorSpec[];

// Fails to compile if a SensorId has no register
const SENSORS_BY_ID: { readonly [K in SensorId]: SensorSpec } = {
	TC1: KTH_SENSORS[0],
	TC2: KTH_SENSORS[1],
	VDD: KTH_SENSORS[2],
	TH1: KTH_SENSORS[3],
	TH2: KTH_SENSORS[4]
};

export function getSensorSpec(id: SensorId): SensorSpec {
	return SENSORS_BY_ID[id];
}
