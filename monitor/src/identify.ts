import type winston from "winston";

import { identificationError } from "./lib/errors";
import { withConnection } from "./lib/serial";
import type { SerialTransport } from "./lib/serial";

// Identification queries sent once at startup
export const QUERY_WELCOME = 0x00;
export const QUERY_DEVICE_ID = 0x01;
export const QUERY_UNIQUE_ID = 0x02;
export const QUERY_FIRMWARE = 0x03;

// Upper bound for a query response; the read normally ends on the timeout
export const QUERY_RESPONSE_MAX = 100;

// Device ID reported by a KTH-USB
export const KTH_DEVICE_ID = Buffer.from([0x0d, 0xee]);

export interface DeviceIdentity {
	welcome: string;
	deviceId: Buffer;
	uniqueId: Buffer;
	firmware: Buffer;
}

export function toHex(bytes: Uint8Array): string {
	return Buffer.from(bytes).toString("hex");
}

async function query(transport: SerialTransport, command: number): Promise<Buffer> {
	return withConnection(transport, conn => conn.exchange(command, QUERY_RESPONSE_MAX));
}

/**
 * Run the startup handshake. Every query uses its own connection.
 * Throws IDENTIFICATION_ERROR if the attached device is not a KTH.
 */
export async function identifyDevice(transport: SerialTransport, logger: winston.Logger): Promise<DeviceIdentity> {
	const welcome = await query(transport, QUERY_WELCOME);
	logger.info("Welcome message: %s", welcome.toString("latin1").trim());

	const deviceId = await query(transport, QUERY_DEVICE_ID);
	logger.info("Device ID: 0x%s", toHex(deviceId));
	if (!deviceId.equals(KTH_DEVICE_ID)) {
		throw identificationError(
			`Unexpected device ID 0x${toHex(deviceId)} (expected 0x${toHex(KTH_DEVICE_ID)}); is a KTH-USB attached?`,
			{ deviceId: toHex(deviceId) }
		);
	}

	const uniqueId = await query(transport, QUERY_UNIQUE_ID);
	logger.info("Unique ID: 0x%s", toHex(uniqueId));

	const firmware = await query(transport, QUERY_FIRMWARE);
	logger.info("Firmware version: 0x%s", toHex(firmware));

	return {
		welcome: welcome.toString("latin1").trim(),
		deviceId,
		uniqueId,
		firmware
	};
}
