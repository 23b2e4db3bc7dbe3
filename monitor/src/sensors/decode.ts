import type { SensorSpec } from "./types";

// Buffer.readIntLE/readUIntLE handle at most 6 bytes
const MAX_WIDTH = 6;

/**
 * Decode the first `width` bytes as a little-endian integer.
 * Fewer bytes decode as a narrower integer; no bytes decode to 0.
 */
export function decodeLittleEndian(bytes: Uint8Array, width: number, signed: boolean): number {
	if (!Number.isInteger(width) || width < 1 || width > MAX_WIDTH) {
		throw new RangeError(`Unsupported register width ${width}`);
	}

	const used = Buffer.from(bytes.subarray(0, width));
	if (used.length === 0) return 0;

	return signed ? used.readIntLE(0, used.length) : used.readUIntLE(0, used.length);
}

export function decodeSensorValue(spec: SensorSpec, bytes: Uint8Array): number {
	return decodeLittleEndian(bytes, spec.width, spec.signed) * spec.scale;
}
