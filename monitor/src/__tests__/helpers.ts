import type winston from "winston";

import { createLogger } from "../lib/log";
import type { SerialConnection, SerialTransport } from "../lib/serial";

export type FakeResponse = Uint8Array | Error;

export function silentLogger(): winston.Logger {
	return createLogger({ serviceName: "test", console: false });
}

// Answers of a healthy KTH-USB
export function kthResponses(overrides: Record<number, FakeResponse> = {}): Map<number, FakeResponse> {
	const responses = new Map<number, FakeResponse>([
		[0x00, Buffer.from("KTH-USB\r\n", "latin1")],
		[0x01, Uint8Array.of(0x0d, 0xee)],
		[0x02, Uint8Array.of(0x01, 0x02, 0x03, 0x04)],
		[0x03, Uint8Array.of(0x02, 0x01)],
		[0x10, Uint8Array.of(0x0a, 0x00)], // TC1: 10 -> 1.0
		[0x11, Uint8Array.of(0xf6, 0xff)], // TC2: -10 -> -1.0
		[0x12, Uint8Array.of(0x40, 0x42, 0x0f, 0x00)], // VDD: 1000000
		[0x14, Uint8Array.of(0xe8, 0x03)], // TH1: 1000
		[0x15, Uint8Array.of(0xff, 0xff)] // TH2: 65535
	]);
	for (const [command, response] of Object.entries(overrides)) {
		responses.set(Number(command), response);
	}
	return responses;
}

/**
 * In-process stand-in for the serial port: answers each command from a table
 * and records what was sent.
 *
 * Once `holdFrom` commands were sent, `open()` waits until `failHeld()`.
 */
export class FakeTransport implements SerialTransport {
	readonly commands: number[] = [];
	opened = 0;
	closed = 0;
	holdFrom = Infinity;
	private readonly held: ((err: Error) => void)[] = [];

	constructor(private readonly responses: Map<number, FakeResponse> = kthResponses()) {}

	get heldOpens(): number {
		return this.held.length;
	}

	failHeld(err: Error): void {
		for (const reject of this.held.splice(0)) reject(err);
	}

	async open(): Promise<SerialConnection> {
		if (this.commands.length >= this.holdFrom) {
			await new Promise<never>((_, reject) => this.held.push(reject));
		}
		this.opened++;
		return {
			exchange: async (command: number, expectedLength: number): Promise<Buffer> => {
				this.commands.push(command);
				const res = this.responses.get(command);
				if (res instanceof Error) throw res;
				return Buffer.from((res ?? new Uint8Array(0)).subarray(0, expectedLength));
			},
			close: async (): Promise<void> => {
				this.closed++;
			}
		};
	}
}
