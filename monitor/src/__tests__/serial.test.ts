import { EventEmitter } from "node:events";
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { SerialPortMock } from "serialport";
import type { SerialSettings } from "../lib/config";
import { isAppError } from "../lib/errors";
import { SerialPortTransport, withConnection } from "../lib/serial";
import type { SerialPortHandle } from "../lib/serial";

const PORT = "/dev/kth-test";

const settings: SerialSettings = {
	path: PORT,
	baudRate: 9600,
	dataBits: 8,
	stopBits: 1,
	timeoutMs: 50
};

function mockTransport(overrides: Partial<SerialSettings> = {}): SerialPortTransport {
	return new SerialPortTransport(
		{ ...settings, ...overrides },
		s => new SerialPortMock({ path: s.path, baudRate: s.baudRate, dataBits: s.dataBits, stopBits: s.stopBits, autoOpen: false })
	);
}

// A port that never answers and can be pulled out mid-read
class UnpluggablePort extends EventEmitter implements SerialPortHandle {
	isOpen = false;

	open(callback: (err: Error | null) => void): void {
		this.isOpen = true;
		callback(null);
	}

	write(_data: Buffer, callback: (err: Error | null | undefined) => void): boolean {
		callback(null);
		return true;
	}

	drain(callback: (err: Error | null) => void): void {
		callback(null);
	}

	close(callback: (err: Error | null) => void): void {
		this.isOpen = false;
		callback(null);
	}

	unplug(): void {
		this.isOpen = false;
		this.emit("close", new Error("Port disconnected"));
	}
}

beforeEach(() => {
	// echo: the mock device answers every write with the written bytes
	SerialPortMock.binding.createPort(PORT, { echo: true, record: true, readyData: Buffer.alloc(0) });
});

afterEach(() => {
	SerialPortMock.binding.reset();
});

describe("SerialPortTransport", () => {
	test("writes the command byte and reads the response", async () => {
		const bytes = await withConnection(mockTransport(), conn => conn.exchange(0x10, 1));

		expect([...bytes]).toEqual([0x10]);
	});

	test("returns a short response once the read timeout elapses", async () => {
		const started = Date.now();

		const bytes = await withConnection(mockTransport(), conn => conn.exchange(0x11, 2));

		expect([...bytes]).toEqual([0x11]);
		expect(Date.now() - started).toBeGreaterThanOrEqual(45);
	});

	test("reuses one connection for consecutive exchanges", async () => {
		const bytes = await withConnection(mockTransport(), async conn => {
			const first = await conn.exchange(0x14, 1);
			const second = await conn.exchange(0x15, 1);
			return Buffer.concat([first, second]);
		});

		expect([...bytes]).toEqual([0x14, 0x15]);
	});

	test("opening a missing port is a transport error", async () => {
		const err = await mockTransport({ path: "/dev/does-not-exist" })
			.open()
			.catch((e: unknown) => e);

		expect(isAppError(err, "TRANSPORT_ERROR")).toBe(true);
	});

	test("rejects commands that are not a single byte", async () => {
		await expect(withConnection(mockTransport(), conn => conn.exchange(0x100, 1))).rejects.toThrow(RangeError);
	});

	test("a port that disappears mid-read fails the exchange instead of timing out", async () => {
		const port = new UnpluggablePort();
		const transport = new SerialPortTransport({ ...settings, timeoutMs: 5_000 }, () => port);
		const conn = await transport.open();
		const started = Date.now();

		const pending = conn.exchange(0x10, 2).catch((e: unknown) => e);
		await new Promise(resolve => setTimeout(resolve, 10));
		port.unplug();
		const err = await pending;

		expect(isAppError(err, "TRANSPORT_ERROR")).toBe(true);
		expect(err).toMatchObject({ message: `Serial port ${PORT} failed: Port disconnected` });
		expect(Date.now() - started).toBeLessThan(5_000);
		await expect(conn.exchange(0x11, 2)).rejects.toMatchObject({ code: "TRANSPORT_ERROR" });
	});

	test("a regular close is not a failure", async () => {
		const port = new UnpluggablePort();
		const conn = await new SerialPortTransport(settings, () => port).open();

		port.emit("close", null);

		expect([...(await conn.exchange(0x10, 2))]).toEqual([]);
	});
});
