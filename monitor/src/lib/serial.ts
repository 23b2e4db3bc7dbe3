import { SerialPort } from "serialport";

import type { SerialSettings } from "./config";
import { transportError } from "./errors";

/**
 * Minimal surface of a serialport stream used by the transport.
 * Both SerialPort and SerialPortMock satisfy it.
 */
export interface SerialPortHandle {
	readonly isOpen: boolean;
	open(callback: (err: Error | null) => void): void;
	write(data: Buffer, callback: (err: Error | null | undefined) => void): boolean;
	drain(callback: (err: Error | null) => void): void;
	close(callback: (err: Error | null) => void): void;
	on(event: "data", listener: (chunk: Buffer) => void): this;
	on(event: "error", listener: (err: Error) => void): this;
	// err is set when the port went away underneath us (e.g. unplugged)
	on(event: "close", listener: (err?: Error | null) => void): this;
}

export type PortFactory = (settings: SerialSettings) => SerialPortHandle;

export interface SerialConnection {
	/**
	 * Write one command byte, flush, then read until `expectedLength` bytes
	 * arrived or the read timeout elapsed. The result may be short.
	 */
	exchange(command: number, expectedLength: number): Promise<Buffer>;
	close(): Promise<void>;
}

export interface SerialTransport {
	open(): Promise<SerialConnection>;
}

export interface PortDescription {
	path: string;
	manufacturer?: string;
	serialNumber?: string;
	vendorId?: string;
	productId?: string;
}

export function createSerialPort(settings: SerialSettings): SerialPortHandle {
	return new SerialPort({
		path: settings.path,
		baudRate: settings.baudRate,
		dataBits: settings.dataBits,
		stopBits: settings.stopBits,
		autoOpen: false
	});
}

export async function listPorts(): Promise<PortDescription[]> {
	try {
		const ports = await SerialPort.list();
		return ports.map(p => ({
			path: p.path,
			manufacturer: p.manufacturer,
			serialNumber: p.serialNumber,
			vendorId: p.vendorId,
			productId: p.productId
		}));
	} catch (e) {
		throw transportError("Cannot enumerate serial ports", e);
	}
}

class PortConnection implements SerialConnection {
	private pending: Buffer = Buffer.alloc(0);
	private failure: Error | null = null;
	private wake: (() => void) | null = null;

	constructor(
		private readonly port: SerialPortHandle,
		private readonly settings: SerialSettings
	) {
		port.on("data", chunk => {
			this.pending = Buffer.concat([this.pending, chunk]);
			this.wake?.();
		});
		port.on("error", err => {
			this.failure = err;
			this.wake?.();
		});
		port.on("close", err => {
			if (err) {
				this.failure = err;
				this.wake?.();
			}
		});
	}

	async exchange(command: number, expectedLength: number): Promise<Buffer> {
		if (!Number.isInteger(command) || command < 0 || command > 0xff) {
			throw new RangeError(`Command must be a single byte, got ${command}`);
		}
		this.throwIfFailed();

		await this.write(Buffer.from([command]));
		return this.read(expectedLength);
	}

	async close(): Promise<void> {
		if (!this.port.isOpen) return;

		await new Promise<void>((resolve, reject) => {
			this.port.close(err => {
				if (err) return reject(transportError(`Cannot close ${this.settings.path}`, err));
				resolve();
			});
		});
	}

	private throwIfFailed(): void {
		if (this.failure) {
			throw transportError(`Serial port ${this.settings.path} failed`, this.failure);
		}
	}

	private write(data: Buffer): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			this.port.write(data, err => {
				if (err) return reject(transportError(`Write to ${this.settings.path} failed`, err));

				this.port.drain(drainErr => {
					if (drainErr) return reject(transportError(`Flush of ${this.settings.path} failed`, drainErr));
					resolve();
				});
			});
		});
	}

	private read(length: number): Promise<Buffer> {
		return new Promise<Buffer>((resolve, reject) => {
			let timer: NodeJS.Timeout | undefined;

			const settle = (): void => {
				if (timer) {
					clearTimeout(timer);
					timer = undefined;
				}
				this.wake = null;
			};

			const take = (): void => {
				settle();
				const out = Buffer.from(this.pending.subarray(0, length));
				this.pending = this.pending.subarray(out.length);
				resolve(out);
			};

			const check = (): void => {
				if (this.failure) {
					settle();
					reject(transportError(`Serial port ${this.settings.path} failed`, this.failure));
					return;
				}
				if (this.pending.length >= length) take();
			};

			timer = setTimeout(take, this.settings.timeoutMs);
			this.wake = check;
			check();
		});
	}
}

/**
 * Opens a new port for every connection; nothing is held between operations.
 */
export class SerialPortTransport implements SerialTransport {
	constructor(
		private readonly settings: SerialSettings,
		private readonly createPort: PortFactory = createSerialPort
	) {}

	async open(): Promise<SerialConnection> {
		const port = this.createPort(this.settings);

		await new Promise<void>((resolve, reject) => {
			port.open(err => {
				if (err) return reject(transportError(`Cannot open ${this.settings.path}`, err));
				resolve();
			});
		});

		return new PortConnection(port, this.settings);
	}
}

/**
 * Scope a connection to one logical operation. The connection is closed
 * even when `fn` throws.
 */
export async function withConnection<T>(
	transport: SerialTransport,
	fn: (conn: SerialConnection) => Promise<T>
): Promise<T> {
	const conn = await transport.open();
	try {
		return await fn(conn);
	} finally {
		await conn.close();
	}
}
