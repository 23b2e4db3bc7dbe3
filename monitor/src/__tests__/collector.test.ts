import { describe, test, expect, vi } from "vitest";
import { ReadingCollector } from "../collector";
import { isAppError } from "../lib/errors";
import { FakeTransport, kthResponses, silentLogger } from "./helpers";

const T0 = new Date("2026-03-01T10:00:00.000Z");

describe("ReadingCollector", () => {
	test("0x10 answering 0x0a 0x00 yields TC1 = 1 T", async () => {
		const collector = new ReadingCollector(new FakeTransport(), { logger: silentLogger(), now: () => T0 });

		const batch = await collector.collect();

		expect(batch[0]).toEqual({ timestamp: T0.getTime(), sensorId: "TC1", unit: "T", value: 1 });
	});

	test("collects one reading per register in table order", async () => {
		const collector = new ReadingCollector(new FakeTransport(), { logger: silentLogger(), now: () => T0 });

		const batch = await collector.collect();

		expect(batch.map(r => [r.sensorId, r.unit, r.value])).toEqual([
			["TC1", "T", 1],
			["TC2", "T", -1],
			["VDD", "uV", 1000000],
			["TH1", "ADC value", 1000],
			["TH2", "ADC value", 65535]
		]);
	});

	test("opens and closes a fresh connection per register", async () => {
		const transport = new FakeTransport();
		const collector = new ReadingCollector(transport, { logger: silentLogger() });

		await collector.collect();

		expect(transport.commands).toEqual([0x10, 0x11, 0x12, 0x14, 0x15]);
		expect(transport.opened).toBe(5);
		expect(transport.closed).toBe(5);
	});

	test("stamps every reading with the time taken before its exchange", async () => {
		let tick = 0;
		const now = () => new Date(T0.getTime() + 1000 * tick++);
		const collector = new ReadingCollector(new FakeTransport(), { logger: silentLogger(), now });

		const batch = await collector.collect();

		expect(batch.map(r => new Date(r.timestamp).toISOString())).toEqual([
			"2026-03-01T10:00:00.000Z",
			"2026-03-01T10:00:01.000Z",
			"2026-03-01T10:00:02.000Z",
			"2026-03-01T10:00:03.000Z",
			"2026-03-01T10:00:04.000Z"
		]);
	});

	test("decodes a short read and warns by default", async () => {
		const logger = silentLogger();
		const warn = vi.spyOn(logger, "warn");
		const transport = new FakeTransport(kthResponses({ 0x10: Uint8Array.of(0x0a) }));
		const collector = new ReadingCollector(transport, { logger });

		const batch = await collector.collect();

		expect(batch[0].value).toBe(1);
		expect(warn).toHaveBeenCalledTimes(1);
		expect(warn).toHaveBeenCalledWith("Short read for %s: expected %d bytes, got %d", "TC1", 2, 1);
	});

	test("rejects a short read with strictReads", async () => {
		const transport = new FakeTransport(kthResponses({ 0x12: Uint8Array.of(0x01, 0x02) }));
		const collector = new ReadingCollector(transport, { logger: silentLogger(), strictReads: true });

		const err = await collector.collect().catch((e: unknown) => e);

		expect(isAppError(err, "SHORT_READ")).toBe(true);
		expect(transport.commands).toEqual([0x10, 0x11, 0x12]);
	});

	test("a failing register aborts the cycle and still closes its connection", async () => {
		const failure = new Error("device unplugged");
		const transport = new FakeTransport(kthResponses({ 0x11: failure }));
		const collector = new ReadingCollector(transport, { logger: silentLogger() });

		await expect(collector.collect()).rejects.toBe(failure);
		expect(transport.commands).toEqual([0x10, 0x11]);
		expect(transport.closed).toBe(2);
	});
});
