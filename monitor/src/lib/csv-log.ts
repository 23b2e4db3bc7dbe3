// Append-only CSV log of readings.
//
// - One row per reading: timestamp (ISO 8601), id, unit, value.
// - The header is written only when the file is new or empty, so later runs
//   keep appending to the same table.
// - The file is never truncated.

import fs from "node:fs/promises";
import Papa from "papaparse";
import { CSV_COLUMNS, ReadingRowSchema, rowToReading } from "@kth-monitor/common";
import type { Reading } from "@kth-monitor/common";

import { errorMessage, persistenceError } from "./errors";

export type CsvValue = string | number | null | undefined | Date;

export type CsvColumn<T> = {
	header: string;
	accessor: (row: T) => CsvValue;
};

const DELIMITER = ",";
const NEWLINE = "\n";

export const READING_COLUMNS: readonly CsvColumn<Reading>[] = [
	{ header: CSV_COLUMNS[0], accessor: r => new Date(r.timestamp) },
	{ header: CSV_COLUMNS[1], accessor: r => r.sensorId },
	{ header: CSV_COLUMNS[2], accessor: r => r.unit },
	{ header: CSV_COLUMNS[3], accessor: r => r.value }
];

function stringifyValue(v: CsvValue): string {
	if (v === null || v === undefined) return "";
	if (v instanceof Date) return v.toISOString();
	if (typeof v === "number") {
		// NaN/Infinity are blank
		if (!Number.isFinite(v)) return "";
		return String(v);
	}
	return v;
}

function escapeCell(raw: string): string {
	// RFC4180-ish: quote if the cell contains the delimiter, a quote, CR or LF
	const needsQuotes = raw.includes(DELIMITER) || raw.includes("\"") || raw.includes("\n") || raw.includes("\r");

	if (!needsQuotes) return raw;
	return `"${raw.replace(/"/g, "\"\"")}"`;
}

export function formatCsvLine<T>(row: T, columns: readonly CsvColumn<T>[]): string {
	return columns.map(col => escapeCell(stringifyValue(col.accessor(row)))).join(DELIMITER);
}

export function formatCsvHeader<T>(columns: readonly CsvColumn<T>[]): string {
	return columns.map(c => escapeCell(c.header)).join(DELIMITER);
}

/**
 * Parse CSV text with a header row back into readings.
 * Throws PERSISTENCE_ERROR on the first malformed row.
 */
export function parseReadingsCsv(text: string): Reading[] {
	const parsed = Papa.parse<Record<string, string>>(text, {
		header: true,
		skipEmptyLines: true
	});

	if (parsed.errors.length > 0) {
		const first = parsed.errors[0];
		throw persistenceError(`Malformed CSV at row ${first.row ?? "?"}: ${first.message}`, parsed.errors.slice(0, 5));
	}

	return parsed.data.map((raw, index) => {
		const res = ReadingRowSchema.safeParse(raw);
		if (!res.success) {
			const issues = res.error.issues
				.slice(0, 5)
				.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
				.join("; ");
			throw persistenceError(`Invalid CSV row ${index + 1}: ${issues}`, raw);
		}
		return rowToReading(res.data);
	});
}

async function fileIsEmpty(filePath: string): Promise<boolean> {
	try {
		const st = await fs.stat(filePath);
		return st.size === 0;
	} catch (e) {
		if (e instanceof Error && "code" in e && e.code === "ENOENT") return true;
		throw e;
	}
}

export class CsvLog {
	constructor(readonly filePath: string) {}

	async append(batch: readonly Reading[]): Promise<void> {
		if (batch.length === 0) return;

		try {
			const lines = batch.map(r => formatCsvLine(r, READING_COLUMNS));
			if (await fileIsEmpty(this.filePath)) {
				lines.unshift(formatCsvHeader(READING_COLUMNS));
			}
			await fs.appendFile(this.filePath, lines.join(NEWLINE) + NEWLINE, "utf8");
		} catch (e) {
			throw persistenceError(`Cannot append to ${this.filePath}: ${errorMessage(e)}`, undefined, e);
		}
	}

	async readAll(): Promise<Reading[]> {
		let text: string;
		try {
			text = await fs.readFile(this.filePath, "utf8");
		} catch (e) {
			throw persistenceError(`Cannot read ${this.filePath}: ${errorMessage(e)}`, undefined, e);
		}
		return parseReadingsCsv(text);
	}
}
