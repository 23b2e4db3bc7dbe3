import type { Reading } from "@kth-monitor/common";

/**
 * Bounded, insertion-ordered working set of readings.
 *
 * When an ingest pushes the size past `maxLength`, exactly as many of the
 * oldest readings are dropped as the batch just added. Once warmed up with
 * equally sized batches the size therefore never exceeds `maxLength`.
 */
export class ReadingBuffer {
	private rows: Reading[] = [];

	constructor(readonly maxLength: number) {
		if (!Number.isInteger(maxLength) || maxLength <= 0) {
			throw new RangeError("maxLength must be a positive integer");
		}
	}

	get size(): number {
		return this.rows.length;
	}

	/**
	 * Append a batch and evict; returns the evicted readings (oldest first).
	 */
	ingest(batch: readonly Reading[]): Reading[] {
		this.rows.push(...batch);

		if (this.rows.length > this.maxLength) {
			return this.rows.splice(0, batch.length);
		}
		return [];
	}

	snapshot(): readonly Reading[] {
		return this.rows.slice();
	}
}
