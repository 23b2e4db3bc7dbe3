import { z } from "zod";

import { createReading } from "./reading";
import type { Reading } from "./reading";

export const CSV_COLUMNS = ["timestamp", "id", "unit", "value"] as const;

// One row of the persisted CSV log, as read back from disk (all cells are strings)
export const ReadingRowSchema = z.object({
    timestamp: z.string().refine(s => !Number.isNaN(Date.parse(s)), "invalid timestamp"),
    id: z.string().min(1),
    unit: z.string(),
    value: z
        .string()
        .trim()
        .min(1)
        .transform(Number)
        .pipe(z.number().finite())
});

export type ReadingRow = z.infer<typeof ReadingRowSchema>;

export function rowToReading(row: ReadingRow): Reading {
    return createReading({
        timestamp: Date.parse(row.timestamp),
        sensorId: row.id,
        unit: row.unit,
        value: row.value
    });
}
