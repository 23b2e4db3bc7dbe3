// Reading record shape (used by the collector, buffer, log and renderer)
export { TEMPERATURE_UNIT, createReading, isTemperature } from "./reading";
export type { Reading, SensorId } from "./reading";

// Validation schema for rows read back from the CSV log
export { CSV_COLUMNS, ReadingRowSchema, rowToReading } from "./schema";
export type { ReadingRow } from "./schema";
