export type SensorId = "TC1" | "TC2" | "VDD" | "TH1" | "TH2";

// Unit label the device tables use for thermocouple channels
export const TEMPERATURE_UNIT = "T";

/**
 * One sensor value. Frozen on creation; `timestamp` is epoch milliseconds
 * so nothing holding a snapshot can change a buffered reading.
 */
export interface Reading {
    readonly timestamp: number;
    readonly sensorId: string;
    readonly unit: string;
    readonly value: number;
}

export function createReading(params: { timestamp: Date | number; sensorId: string; unit: string; value: number }): Reading {
    return Object.freeze({
        timestamp: typeof params.timestamp === "number" ? params.timestamp : params.timestamp.getTime(),
        sensorId: params.sensorId,
        unit: params.unit,
        value: params.value
    });
}

export function isTemperature(reading: Reading): boolean {
    return reading.unit === TEMPERATURE_UNIT;
}
