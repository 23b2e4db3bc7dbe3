import * as asciichart from "asciichart";
import { isTemperature } from "@kth-monitor/common";
import type { Reading } from "@kth-monitor/common";

export interface TemperatureSeries {
	sensorId: string;
	timestamps: number[];
	values: number[];
}

// Series resampled onto one shared, ascending list of instants
export interface AlignedSeries {
	ticks: number[];
	rows: number[][];
}

export interface ChartOptions {
	title: string;
	yLabel: string;
	height: number;
	// Most recent instants drawn on the shared time axis
	width: number;
	color: boolean;
}

// Anything the chart can be drawn on (process.stdout in production)
export interface ChartSurface {
	write(chunk: string): unknown;
}

const CLEAR_SCREEN = "\u001b[2J\u001b[H";

const PALETTE = [asciichart.blue, asciichart.green, asciichart.red, asciichart.magenta, asciichart.cyan, asciichart.yellow];

const DEFAULTS: ChartOptions = {
	title: "KTH-USB | Temperature",
	yLabel: "Temperature [Celsius]",
	height: 20,
	width: 80,
	color: true
};

/**
 * Keep temperature rows and split them into one series per sensor,
 * in order of first appearance.
 */
export function pivotTemperatureSeries(readings: readonly Reading[]): TemperatureSeries[] {
	const bySensor = new Map<string, TemperatureSeries>();

	for (const r of readings) {
		if (!isTemperature(r)) continue;

		let series = bySensor.get(r.sensorId);
		if (!series) {
			series = { sensorId: r.sensorId, timestamps: [], values: [] };
			bySensor.set(r.sensorId, series);
		}
		series.timestamps.push(r.timestamp);
		series.values.push(r.value);
	}

	return Array.from(bySensor.values());
}

/**
 * Put every series on the union of all their timestamps, keeping the last
 * `width` instants. At each instant a series shows its latest sample at or
 * before it; before its first sample it shows that first sample.
 */
export function alignToTimeAxis(series: readonly TemperatureSeries[], width: number): AlignedSeries {
	const ticks = Array.from(new Set(series.flatMap(s => s.timestamps)))
		.sort((a, b) => a - b)
		.slice(-width);

	const rows = series.map(s => {
		let next = 0;
		let current = s.values[0];
		return ticks.map(tick => {
			while (next < s.timestamps.length && s.timestamps[next] <= tick) {
				current = s.values[next];
				next++;
			}
			return current;
		});
	});

	return { ticks, rows };
}

export function formatClock(d: Date): string {
	const pad = (n: number) => String(n).padStart(2, "0");
	return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

/**
 * Terminal line chart of the temperature channels.
 * Owns its surface: every render clears it and draws a full frame.
 */
export class ChartRenderer {
	private readonly opts: ChartOptions;
	private frames = 0;

	constructor(
		private readonly surface: ChartSurface,
		opts: Partial<ChartOptions> = {}
	) {
		this.opts = { ...DEFAULTS, ...opts };
	}

	get renderedFrames(): number {
		return this.frames;
	}

	frame(readings: readonly Reading[]): string {
		const series = pivotTemperatureSeries(readings);
		const lines = [this.opts.title, this.opts.yLabel];

		if (series.length === 0) {
			lines.push("", "Waiting for temperature readings...");
			return lines.join("\n");
		}

		const { ticks, rows } = alignToTimeAxis(series, this.opts.width);
		const colors = series.map((_, i) => this.colorFor(i));

		lines.push(
			asciichart.plot(rows, {
				height: this.opts.height,
				colors: this.opts.color ? colors : undefined,
				format: (x: number) => x.toFixed(1).padStart(8)
			})
		);

		lines.push(`${formatClock(new Date(ticks[0]))} .. ${formatClock(new Date(ticks[ticks.length - 1]))}`);

		lines.push(series.map((s, i) => `${this.paint("──", colors[i])} ${s.sensorId}`).join("   "));

		return lines.join("\n");
	}

	render(readings: readonly Reading[]): void {
		this.surface.write(CLEAR_SCREEN + this.frame(readings) + "\n");
		this.frames++;
	}

	private colorFor(index: number): string {
		return PALETTE[index % PALETTE.length];
	}

	private paint(text: string, color: string): string {
		return this.opts.color ? `${color}${text}${asciichart.reset}` : text;
	}
}
