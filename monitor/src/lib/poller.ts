import type winston from "winston";
import type { Reading } from "@kth-monitor/common";

import { errorMessage } from "./errors";

export interface PollerOptions {
	intervalMs: number;
	collect: () => Promise<Reading[]>;
	onBatch: (batch: Reading[]) => Promise<void> | void;
	logger: winston.Logger;
}

export interface PollerHandle {
	// Resolves after stop(); rejects with the first collection or handler error
	readonly done: Promise<void>;
	stop(): void;
	readonly cycles: number;
}

/**
 * Collect batches one cycle at a time, pausing `intervalMs` between cycles.
 * There is no retry: the first failure ends the loop.
 */
export function startPolling(opts: PollerOptions): PollerHandle {
	let running = true;
	let cycles = 0;
	let wakeUp: (() => void) | null = null;

	const pause = (ms: number): Promise<void> =>
		new Promise(resolve => {
			const timer = setTimeout(() => {
				wakeUp = null;
				resolve();
			}, ms);
			wakeUp = () => {
				clearTimeout(timer);
				wakeUp = null;
				resolve();
			};
		});

	const loop = async (): Promise<void> => {
		opts.logger.info("Polling started (intervalMs=%d)", opts.intervalMs);

		try {
			while (running) {
				const batch = await opts.collect();
				await opts.onBatch(batch);
				cycles++;

				if (running) {
					await pause(opts.intervalMs);
				}
			}
		} catch (err) {
			running = false;
			opts.logger.error("Polling stopped after %d cycles: %s", cycles, errorMessage(err));
			throw err;
		}

		opts.logger.info("Polling stopped after %d cycles", cycles);
	};

	const done = loop();

	return {
		done,
		stop(): void {
			running = false;
			wakeUp?.();
		},
		get cycles(): number {
			return cycles;
		}
	};
}
