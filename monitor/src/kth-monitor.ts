import { ChartRenderer } from "./lib/chart";
import { loadConfig } from "./lib/config";
import { asAppError } from "./lib/errors";
import { createLogger, detachConsole } from "./lib/log";
import { SerialPortTransport } from "./lib/serial";
import { printPorts, startMonitor } from "./monitor";

async function main(): Promise<void> {
	const config = loadConfig();

	const logger = createLogger({
		logDir: config.paths.logDir,
		serviceName: "kth-monitor",
		level: config.logLevel
	});

	logger.info("KTH monitor starting (port=%s baudRate=%d)", config.serial.path, config.serial.baudRate);

	if (config.listPorts) {
		await printPorts(logger);
	}

	const renderer = config.chart.enabled
		? new ChartRenderer(process.stdout, {
				height: config.chart.height,
				width: config.chart.width,
				color: process.stdout.isTTY === true
			})
		: undefined;

	const monitor = await startMonitor({
		config,
		logger,
		transport: new SerialPortTransport(config.serial),
		renderer,
		// Port list and device identity stay on the terminal until the chart starts
		detachConsole: () => detachConsole(logger)
	});

	const stop = (signal: string) => {
		logger.info("Stopping KTH monitor (signal=%s)", signal);
		monitor.stop();
	};

	process.on("SIGINT", () => stop("SIGINT")); // Ctrl+C
	process.on("SIGTERM", () => stop("SIGTERM"));

	await monitor.done;
	logger.info("KTH monitor exiting");
}

main()
	.then(() => process.exit(0))
	.catch(err => {
		const e = asAppError(err);
		console.error(`[${e.code}] ${e.message}`);
		console.error(err);
		process.exit(1);
	});
