#!/usr/bin/env node
/**
 * upkeep - routine maintenance for a Debian-based host
 *
 *   upkeep [run]   update, clean, trim logs, set up zram, report (needs root)
 *   upkeep status  status report only
 *   upkeep config  show the resolved configuration
 */

import { ConfigError, loadConfig, loadDefaultsFile } from "./config/index.js";
import { Upkeep } from "./Upkeep.js";
import { Logger, interceptConsole } from "./utility/Logger.js";

const USAGE = "Usage: upkeep [run|status|config|help]";

const logger = Logger.getInstance();

async function shutdown(signal: NodeJS.Signals, exitCode: number): Promise<void> {
	logger.warn(`Received ${signal}, stopping`);
	console.error(`\nupkeep: interrupted by ${signal}`);
	await logger.close();
	process.exit(exitCode);
}

process.on("SIGINT", () => void shutdown("SIGINT", 130));
process.on("SIGTERM", () => void shutdown("SIGTERM", 143));

async function main(argv: string[]): Promise<number> {
	const command = argv[0] ?? "run";

	if (command === "help" || command === "--help" || command === "-h") {
		console.log(USAGE);
		return 0;
	}
	if (!["run", "status", "config"].includes(command)) {
		console.error(`Unknown command: ${command}`);
		console.error(USAGE);
		return 2;
	}

	loadDefaultsFile();
	const config = loadConfig();
	logger.setLevel(config.logLevel);

	const upkeep = new Upkeep(config);

	switch (command) {
		case "config":
			console.log(upkeep.describeConfig());
			return 0;

		case "status":
			await upkeep.statusReport();
			return 0;

		default: {
			// An unprivileged run stops at the guard; leave /var/log alone
			if (config.logDir && upkeep.isPrivileged()) {
				try {
					logger.openLogDirectory(config.logDir);
					interceptConsole();
				} catch (error) {
					console.error(`upkeep: session log disabled: ${error instanceof Error ? error.message : error}`);
				}
			}
			const report = await upkeep.runMaintenance();
			return report.ok ? 0 : 1;
		}
	}
}

try {
	process.exitCode = await main(process.argv.slice(2));
} catch (error) {
	if (error instanceof ConfigError) {
		console.error("Configuration validation failed:");
		for (const issue of error.issues) {
			console.error(`  - ${issue}`);
		}
	} else {
		logger.error(`Error: ${error instanceof Error ? error.message : error}`);
		console.error("Error:", error instanceof Error ? error.message : error);
	}
	process.exitCode = 1;
} finally {
	await logger.close();
}
