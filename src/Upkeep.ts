/**
 * upkeep - maintenance run for a single Debian-based host
 *
 * Facade used by the CLI: a full maintenance run, the status report on
 * its own, and the resolved configuration.
 */

import { formatConfig, type UpkeepConfig } from "./config/index.js";
import { HostMaintenance } from "./features/host-maintenance/HostMaintenance.js";
import { SystemHost, type Host } from "./features/host-maintenance/Host.js";
import type { Narrator, RunReport, StatusSummary } from "./features/host-maintenance/types.js";
import { MemoryMonitor } from "./features/system-monitor/MemoryMonitor.js";
import { Logger } from "./utility/Logger.js";

export interface UpkeepOptions {
	host?: Host;
	narrate?: Narrator;
}

export class Upkeep {
	private logger = Logger.getInstance();
	private maintenance: HostMaintenance;
	private host: Host;
	private narrate: Narrator;

	constructor(
		private readonly config: UpkeepConfig,
		options: UpkeepOptions = {},
	) {
		this.host = options.host ?? new SystemHost();
		this.narrate = options.narrate ?? ((line) => console.log(line));
		this.maintenance = new HostMaintenance({
			config,
			host: this.host,
			narrate: this.narrate,
		});
	}

	isPrivileged(): boolean {
		return this.host.isRoot();
	}

	async runMaintenance(): Promise<RunReport> {
		const report = await this.maintenance.run();
		for (const step of report.steps) {
			this.logger.debug(`${step.step}: ${step.outcome.status} (${step.durationMs}ms)`);
		}
		return report;
	}

	async statusReport(): Promise<RunReport> {
		const report = await this.maintenance.statusOnly();
		if (report.summary) {
			this.narrate(this.formatSummary(report.summary));
		}
		return report;
	}

	describeConfig(): string {
		return formatConfig(this.config);
	}

	formatSummary(summary: StatusSummary): string {
		let output = "==> Summary\n";
		output += `  Kernel: ${summary.kernel ?? "unknown"}\n`;
		output += `  Root filesystem: ${summary.rootUsagePercent === undefined ? "unknown" : `${summary.rootUsagePercent}% used`}\n`;
		output += `  Failed units: ${summary.failedUnits.length > 0 ? summary.failedUnits.join(", ") : "none"}\n`;
		output += `  Reboot required: ${this.formatReboot(summary)}\n`;
		if (summary.memory) {
			output += new MemoryMonitor()
				.formatMemoryStats(summary.memory)
				.split("\n")
				.filter((line) => line.length > 0)
				.map((line) => `  ${line}`)
				.join("\n");
			output += "\n";
		}
		return output.trimEnd();
	}

	private formatReboot(summary: StatusSummary): string {
		if (!summary.rebootRequired) return "no";
		if (summary.rebootPackages.length === 0) return "yes";
		return `yes (${summary.rebootPackages.join(", ")})`;
	}
}
