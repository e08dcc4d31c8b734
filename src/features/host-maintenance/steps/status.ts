import { MemoryMonitor } from "../../system-monitor/MemoryMonitor.js";
import { StepCommands } from "../StepCommands.js";
import type { MaintenanceStep, StatusSummary } from "../types.js";

export const REBOOT_REQUIRED_FILE = "/var/run/reboot-required";
export const REBOOT_PACKAGES_FILE = "/var/run/reboot-required.pkgs";

/**
 * Use% of the data row of `df -h /`
 */
export function parseRootUsage(dfOutput: string): number | undefined {
	const dataRow = dfOutput
		.split("\n")
		.slice(1)
		.find((line) => line.trim());
	const match = dataRow?.match(/\s(\d+)%\s/);
	return match?.[1] ? Number.parseInt(match[1], 10) : undefined;
}

/**
 * Unit names from `systemctl --failed --no-legend`
 */
export function parseFailedUnits(output: string): string[] {
	return output
		.split("\n")
		.map((line) => line.trim().replace(/^●\s*/, ""))
		.filter((line) => line.length > 0)
		.map((line) => line.split(/\s+/)[0] ?? line);
}

/**
 * Informational only: every call is tolerated, nothing here is fatal
 */
export const statusStep: MaintenanceStep = {
	name: "status",
	title: "System status summary",
	async run(ctx) {
		const commands = new StepCommands(ctx);
		const summary: StatusSummary = {
			failedUnits: [],
			rebootRequired: false,
			rebootPackages: [],
		};

		const uname = await commands.bestEffort(["uname", "-a"]);
		if (uname.exitCode === 0) {
			summary.kernel = uname.stdout.trim();
		}

		ctx.narrate("-- Disk usage --");
		const df = await commands.bestEffort(["df", "-h", "/"]);
		if (df.exitCode === 0) {
			summary.rootUsagePercent = parseRootUsage(df.stdout);
		}

		ctx.narrate("-- Memory --");
		await commands.bestEffort(["free", "-h"]);
		try {
			summary.memory = await new MemoryMonitor((path) => ctx.host.readFile(path)).getMemoryStats();
		} catch (error) {
			commands.tolerate(`reading memory statistics failed: ${error instanceof Error ? error.message : String(error)}`);
		}

		ctx.narrate("-- Swap --");
		await commands.bestEffort(["swapon", "--show"]);

		if (ctx.capabilities.systemctl) {
			ctx.narrate("-- Failed systemd services (if any) --");
			const failed = await commands.bestEffort(["systemctl", "--failed", "--no-legend"]);
			summary.failedUnits = parseFailedUnits(failed.stdout);
		}

		if (await ctx.host.fileExists(REBOOT_REQUIRED_FILE)) {
			summary.rebootRequired = true;
			ctx.narrate("==> Reboot recommended: kernel, libc or similar was updated.");
			if (await ctx.host.fileExists(REBOOT_PACKAGES_FILE)) {
				try {
					const packages = await ctx.host.readFile(REBOOT_PACKAGES_FILE);
					summary.rebootPackages = [
						...new Set(packages.split("\n").map((line) => line.trim()).filter(Boolean)),
					];
					if (summary.rebootPackages.length > 0) {
						ctx.narrate(`-- Requested by: ${summary.rebootPackages.join(", ")}`);
					}
				} catch (error) {
					commands.tolerate(`reading ${REBOOT_PACKAGES_FILE} failed: ${error instanceof Error ? error.message : String(error)}`);
				}
			}
		}

		ctx.summary = summary;
		return commands.finish();
	},
};
