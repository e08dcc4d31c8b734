import type { UpkeepConfig } from "../../../config/index.js";
import { OPTIONAL_TOOLS, type OptionalTool } from "../Capabilities.js";
import { StepCommands } from "../StepCommands.js";
import type { MaintenanceStep } from "../types.js";

interface LogTask {
	tool: OptionalTool;
	argv: (config: UpkeepConfig) => string[];
}

// Rotation runs before journal pruning
const LOG_TASKS: readonly LogTask[] = [
	{ tool: "logrotate", argv: () => ["logrotate", "-f", "/etc/logrotate.conf"] },
	{
		tool: "journalctl",
		argv: (config) => ["journalctl", `--vacuum-time=${config.journalVacuumDays}d`],
	},
	{ tool: "systemdTmpfiles", argv: () => ["systemd-tmpfiles", "--clean"] },
];

export const logsStep: MaintenanceStep = {
	name: "logs",
	title: "Rotating and trimming logs",
	async run(ctx) {
		const commands = new StepCommands(ctx);
		let ran = 0;

		for (const task of LOG_TASKS) {
			if (!ctx.capabilities[task.tool]) {
				ctx.narrate(`-- ${OPTIONAL_TOOLS[task.tool]} not installed, skipped`);
				continue;
			}
			await commands.bestEffort(task.argv(ctx.config));
			ran++;
		}

		if (ran === 0) {
			return { status: "skipped", reason: "no log maintenance tools installed" };
		}
		return commands.finish();
	},
};
