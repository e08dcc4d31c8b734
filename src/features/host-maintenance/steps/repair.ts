import { APT_ENV, PACKAGE_TIMEOUT, aptGet } from "../apt.js";
import { StepCommands } from "../StepCommands.js";
import type { MaintenanceStep } from "../types.js";

/**
 * Finish interrupted dpkg work, then let apt fix broken dependencies.
 * A fresh system may have nothing to fix and apt can exit nonzero for
 * that, so the second call is tolerated.
 */
export const repairStep: MaintenanceStep = {
	name: "repair",
	title: "Preflight: repairing package state",
	async run(ctx) {
		const commands = new StepCommands(ctx);
		const options = { env: APT_ENV, timeout: PACKAGE_TIMEOUT };

		const fatal = await commands.required(["dpkg", "--configure", "-a"], options);
		if (fatal) return fatal;

		await commands.bestEffort(aptGet("-f", "install"), options);
		return commands.finish();
	},
};
