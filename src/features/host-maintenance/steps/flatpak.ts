import { StepCommands } from "../StepCommands.js";
import type { MaintenanceStep } from "../types.js";

export const flatpakStep: MaintenanceStep = {
	name: "flatpak",
	title: "Flatpak: removing unused runtimes",
	async run(ctx) {
		if (!ctx.capabilities.flatpak) {
			return { status: "skipped", reason: "flatpak not installed" };
		}
		const commands = new StepCommands(ctx);
		await commands.bestEffort(["flatpak", "uninstall", "--unused", "-y"]);
		return commands.finish();
	},
};
