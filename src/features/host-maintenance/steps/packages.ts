import { APT_ENV, INDEX_TIMEOUT, PACKAGE_TIMEOUT, aptGet } from "../apt.js";
import { StepCommands } from "../StepCommands.js";
import type { MaintenanceStep } from "../types.js";

export const updateStep: MaintenanceStep = {
	name: "update",
	title: "APT update & upgrade",
	async run(ctx) {
		const commands = new StepCommands(ctx);

		const indexFailure = await commands.required(["apt-get", "update"], {
			env: APT_ENV,
			timeout: INDEX_TIMEOUT,
		});
		if (indexFailure) return indexFailure;

		// upgrade (not dist-upgrade): new dependencies may come in, nothing is removed
		const upgradeFailure = await commands.required(aptGet("upgrade", "--with-new-pkgs"), {
			env: APT_ENV,
			timeout: PACKAGE_TIMEOUT,
		});
		if (upgradeFailure) return upgradeFailure;

		return commands.finish();
	},
};

export const cleanupStep: MaintenanceStep = {
	name: "cleanup",
	title: "Cleaning APT caches and orphans",
	async run(ctx) {
		const commands = new StepCommands(ctx);
		const options = { env: APT_ENV, timeout: PACKAGE_TIMEOUT };

		const calls: string[][] = [
			aptGet("autoremove", "--purge"),
			["apt-get", "autoclean"],
			["apt-get", "clean"],
		];
		for (const argv of calls) {
			const fatal = await commands.required(argv, options);
			if (fatal) return fatal;
		}
		return commands.finish();
	},
};
