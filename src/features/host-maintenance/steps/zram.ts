/**
 * Compressed-RAM swap via zram-tools.
 *
 * Never runs alongside dphys-swapfile, and never rewrites an existing
 * /etc/default/zramswap: a file that is already there may carry manual edits.
 */

import { Logger } from "../../../utility/Logger.js";
import { APT_ENV, PACKAGE_TIMEOUT, aptGet } from "../apt.js";
import { StepCommands } from "../StepCommands.js";
import type { MaintenanceStep } from "../types.js";

export const ZRAM_PACKAGE = "zram-tools";
export const ZRAM_SERVICE = "zramswap";
export const ZRAM_CONFIG_PATH = "/etc/default/zramswap";
export const ZRAM_CONFIG_MODE = 0o644;
export const ZRAM_PRIORITY = 100;
export const ALTERNATIVE_SWAP_SERVICE = "dphys-swapfile";

export function renderZramConfig(percent: number): string {
	return [
		"# Managed by upkeep (conservative defaults)",
		`PERCENT=${percent}`,
		`PRIORITY=${ZRAM_PRIORITY}`,
		"# ALGO is left unset so the kernel default applies; no compression level is pinned.",
		"",
	].join("\n");
}

export const zramStep: MaintenanceStep = {
	name: "zram",
	title: "ZRAM: compressed swap",
	async run(ctx) {
		const logger = Logger.getInstance();

		if (!ctx.config.enableZram) {
			return { status: "skipped", reason: "disabled by ENABLE_ZRAM" };
		}

		const commands = new StepCommands(ctx);

		if (
			ctx.capabilities.systemctl &&
			(await commands.check(["systemctl", "is-active", "--quiet", ALTERNATIVE_SWAP_SERVICE]))
		) {
			return { status: "skipped", reason: `${ALTERNATIVE_SWAP_SERVICE} is active` };
		}

		if (await commands.check(["dpkg", "-s", ZRAM_PACKAGE])) {
			ctx.narrate(`-- ${ZRAM_PACKAGE} already installed`);
		} else {
			await commands.bestEffort(aptGet("install", ZRAM_PACKAGE), {
				env: APT_ENV,
				timeout: PACKAGE_TIMEOUT,
			});
		}

		if (await ctx.host.fileExists(ZRAM_CONFIG_PATH)) {
			ctx.narrate(`-- config exists; leaving as-is (${ZRAM_CONFIG_PATH})`);
		} else {
			ctx.narrate(`-- creating ${ZRAM_CONFIG_PATH} (PERCENT=${ctx.config.zramPercent})`);
			try {
				const created = await ctx.host.createFileAtomic(
					ZRAM_CONFIG_PATH,
					renderZramConfig(ctx.config.zramPercent),
					ZRAM_CONFIG_MODE,
				);
				if (created) {
					logger.info(`Wrote ${ZRAM_CONFIG_PATH}`);
				} else {
					ctx.narrate(`-- config appeared meanwhile; leaving as-is (${ZRAM_CONFIG_PATH})`);
				}
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error);
				ctx.narrate(`-- could not write ${ZRAM_CONFIG_PATH}: ${message}`);
				commands.tolerate(`writing ${ZRAM_CONFIG_PATH} failed: ${message}`);
			}
		}

		if (ctx.capabilities.systemctl) {
			await commands.bestEffort(["systemctl", "enable", "--now", ZRAM_SERVICE]);
		} else {
			ctx.narrate(`-- systemd not available; start the ${ZRAM_SERVICE} service manually if needed`);
		}

		ctx.narrate("-- swap status:");
		await commands.bestEffort(["swapon", "--show"]);

		return commands.finish();
	},
};
