/**
 * upkeep Configuration
 *
 * Resolved once at startup from the environment (and the optional
 * /etc/default/upkeep defaults file), then passed into every step.
 */

import { z } from "zod";
import * as dotenv from "dotenv";

export const DEFAULTS_FILE = "/etc/default/upkeep";

const FLAG_VALUES = ["1", "0", "true", "false", "yes", "no", "on", "off"] as const;
const ENABLED_FLAGS: readonly string[] = ["1", "true", "yes", "on"];

const UpkeepConfigSchema = z.object({
	// Log maintenance
	journalVacuumDays: z.coerce.number().int().min(1),

	// zram swap
	enableZram: z.enum(FLAG_VALUES).transform((flag) => ENABLED_FLAGS.includes(flag)),
	zramPercent: z.coerce.number().int().min(1).max(100),

	// Logging
	logLevel: z.enum(["debug", "info", "warn", "error"]),
	logDir: z.string(), // empty: no session log file
});

export type UpkeepConfig = Readonly<z.infer<typeof UpkeepConfigSchema>>;

export class ConfigError extends Error {
	constructor(readonly issues: string[]) {
		super(`Invalid configuration: ${issues.join("; ")}`);
		this.name = "ConfigError";
	}
}

/**
 * Load KEY=value defaults; variables already in the environment win.
 * A missing file is not an error.
 */
export function loadDefaultsFile(file: string = DEFAULTS_FILE): void {
	dotenv.config({ path: file });
}

/**
 * Empty or blank counts as unset, like `${VAR:-default}`
 */
function setting(value: string | undefined): string | undefined {
	const trimmed = value?.trim();
	return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): UpkeepConfig {
	const rawConfig = {
		journalVacuumDays: setting(env.JOURNAL_VACUUM_DAYS) ?? "14",
		enableZram: (setting(env.ENABLE_ZRAM) ?? "1").toLowerCase(),
		zramPercent: setting(env.ZRAM_PERCENT) ?? "50",
		logLevel: (setting(env.LOG_LEVEL) ?? "info").toLowerCase(),
		// set but empty disables the session log
		logDir: (env.LOG_DIR ?? "/var/log/upkeep").trim(),
	};

	const result = UpkeepConfigSchema.safeParse(rawConfig);
	if (!result.success) {
		throw new ConfigError(
			result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
		);
	}
	return Object.freeze(result.data);
}

export function formatConfig(config: UpkeepConfig): string {
	let output = "upkeep configuration:\n";
	output += `  JOURNAL_VACUUM_DAYS: ${config.journalVacuumDays}\n`;
	output += `  ENABLE_ZRAM: ${config.enableZram ? "1" : "0"}\n`;
	output += `  ZRAM_PERCENT: ${config.zramPercent}\n`;
	output += `  LOG_LEVEL: ${config.logLevel}\n`;
	output += `  LOG_DIR: ${config.logDir || "(disabled)"}\n`;
	return output;
}
