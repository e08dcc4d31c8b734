import type { Host } from "./Host.js";

/**
 * Optional collaborators, detected once per run
 */
export const OPTIONAL_TOOLS = {
	logrotate: "logrotate",
	journalctl: "journalctl",
	systemdTmpfiles: "systemd-tmpfiles",
	systemctl: "systemctl",
	flatpak: "flatpak",
} as const;

export type OptionalTool = keyof typeof OPTIONAL_TOOLS;

export type Capabilities = Readonly<Record<OptionalTool, boolean>>;

export async function detectCapabilities(host: Host): Promise<Capabilities> {
	const detected: Record<OptionalTool, boolean> = {
		logrotate: false,
		journalctl: false,
		systemdTmpfiles: false,
		systemctl: false,
		flatpak: false,
	};
	const tools: readonly OptionalTool[] = [
		"logrotate",
		"journalctl",
		"systemdTmpfiles",
		"systemctl",
		"flatpak",
	];
	for (const tool of tools) {
		detected[tool] = await host.commandExists(OPTIONAL_TOOLS[tool]);
	}
	return Object.freeze(detected);
}
