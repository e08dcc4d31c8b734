import type { Host } from "../Host.js";
import type { StepOutcome } from "../types.js";

export const REQUIRED_TOOL = "apt-get";

/**
 * Root first, without touching anything external; then the package manager
 */
export async function checkPreconditions(host: Host): Promise<StepOutcome> {
	if (!host.isRoot()) {
		return { status: "fatal", detail: "must run as root (try: sudo upkeep)" };
	}
	if (!(await host.commandExists(REQUIRED_TOOL))) {
		return { status: "fatal", detail: `missing required tool: ${REQUIRED_TOOL}` };
	}
	return { status: "success" };
}
