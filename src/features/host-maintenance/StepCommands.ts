import type { ShellResult } from "../../utility/Shell.js";
import { Logger } from "../../utility/Logger.js";
import type { CommandOptions } from "./Host.js";
import type { FatalOutcome, StepContext, StepOutcome } from "./types.js";

const DEFAULT_TIMEOUT = 10 * 60 * 1000;

export function describeFailure(result: ShellResult): string {
	if (result.timedOut) {
		return `${result.command} timed out`;
	}
	return `${result.command} exited with code ${result.exitCode}`;
}

/**
 * Runs one step's external calls and collects tolerated failures
 */
export class StepCommands {
	private logger = Logger.getInstance();
	private tolerated: string[] = [];

	constructor(private readonly ctx: StepContext) { }

	/**
	 * A call the run cannot continue without
	 */
	async required(
		argv: readonly string[],
		options?: CommandOptions,
	): Promise<FatalOutcome | undefined> {
		const result = await this.invoke(argv, options);
		if (result.exitCode === 0 && !result.timedOut) {
			return undefined;
		}
		const detail = describeFailure(result);
		this.logger.error(detail);
		return { status: "fatal", detail };
	}

	/**
	 * A call whose failure is noted but does not stop the run
	 */
	async bestEffort(argv: readonly string[], options?: CommandOptions): Promise<ShellResult> {
		const result = await this.invoke(argv, options);
		if (result.exitCode !== 0 || result.timedOut) {
			this.tolerate(describeFailure(result));
		}
		return result;
	}

	/**
	 * A quiet check: exit status 0 means yes
	 */
	async check(argv: readonly string[], options: CommandOptions = {}): Promise<boolean> {
		const result = await this.ctx.host.run(argv, { timeout: 30000, ...options, quiet: true });
		return result.exitCode === 0;
	}

	tolerate(detail: string): void {
		this.logger.warn(`Tolerated: ${detail}`);
		this.tolerated.push(detail);
	}

	finish(): StepOutcome {
		if (this.tolerated.length === 0) {
			return { status: "success" };
		}
		return { status: "tolerated", detail: this.tolerated.join("; ") };
	}

	private invoke(argv: readonly string[], options?: CommandOptions): Promise<ShellResult> {
		this.ctx.narrate(`+ ${argv.join(" ")}`);
		return this.ctx.host.run(argv, { timeout: DEFAULT_TIMEOUT, ...options });
	}
}
