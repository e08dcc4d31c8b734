/**
 * HostMaintenance - one maintenance run for a Debian-based host
 *
 * Steps run strictly in order and the run stops at the first fatal outcome:
 * repair, update/upgrade, cleanup, logs, zram, flatpak, status.
 * Effects of steps that already ran stay applied; re-running is safe.
 */

import type { UpkeepConfig } from "../../config/index.js";
import { Logger } from "../../utility/Logger.js";
import { detectCapabilities } from "./Capabilities.js";
import type { Host } from "./Host.js";
import { checkPreconditions } from "./steps/preconditions.js";
import { flatpakStep } from "./steps/flatpak.js";
import { logsStep } from "./steps/logs.js";
import { cleanupStep, updateStep } from "./steps/packages.js";
import { repairStep } from "./steps/repair.js";
import { statusStep } from "./steps/status.js";
import { zramStep } from "./steps/zram.js";
import type {
	MaintenanceStep,
	Narrator,
	RunReport,
	StepContext,
	StepOutcome,
	StepReport,
} from "./types.js";

export const MAINTENANCE_STEPS: readonly MaintenanceStep[] = [
	repairStep,
	updateStep,
	cleanupStep,
	logsStep,
	zramStep,
	flatpakStep,
	statusStep,
];

export interface HostMaintenanceOptions {
	config: UpkeepConfig;
	host: Host;
	narrate?: Narrator;
	steps?: readonly MaintenanceStep[];
}

export class HostMaintenance {
	private logger = Logger.getInstance();
	private readonly config: UpkeepConfig;
	private readonly host: Host;
	private readonly narrate: Narrator;
	private readonly steps: readonly MaintenanceStep[];

	constructor(options: HostMaintenanceOptions) {
		this.config = options.config;
		this.host = options.host;
		this.narrate = options.narrate ?? ((line) => console.log(line));
		this.steps = options.steps ?? MAINTENANCE_STEPS;
	}

	/**
	 * Run every step; resolves with the report, never rejects on a failed step
	 */
	async run(): Promise<RunReport> {
		const startTime = Date.now();
		const reports: StepReport[] = [];
		this.logger.info("Starting maintenance run");

		const guardStart = Date.now();
		const guard = await checkPreconditions(this.host);
		const guardReport: StepReport = {
			step: "preconditions",
			title: "Preconditions",
			outcome: guard,
			durationMs: Date.now() - guardStart,
		};
		reports.push(guardReport);
		if (guard.status === "fatal") {
			return this.abort(guardReport, guard.detail, reports, startTime);
		}

		const capabilities = await detectCapabilities(this.host);
		this.logger.debug(`Capabilities: ${JSON.stringify(capabilities)}`);

		const ctx: StepContext = {
			config: this.config,
			host: this.host,
			capabilities,
			narrate: this.narrate,
		};

		for (let i = 0; i < this.steps.length; i++) {
			const step = this.steps[i];
			if (!step) continue;

			const report = await this.runStep(step, ctx, i + 1);
			reports.push(report);
			if (report.outcome.status === "fatal") {
				return this.abort(report, report.outcome.detail, reports, startTime, ctx);
			}
		}

		const durationMs = Date.now() - startTime;
		this.logger.info(`Maintenance run completed in ${(durationMs / 1000).toFixed(1)}s`);
		this.narrate("==> Done.");
		return { ok: true, steps: reports, summary: ctx.summary, durationMs };
	}

	/**
	 * Status report only; needs neither root nor apt-get
	 */
	async statusOnly(): Promise<RunReport> {
		const startTime = Date.now();
		const ctx: StepContext = {
			config: this.config,
			host: this.host,
			capabilities: await detectCapabilities(this.host),
			narrate: this.narrate,
		};
		const report = await this.runStep(statusStep, ctx, 1, 1);
		return {
			ok: report.outcome.status !== "fatal",
			steps: [report],
			summary: ctx.summary,
			durationMs: Date.now() - startTime,
		};
	}

	private async runStep(
		step: MaintenanceStep,
		ctx: StepContext,
		stepNum: number,
		total: number = this.steps.length,
	): Promise<StepReport> {
		this.logger.info(`Step ${stepNum}/${total}: ${step.title}`);
		this.narrate(`==> ${step.title}`);

		const stepStart = Date.now();
		let outcome: StepOutcome;
		try {
			outcome = await step.run(ctx);
		} catch (error) {
			// A step that throws has broken its own contract; stop the run
			const detail = error instanceof Error ? error.message : String(error);
			outcome = { status: "fatal", detail: `${step.title} threw: ${detail}` };
		}

		this.logOutcome(step.title, outcome);
		return {
			step: step.name,
			title: step.title,
			outcome,
			durationMs: Date.now() - stepStart,
		};
	}

	private logOutcome(title: string, outcome: StepOutcome): void {
		switch (outcome.status) {
			case "success":
				this.logger.info(`Completed: ${title}`);
				break;
			case "skipped":
				this.logger.info(`Skipped: ${title} - ${outcome.reason}`);
				this.narrate(`-- skipped: ${outcome.reason}`);
				break;
			case "tolerated":
				this.logger.warn(`Completed with tolerated failures: ${title} - ${outcome.detail}`);
				break;
			case "fatal":
				this.logger.error(`Failed: ${title} - ${outcome.detail}`);
				break;
		}
	}

	private abort(
		report: StepReport,
		detail: string,
		reports: StepReport[],
		startTime: number,
		ctx?: StepContext,
	): RunReport {
		this.logger.error(`Maintenance run aborted at ${report.title}: ${detail}`);
		this.narrate(`==> FAILED: ${report.title}: ${detail}`);
		return {
			ok: false,
			steps: reports,
			failedStep: report.step,
			summary: ctx?.summary,
			durationMs: Date.now() - startTime,
		};
	}
}
