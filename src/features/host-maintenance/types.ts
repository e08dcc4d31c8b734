import type { UpkeepConfig } from "../../config/index.js";
import type { MemoryStats } from "../system-monitor/MemoryMonitor.js";
import type { Capabilities } from "./Capabilities.js";
import type { Host } from "./Host.js";

export type StepName =
	| "preconditions"
	| "repair"
	| "update"
	| "cleanup"
	| "logs"
	| "zram"
	| "flatpak"
	| "status";

export type StepOutcome =
	| { status: "success" }
	| { status: "skipped"; reason: string }
	| { status: "tolerated"; detail: string }
	| { status: "fatal"; detail: string };

export type FatalOutcome = Extract<StepOutcome, { status: "fatal" }>;

export interface StepReport {
	step: StepName;
	title: string;
	outcome: StepOutcome;
	durationMs: number;
}

export interface StatusSummary {
	kernel?: string;
	rootUsagePercent?: number;
	failedUnits: string[];
	rebootRequired: boolean;
	rebootPackages: string[];
	memory?: MemoryStats;
}

export interface RunReport {
	ok: boolean;
	steps: StepReport[];
	failedStep?: StepName;
	summary?: StatusSummary;
	durationMs: number;
}

export type Narrator = (line: string) => void;

export interface StepContext {
	config: UpkeepConfig;
	host: Host;
	capabilities: Capabilities;
	narrate: Narrator;
	// Filled in by the status step
	summary?: StatusSummary;
}

export interface MaintenanceStep {
	name: StepName;
	title: string;
	run(ctx: StepContext): Promise<StepOutcome>;
}
