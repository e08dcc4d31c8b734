import type { CommandOptions, Host } from "../../src/features/host-maintenance/Host.js";
import type { ShellResult } from "../../src/utility/Shell.js";

export interface RecordedCall {
	command: string;
	options?: CommandOptions;
}

interface ScriptedResult {
	prefix: string;
	result: Partial<Omit<ShellResult, "command">>;
}

export const ALL_TOOLS = [
	"apt-get",
	"logrotate",
	"journalctl",
	"systemd-tmpfiles",
	"systemctl",
	"flatpak",
];

export const MEMINFO = [
	"MemTotal:        1000000 kB",
	"MemFree:          200000 kB",
	"MemAvailable:     500000 kB",
	"Buffers:           50000 kB",
	"Cached:           250000 kB",
	"SwapTotal:        500000 kB",
	"SwapFree:         400000 kB",
	"",
].join("\n");

/**
 * In-process stand-in for the machine: records every call, answers from a script
 */
export class FakeHost implements Host {
	root = true;
	tools = new Set(ALL_TOOLS);
	files = new Map<string, string>([["/proc/meminfo", MEMINFO]]);
	modes = new Map<string, number>();
	failWrites = false;
	/** Files that show up between the existence check and the create */
	lateFiles = new Map<string, string>();

	calls: RecordedCall[] = [];
	lookups: string[] = [];
	writes: string[] = [];

	private scripted: ScriptedResult[] = [
		// dphys-swapfile inactive, zram-tools not installed
		{ prefix: "systemctl is-active", result: { exitCode: 3 } },
		{ prefix: "dpkg -s zram-tools", result: { exitCode: 1 } },
	];

	/**
	 * Answer commands starting with `prefix`; later entries win
	 */
	respond(prefix: string, result: Partial<Omit<ShellResult, "command">>): this {
		this.scripted.push({ prefix, result });
		return this;
	}

	without(...tools: string[]): this {
		for (const tool of tools) this.tools.delete(tool);
		return this;
	}

	commands(): string[] {
		return this.calls.map((call) => call.command);
	}

	isRoot(): boolean {
		return this.root;
	}

	async commandExists(name: string): Promise<boolean> {
		this.lookups.push(name);
		return this.tools.has(name);
	}

	async run(argv: readonly string[], options?: CommandOptions): Promise<ShellResult> {
		const command = argv.join(" ");
		this.calls.push({ command, options });
		const match = [...this.scripted].reverse().find((entry) => command.startsWith(entry.prefix));
		return {
			exitCode: 0,
			stdout: "",
			stderr: "",
			timedOut: false,
			...match?.result,
			command,
		};
	}

	async fileExists(path: string): Promise<boolean> {
		return this.files.has(path);
	}

	async readFile(path: string): Promise<string> {
		const content = this.files.get(path);
		if (content === undefined) {
			throw new Error(`ENOENT: no such file or directory, open '${path}'`);
		}
		return content;
	}

	async createFileAtomic(path: string, content: string, mode: number): Promise<boolean> {
		if (this.failWrites) {
			throw new Error(`EROFS: read-only file system, open '${path}'`);
		}
		const late = this.lateFiles.get(path);
		if (late !== undefined) {
			this.files.set(path, late);
			return false;
		}
		if (this.files.has(path)) return false;
		this.writes.push(path);
		this.files.set(path, content);
		this.modes.set(path, mode);
		return true;
	}
}
