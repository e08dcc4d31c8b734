import { access, readFile } from "node:fs/promises";
import { createFileAtomic } from "../../utility/AtomicFile.js";
import { Logger } from "../../utility/Logger.js";
import { Shell, type ShellResult } from "../../utility/Shell.js";

export interface CommandOptions {
	env?: Record<string, string>;
	timeout?: number; // milliseconds, 0 disables
	quiet?: boolean; // do not stream output to the terminal
}

/**
 * Everything a maintenance step does to the machine goes through a Host
 */
export interface Host {
	isRoot(): boolean;
	commandExists(name: string): Promise<boolean>;
	run(argv: readonly string[], options?: CommandOptions): Promise<ShellResult>;
	fileExists(path: string): Promise<boolean>;
	readFile(path: string): Promise<string>;
	/** Resolves false, leaving the file alone, when `path` already exists */
	createFileAtomic(path: string, content: string, mode: number): Promise<boolean>;
}

/**
 * The machine this process runs on
 */
export class SystemHost implements Host {
	private logger = Logger.getInstance();

	constructor(
		private readonly stdout: NodeJS.WritableStream = process.stdout,
		private readonly stderr: NodeJS.WritableStream = process.stderr,
	) { }

	isRoot(): boolean {
		return typeof process.geteuid === "function" && process.geteuid() === 0;
	}

	commandExists(name: string): Promise<boolean> {
		return Shell.commandExists(name);
	}

	run(argv: readonly string[], options: CommandOptions = {}): Promise<ShellResult> {
		const { env, timeout = 0, quiet = false } = options;
		return Shell.run(argv, {
			env,
			timeout,
			onStdout: (line) => {
				this.logger.debug(`  ${line}`);
				if (!quiet) this.stdout.write(`${line}\n`);
			},
			onStderr: (line) => {
				this.logger.debug(`  [stderr] ${line}`);
				if (!quiet) this.stderr.write(`${line}\n`);
			},
		});
	}

	async fileExists(path: string): Promise<boolean> {
		try {
			await access(path);
			return true;
		} catch {
			return false;
		}
	}

	readFile(path: string): Promise<string> {
		return readFile(path, "utf8");
	}

	createFileAtomic(path: string, content: string, mode: number): Promise<boolean> {
		return createFileAtomic(path, content, mode);
	}
}
