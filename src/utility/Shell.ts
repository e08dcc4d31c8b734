/**
 * Shell Utility - Execute system commands with proper error handling
 *
 * Features:
 * - Async-only API, promises never reject
 * - Argument-vector execution (no shell quoting) and bash command lines
 * - Timeout support: SIGTERM, then SIGKILL after a grace period
 * - Structured result with exit code, stdout, stderr
 * - Optional streaming callbacks for real-time output
 */

import { spawn } from "node:child_process";
import { Logger } from "./Logger.js";

export interface ShellResult {
	exitCode: number;
	stdout: string;
	stderr: string;
	timedOut: boolean;
	command: string;
}

export interface ShellOptions {
	timeout?: number; // Timeout in milliseconds (default: 30000, 0 disables)
	killGrace?: number; // Wait after SIGTERM before SIGKILL (default: 5000)
	onStdout?: (line: string) => void; // Callback for each stdout line
	onStderr?: (line: string) => void; // Callback for each stderr line
	cwd?: string;
	env?: Record<string, string>; // Added to the inherited environment
	logCommand?: boolean; // Log command execution (default: true)
}

export class Shell {
	private static logger = Logger.getInstance();

	private constructor() {
		// Prevent instantiation - this is a static utility class
	}

	/**
	 * Run a program with an argument vector
	 */
	static async run(
		argv: readonly string[],
		options: ShellOptions = {},
	): Promise<ShellResult> {
		const [file, ...args] = argv;
		if (!file) {
			return {
				exitCode: -1,
				stdout: "",
				stderr: "empty command",
				timedOut: false,
				command: "",
			};
		}
		return this.spawnProcess(file, args, argv.join(" "), options);
	}

	/**
	 * Execute a command line through bash -c
	 */
	static async execute(
		command: string,
		options: ShellOptions = {},
	): Promise<ShellResult> {
		return this.spawnProcess("bash", ["-c", command], command, options);
	}

	/**
	 * Check if a command resolves on PATH
	 */
	static async commandExists(name: string): Promise<boolean> {
		if (!/^[\w.+-]+$/.test(name)) {
			return false;
		}
		const result = await this.execute(`command -v ${name}`, {
			timeout: 5000,
			logCommand: false,
		});
		return result.exitCode === 0;
	}

	private static spawnProcess(
		file: string,
		args: string[],
		command: string,
		options: ShellOptions,
	): Promise<ShellResult> {
		const {
			timeout = 30000,
			killGrace = 5000,
			onStdout,
			onStderr,
			cwd,
			env,
			logCommand = true,
		} = options;

		if (logCommand) {
			this.logger.debug(`Executing: ${command}`);
		}

		return new Promise((resolve) => {
			const proc = spawn(file, args, {
				stdio: ["ignore", "pipe", "pipe"],
				cwd,
				env: { ...process.env, ...env },
			});

			let stdout = "";
			let stderr = "";
			let completed = false;
			let timedOut = false;
			let timeoutHandle: NodeJS.Timeout | undefined;
			let killHandle: NodeJS.Timeout | undefined;

			const finish = (result: Omit<ShellResult, "stdout" | "command">) => {
				if (completed) return;
				completed = true;
				if (timeoutHandle) clearTimeout(timeoutHandle);
				if (killHandle) clearTimeout(killHandle);
				resolve({ ...result, stdout, command });
			};

			if (timeout > 0) {
				timeoutHandle = setTimeout(() => {
					if (completed) return;
					timedOut = true;
					this.logger.warn(`Command timed out after ${timeout}ms: ${command}`);
					proc.kill("SIGTERM");
					killHandle = setTimeout(() => {
						this.logger.warn(`Command ignored SIGTERM, killing: ${command}`);
						proc.kill("SIGKILL");
					}, killGrace);
				}, timeout);
			}

			proc.stdout.on("data", (data: Buffer) => {
				const text = data.toString();
				stdout += text;
				if (onStdout) {
					for (const line of text.split("\n")) {
						if (line.trim()) onStdout(line);
					}
				}
			});

			proc.stderr.on("data", (data: Buffer) => {
				const text = data.toString();
				stderr += text;
				if (onStderr) {
					for (const line of text.split("\n")) {
						if (line.trim()) onStderr(line);
					}
				}
			});

			proc.on("exit", () => {
				if (!timedOut) return;
				// Descendants may still hold the pipes open; stop waiting for them
				proc.stdout.destroy();
				proc.stderr.destroy();
				finish({
					exitCode: -1,
					stderr: stderr || `Timed out after ${timeout}ms`,
					timedOut: true,
				});
			});

			proc.on("close", (code) => {
				// null code: terminated by a signal
				finish({ exitCode: code ?? -1, stderr, timedOut });
			});

			proc.on("error", (err) => {
				this.logger.error(`Command error: ${err.message}`);
				finish({ exitCode: -1, stderr: err.message, timedOut: false });
			});
		});
	}
}
