/**
 * Session Logger with Rotating Log Files
 *
 * Keeps up to 8 maintenance sessions in the configured log directory:
 * - current.log: the run in progress
 * - archive/run-1.log to archive/run-7.log: the previous 7 runs (rotated)
 *
 * Features:
 * - Level filtering (debug, info, warn, error)
 * - Rotation when a log directory is opened
 * - Console mirroring so narration lands in the session log
 * - Entries are discarded until a log directory is opened
 */

import * as fs from "node:fs";
import * as path from "node:path";

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
}

export type LogLevelName = "debug" | "info" | "warn" | "error";

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
};

const LEVEL_PREFIX = ["[DEBUG]", "[INFO]", "[WARN]", "[ERROR]"] as const;

export class Logger {
	private static instance: Logger;
	private logDir: string | null = null;
	private writeStream: fs.WriteStream | null = null;
	private maxLogs = 8; // current.log + 7 archived runs
	private minLevel: LogLevel = LogLevel.INFO;
	private streamFailed = false;

	private constructor() { }

	static getInstance(): Logger {
		if (!Logger.instance) {
			Logger.instance = new Logger();
		}
		return Logger.instance;
	}

	setLevel(level: LogLevelName): void {
		this.minLevel = LEVEL_BY_NAME[level];
	}

	/**
	 * Open (or switch to) a session log directory, rotating previous runs
	 */
	openLogDirectory(logDir: string): void {
		if (this.writeStream) {
			this.writeStream.end();
			this.writeStream = null;
		}

		this.logDir = logDir;
		this.streamFailed = false;
		fs.mkdirSync(this.archiveDir(), { recursive: true });
		this.rotateLogs();

		const header = `\n\nupkeep - maintenance run\nStarted: ${new Date().toISOString()}\n\n`;
		fs.writeFileSync(this.currentLogPath(), header);

		this.writeStream = fs.createWriteStream(this.currentLogPath(), {
			flags: "a",
			encoding: "utf8",
		});
		this.writeStream.on("error", (error) => {
			// process.stderr directly: console may be intercepted
			if (!this.streamFailed) {
				process.stderr.write(`upkeep: session log write failed: ${error.message}\n`);
			}
			this.streamFailed = true;
		});
	}

	/**
	 * current.log → archive/run-1.log → ... → archive/run-7.log → deleted
	 */
	private rotateLogs(): void {
		const current = this.currentLogPath();
		if (!fs.existsSync(current)) {
			return;
		}

		const oldest = this.archivePath(this.maxLogs - 1);
		if (fs.existsSync(oldest)) {
			fs.unlinkSync(oldest);
		}

		for (let i = this.maxLogs - 2; i >= 1; i--) {
			const from = this.archivePath(i);
			if (fs.existsSync(from)) {
				fs.renameSync(from, this.archivePath(i + 1));
			}
		}

		fs.renameSync(current, this.archivePath(1));
	}

	private _log(level: LogLevel, message: string): void {
		if (level < this.minLevel || !this.writeStream || this.streamFailed) {
			return;
		}

		const now = new Date();
		const hours = now.getHours().toString().padStart(2, "0");
		const minutes = now.getMinutes().toString().padStart(2, "0");
		const seconds = now.getSeconds().toString().padStart(2, "0");
		const millis = now.getMilliseconds().toString().padStart(3, "0");
		const timestamp = `${hours}:${minutes}:${seconds}.${millis}`;

		this.writeStream.write(`[${timestamp}] ${LEVEL_PREFIX[level]} ${message}\n`);
	}

	debug(message: string): void {
		this._log(LogLevel.DEBUG, message);
	}

	info(message: string): void {
		this._log(LogLevel.INFO, message);
	}

	warn(message: string): void {
		this._log(LogLevel.WARN, message);
	}

	error(message: string): void {
		this._log(LogLevel.ERROR, message);
	}

	/**
	 * End the write stream; resolves once buffered entries are flushed
	 */
	close(): Promise<void> {
		const stream = this.writeStream;
		this.writeStream = null;
		if (!stream) {
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			stream.end(() => resolve());
		});
	}

	private currentLogPath(): string {
		return path.join(this.requireLogDir(), "current.log");
	}

	private archiveDir(): string {
		return path.join(this.requireLogDir(), "archive");
	}

	private archivePath(index: number): string {
		return path.join(this.archiveDir(), `run-${index}.log`);
	}

	private requireLogDir(): string {
		if (!this.logDir) {
			throw new Error("Logger has no log directory open");
		}
		return this.logDir;
	}
}

/**
 * Mirror console output into the session log
 */
export function interceptConsole(): void {
	const logger = Logger.getInstance();

	const originalLog = console.log;
	const originalError = console.error;
	const originalWarn = console.warn;

	console.log = (...args: unknown[]) => {
		logger.info(args.map((arg) => String(arg)).join(" "));
		originalLog.apply(console, args);
	};

	console.error = (...args: unknown[]) => {
		logger.error(args.map((arg) => String(arg)).join(" "));
		originalError.apply(console, args);
	};

	console.warn = (...args: unknown[]) => {
		logger.warn(args.map((arg) => String(arg)).join(" "));
		originalWarn.apply(console, args);
	};
}
