import { readFile } from "node:fs/promises";
import { Logger } from "../../utility/Logger.js";

/**
 * Memory statistics
 */
export interface MemoryStats {
	totalBytes: number;
	usedBytes: number;
	freeBytes: number;
	availableBytes: number;
	buffersBytes: number;
	cachedBytes: number;
	totalGB: number;
	usedGB: number;
	freeGB: number;
	availableGB: number;
	percentUsed: number;
	swap: SwapStats;
	zram?: ZramStats;
}

/**
 * Swap statistics
 */
export interface SwapStats {
	totalBytes: number;
	usedBytes: number;
	freeBytes: number;
	totalGB: number;
	usedGB: number;
	freeGB: number;
	percentUsed: number;
}

/**
 * zram statistics
 */
export interface ZramStats {
	device: string;
	totalBytes: number;
	usedBytes: number;
	compressedBytes: number;
	compressionRatio: number;
	percentUsed: number;
}

export type TextReader = (path: string) => Promise<string>;

const ZRAM_SYSFS = "/sys/block/zram0";

function toGB(bytes: number): number {
	return Math.round((bytes / 1024 / 1024 / 1024) * 10) / 10;
}

function percentOf(part: number, whole: number): number {
	return whole > 0 ? Math.round((part / whole) * 100 * 10) / 10 : 0;
}

/**
 * Parse /proc/meminfo (kB values) into byte counts
 */
export function parseMeminfo(text: string): Omit<MemoryStats, "zram"> {
	const memInfo: Record<string, number> = {};
	for (const line of text.split("\n")) {
		const match = line.match(/^(\w+):\s+(\d+)/);
		if (match?.[1] && match[2]) {
			memInfo[match[1]] = Number.parseInt(match[2], 10) * 1024;
		}
	}

	const totalBytes = memInfo.MemTotal ?? 0;
	const freeBytes = memInfo.MemFree ?? 0;
	const availableBytes = memInfo.MemAvailable ?? 0;
	const buffersBytes = memInfo.Buffers ?? 0;
	const cachedBytes = memInfo.Cached ?? 0;
	const usedBytes = totalBytes - freeBytes - buffersBytes - cachedBytes;

	const swapTotalBytes = memInfo.SwapTotal ?? 0;
	const swapFreeBytes = memInfo.SwapFree ?? 0;
	const swapUsedBytes = swapTotalBytes - swapFreeBytes;

	return {
		totalBytes,
		usedBytes,
		freeBytes,
		availableBytes,
		buffersBytes,
		cachedBytes,
		totalGB: toGB(totalBytes),
		usedGB: toGB(usedBytes),
		freeGB: toGB(freeBytes),
		availableGB: toGB(availableBytes),
		percentUsed: percentOf(usedBytes, totalBytes),
		swap: {
			totalBytes: swapTotalBytes,
			usedBytes: swapUsedBytes,
			freeBytes: swapFreeBytes,
			totalGB: toGB(swapTotalBytes),
			usedGB: toGB(swapUsedBytes),
			freeGB: toGB(swapFreeBytes),
			percentUsed: percentOf(swapUsedBytes, swapTotalBytes),
		},
	};
}

/**
 * Memory monitor
 * Reads RAM, swap and zram figures from procfs/sysfs
 */
export class MemoryMonitor {
	private logger = Logger.getInstance();

	constructor(private readonly read: TextReader = (path) => readFile(path, "utf8")) { }

	async getMemoryStats(): Promise<MemoryStats> {
		const stats = parseMeminfo(await this.read("/proc/meminfo"));
		const zram = await this.getZramStats();
		return zram ? { ...stats, zram } : stats;
	}

	/**
	 * zram0 statistics, or null when there is no zram device
	 */
	async getZramStats(): Promise<ZramStats | null> {
		try {
			const [diskSize, memUsed, origDataSize] = await Promise.all([
				this.read(`${ZRAM_SYSFS}/disksize`),
				this.read(`${ZRAM_SYSFS}/mem_used_total`),
				this.read(`${ZRAM_SYSFS}/orig_data_size`),
			]);

			const totalBytes = Number.parseInt(diskSize.trim(), 10);
			const compressedBytes = Number.parseInt(memUsed.trim(), 10);
			const usedBytes = Number.parseInt(origDataSize.trim(), 10);
			if ([totalBytes, compressedBytes, usedBytes].some(Number.isNaN)) {
				return null;
			}

			const compressionRatio =
				usedBytes > 0 && compressedBytes > 0 ? usedBytes / compressedBytes : 1;

			return {
				device: "/dev/zram0",
				totalBytes,
				usedBytes,
				compressedBytes,
				compressionRatio: Math.round(compressionRatio * 100) / 100,
				percentUsed: percentOf(usedBytes, totalBytes),
			};
		} catch (error) {
			this.logger.debug(`No zram statistics: ${error}`);
			return null;
		}
	}

	/**
	 * Format memory stats for display
	 */
	formatMemoryStats(stats: MemoryStats): string {
		let output = "Memory:\n";
		output += `  Total: ${stats.totalGB} GB\n`;
		output += `  Used: ${stats.usedGB} GB (${stats.percentUsed}%)\n`;
		output += `  Available: ${stats.availableGB} GB\n`;

		output += "Swap:\n";
		output += `  Total: ${stats.swap.totalGB} GB\n`;
		output += `  Used: ${stats.swap.usedGB} GB (${stats.swap.percentUsed}%)\n`;

		if (stats.zram) {
			output += `zram (${stats.zram.device}):\n`;
			output += `  Size: ${toGB(stats.zram.totalBytes)} GB\n`;
			output += `  Compression Ratio: ${stats.zram.compressionRatio}x\n`;
			output += `  Usage: ${stats.zram.percentUsed}%\n`;
		}

		return output;
	}
}
