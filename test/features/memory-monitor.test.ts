import { describe, it, expect } from "vitest";
import { MemoryMonitor, parseMeminfo } from "../../src/features/system-monitor/MemoryMonitor.js";
import { MEMINFO } from "../support/fake-host.js";

function reader(files: Record<string, string>) {
	return async (path: string): Promise<string> => {
		const content = files[path];
		if (content === undefined) {
			throw new Error(`ENOENT: ${path}`);
		}
		return content;
	};
}

describe("parseMeminfo", () => {
	it("converts kB values to bytes", () => {
		const stats = parseMeminfo(MEMINFO);

		expect(stats.totalBytes).toBe(1_024_000_000);
		expect(stats.usedBytes).toBe(512_000_000);
		expect(stats.availableBytes).toBe(512_000_000);
		expect(stats.percentUsed).toBe(50);
		expect(stats.totalGB).toBe(1);
		expect(stats.usedGB).toBe(0.5);
	});

	it("computes swap usage", () => {
		const { swap } = parseMeminfo(MEMINFO);

		expect(swap.totalBytes).toBe(512_000_000);
		expect(swap.usedBytes).toBe(102_400_000);
		expect(swap.percentUsed).toBe(20);
		expect(swap.usedGB).toBe(0.1);
	});

	it("reports zero swap usage when there is no swap", () => {
		const { swap } = parseMeminfo("MemTotal: 1000 kB\nSwapTotal: 0 kB\nSwapFree: 0 kB\n");
		expect(swap.percentUsed).toBe(0);
	});
});

describe("MemoryMonitor", () => {
	it("includes zram statistics when the device exists", async () => {
		const monitor = new MemoryMonitor(
			reader({
				"/proc/meminfo": MEMINFO,
				"/sys/block/zram0/disksize": "536870912\n",
				"/sys/block/zram0/mem_used_total": "50000000\n",
				"/sys/block/zram0/orig_data_size": "150000000\n",
			}),
		);

		const stats = await monitor.getMemoryStats();

		expect(stats.zram).toEqual({
			device: "/dev/zram0",
			totalBytes: 536_870_912,
			usedBytes: 150_000_000,
			compressedBytes: 50_000_000,
			compressionRatio: 3,
			percentUsed: 27.9,
		});
	});

	it("omits zram when there is no device", async () => {
		const monitor = new MemoryMonitor(reader({ "/proc/meminfo": MEMINFO }));

		const stats = await monitor.getMemoryStats();

		expect(stats.zram).toBeUndefined();
	});

	it("rejects when /proc/meminfo cannot be read", async () => {
		const monitor = new MemoryMonitor(reader({}));

		await expect(monitor.getMemoryStats()).rejects.toThrow("ENOENT: /proc/meminfo");
	});

	it("formats stats for display", () => {
		const monitor = new MemoryMonitor(reader({}));

		expect(monitor.formatMemoryStats(parseMeminfo(MEMINFO))).toBe(
			[
				"Memory:",
				"  Total: 1 GB",
				"  Used: 0.5 GB (50%)",
				"  Available: 0.5 GB",
				"Swap:",
				"  Total: 0.5 GB",
				"  Used: 0.1 GB (20%)",
				"",
			].join("\n"),
		);
	});
});
