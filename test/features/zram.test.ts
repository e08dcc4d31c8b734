import { describe, it, expect } from "vitest";
import { ZRAM_PRIORITY, renderZramConfig } from "../../src/features/host-maintenance/steps/zram.js";

describe("renderZramConfig", () => {
	it("sets size and priority and leaves the algorithm unset", () => {
		expect(renderZramConfig(50)).toBe(
			[
				"# Managed by upkeep (conservative defaults)",
				"PERCENT=50",
				"PRIORITY=100",
				"# ALGO is left unset so the kernel default applies; no compression level is pinned.",
				"",
			].join("\n"),
		);
	});

	it("writes exactly one PERCENT line", () => {
		const lines = renderZramConfig(75).split("\n");
		expect(lines.filter((line) => line.startsWith("PERCENT="))).toEqual(["PERCENT=75"]);
		expect(lines.some((line) => line.startsWith("ALGO="))).toBe(false);
		expect(ZRAM_PRIORITY).toBe(100);
	});
});
