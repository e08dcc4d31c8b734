import { randomBytes } from "node:crypto";
import { chmod, link, open, rm } from "node:fs/promises";
import * as path from "node:path";

function isAlreadyExists(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "EEXIST";
}

/**
 * Create `target` only if nothing is at that path yet. The content is written
 * to a temporary sibling and hard-linked into place, so `target` never appears
 * half-written and a file created in the meantime is never replaced.
 * Resolves false when `target` already exists.
 */
export async function createFileAtomic(
	target: string,
	content: string,
	mode: number,
): Promise<boolean> {
	const dir = path.dirname(target);
	const tmpPath = path.join(
		dir,
		`.${path.basename(target)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`,
	);

	try {
		const handle = await open(tmpPath, "wx", mode);
		try {
			await handle.writeFile(content, "utf8");
			await handle.sync();
		} finally {
			await handle.close();
		}
		// open() honours the umask; the final mode must not
		await chmod(tmpPath, mode);
		try {
			await link(tmpPath, target);
		} catch (error) {
			if (isAlreadyExists(error)) return false;
			throw error;
		}
		return true;
	} finally {
		await rm(tmpPath, { force: true });
	}
}
