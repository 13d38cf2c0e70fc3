import {mkdirSync, mkdtempSync, rmSync, utimesSync, writeFileSync} from "fs";
import {tmpdir} from "os";
import {join} from "path";

/** Modification time given to every fixture file */
export const FIXTURE_MTIME = 1700000000000;

export interface TestFiles {
	/** Directory holding the files */
	root: string;
	/** Parent of root, for files that must stay unreachable */
	outside: string;
	cleanup(): void;
}

/**
 * Create a temporary tree:
 *
 *     f1, f2, img.gif, d1/f3, d1/d2/f4
 *
 * plus ../secret.txt next to the root.
 */
export function createTestFiles(): TestFiles {
	const outside = mkdtempSync(join(tmpdir(), "larder-static-test-"));
	const root = join(outside, "root");
	mkdirSync(join(root, "d1", "d2"), {recursive: true});

	const files: Record<string, string> = {
		f1: "f1 content",
		f2: "f2 content",
		"img.gif": "img content",
		"d1/f3": "f3 content",
		"d1/d2/f4": "f4 content",
	};
	for (const [name, content] of Object.entries(files)) {
		const path = join(root, name);
		writeFileSync(path, content);
		utimesSync(path, FIXTURE_MTIME / 1000, FIXTURE_MTIME / 1000);
	}
	writeFileSync(join(outside, "secret.txt"), "do not serve");

	return {
		root,
		outside,
		cleanup() {
			rmSync(outside, {recursive: true, force: true});
		},
	};
}

export async function readBody(
	chunks: AsyncIterable<Uint8Array>,
): Promise<string> {
	const parts: Uint8Array[] = [];
	for await (const chunk of chunks) {
		parts.push(chunk);
	}
	return Buffer.concat(parts).toString("utf8");
}
