/**
 * Project root utilities
 */

import {existsSync, readFileSync} from "fs";
import {dirname, join} from "path";

/**
 * Find the project root by looking for the nearest package.json.
 * Starts from startDir and walks up the directory tree.
 *
 * @returns The directory containing package.json, or startDir if not found
 */
export function findProjectRoot(startDir: string = process.cwd()): string {
	let dir = startDir;
	while (dir !== dirname(dir)) {
		if (existsSync(join(dir, "package.json"))) {
			return dir;
		}
		dir = dirname(dir);
	}
	return startDir;
}

/**
 * Version of the package whose package.json is nearest to startDir
 */
export function readPackageVersion(startDir: string): string {
	const content = readFileSync(
		join(findProjectRoot(startDir), "package.json"),
		"utf-8",
	);
	const pkgJSON: unknown = JSON.parse(content);
	if (
		typeof pkgJSON === "object" &&
		pkgJSON !== null &&
		"version" in pkgJSON &&
		typeof pkgJSON.version === "string"
	) {
		return pkgJSON.version;
	}
	return "0.0.0";
}
