/**
 * Node.js filesystem namespace
 *
 * Serves the files below a root directory using the fs module. Lookups are
 * canonicalized with realpath, so a symlink that leads outside of the root
 * is reported as missing.
 */

import * as FS from "fs/promises";
import * as Path from "path";
import {getLogger} from "@logtape/logtape";
import {
	type ResourceNamespace,
	type ResourceStat,
	type StatOptions,
	CHUNK_SIZE,
	ResourceReadError,
	hasPrefix,
	isErrnoException,
	isSafeSegment,
	toWholeSeconds,
} from "./types.js";

const logger = getLogger(["larder", "filesystem"]);

/** errno codes that mean there is nothing readable at a path */
const MISSING_CODES = new Set([
	"ENOENT",
	"ENOTDIR",
	"EACCES",
	"EPERM",
	"ELOOP",
	"ENAMETOOLONG",
]);

/**
 * Directory-backed resource namespace
 */
export class NodeResources implements ResourceNamespace {
	readonly name: string;
	#rootPath: string;

	constructor(rootPath: string) {
		this.#rootPath = Path.resolve(rootPath);
		this.name = Path.basename(this.#rootPath) || "root";
	}

	/** Absolute path of the root directory */
	get rootPath(): string {
		return this.#rootPath;
	}

	async stat(
		path: readonly string[],
		options: StatOptions = {},
	): Promise<ResourceStat | null> {
		const within = options.within ?? [];
		const fullPath = this.#resolvePath(path);
		const boundaryPath = this.#resolvePath(within);
		if (
			fullPath === null ||
			boundaryPath === null ||
			!hasPrefix(path, within)
		) {
			return null;
		}

		try {
			const [root, boundary, target] = await Promise.all([
				FS.realpath(this.#rootPath),
				FS.realpath(boundaryPath),
				FS.realpath(fullPath),
			]);
			if (!isWithin(root, boundary) || !isWithin(boundary, target)) {
				logger.debug("Path {path} in {namespace} resolves outside of {boundary}", {
					path: path.join("/"),
					namespace: this.name,
					boundary,
				});
				return null;
			}

			const stats = await FS.stat(target);
			const lastModified = toWholeSeconds(stats.mtimeMs);
			if (stats.isDirectory()) {
				return {kind: "directory", size: 0, lastModified};
			} else if (!stats.isFile()) {
				return null;
			}

			await FS.access(target, FS.constants.R_OK);
			return {kind: "file", size: stats.size, lastModified};
		} catch (error) {
			if (isErrnoException(error) && MISSING_CODES.has(error.code ?? "")) {
				return null;
			}
			throw error;
		}
	}

	async *open(path: readonly string[]): AsyncGenerator<Uint8Array, void> {
		const fullPath = this.#resolvePath(path);
		if (fullPath === null) {
			throw new ResourceReadError(path);
		}

		const handle = await FS.open(fullPath, "r").catch((error: unknown) => {
			throw new ResourceReadError(path, {cause: error});
		});
		try {
			for (;;) {
				const buffer = new Uint8Array(CHUNK_SIZE);
				const {bytesRead} = await handle
					.read(buffer, 0, CHUNK_SIZE, null)
					.catch((error: unknown) => {
						throw new ResourceReadError(path, {cause: error});
					});
				if (bytesRead === 0) {
					break;
				}
				yield buffer.subarray(0, bytesRead);
			}
		} finally {
			await handle.close();
		}
	}

	#resolvePath(path: readonly string[]): string | null {
		// Unsafe segments never reach the filesystem
		if (!path.every(isSafeSegment)) {
			return null;
		}

		return Path.join(this.#rootPath, ...path);
	}
}

/**
 * Whether target is root itself or lies below it
 */
function isWithin(root: string, target: string): boolean {
	const relative = Path.relative(root, target);
	return (
		relative === "" ||
		(relative !== ".." &&
			!relative.startsWith(".." + Path.sep) &&
			!Path.isAbsolute(relative))
	);
}
