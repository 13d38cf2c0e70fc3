/**
 * In-memory resource bundle
 *
 * Holds byte blobs that ship with the program instead of living on disk,
 * addressed by slash-separated keys such as "static/d1/r3.txt".
 */

import {
	type ResourceNamespace,
	type ResourceStat,
	type StatOptions,
	CHUNK_SIZE,
	ResourceReadError,
	hasPrefix,
	isSafeSegment,
	splitPath,
	toWholeSeconds,
} from "./types.js";

export type BundleContent = string | Uint8Array;

export interface BundleEntry {
	content: BundleContent;
	/** Modification time in epoch milliseconds (default: PROCESS_START_TIME) */
	lastModified?: number;
}

export interface MemoryResourcesOptions {
	/** Name included in debug logs (default: "bundle") */
	name?: string;
	/** Modification time for entries that do not carry one */
	lastModified?: number;
}

/**
 * When the process started, truncated to whole seconds so that it survives
 * a round trip through an HTTP date unchanged
 */
export const PROCESS_START_TIME = toWholeSeconds(performance.timeOrigin);

interface MemoryFile {
	content: Uint8Array;
	lastModified: number;
}

interface MemoryDirectory {
	files: Map<string, MemoryFile>;
	directories: Map<string, MemoryDirectory>;
}

function createDirectory(): MemoryDirectory {
	return {files: new Map(), directories: new Map()};
}

function isBundleEntry(
	value: BundleContent | BundleEntry,
): value is BundleEntry {
	return typeof value === "object" && !(value instanceof Uint8Array);
}

/**
 * Bundle-backed resource namespace. Contents are fixed at construction.
 */
export class MemoryResources implements ResourceNamespace {
	readonly name: string;
	#root: MemoryDirectory;
	#lastModified: number;

	constructor(
		entries: Record<string, BundleContent | BundleEntry>,
		options: MemoryResourcesOptions = {},
	) {
		this.name = options.name ?? "bundle";
		this.#lastModified = toWholeSeconds(
			options.lastModified ?? PROCESS_START_TIME,
		);
		this.#root = createDirectory();

		const encoder = new TextEncoder();
		for (const [key, value] of Object.entries(entries)) {
			const entry: BundleEntry = isBundleEntry(value) ? value : {content: value};
			this.#add(key, {
				content:
					typeof entry.content === "string"
						? encoder.encode(entry.content)
						: entry.content,
				lastModified:
					entry.lastModified === undefined
						? this.#lastModified
						: toWholeSeconds(entry.lastModified),
			});
		}
	}

	async stat(
		path: readonly string[],
		options: StatOptions = {},
	): Promise<ResourceStat | null> {
		// Bundles have no links, so staying inside `within` is a path check
		if (options.within && !hasPrefix(path, options.within)) {
			return null;
		}

		const entry = this.#resolvePath(path);
		if (!entry) {
			return null;
		} else if ("content" in entry) {
			return {
				kind: "file",
				size: entry.content.byteLength,
				lastModified: entry.lastModified,
			};
		}

		return {kind: "directory", size: 0, lastModified: this.#lastModified};
	}

	async *open(path: readonly string[]): AsyncGenerator<Uint8Array, void> {
		const entry = this.#resolvePath(path);
		if (!entry || !("content" in entry)) {
			throw new ResourceReadError(path);
		}

		const {content} = entry;
		for (let offset = 0; offset < content.byteLength; offset += CHUNK_SIZE) {
			yield content.subarray(offset, offset + CHUNK_SIZE);
		}
	}

	#add(key: string, file: MemoryFile): void {
		const parts = splitPath(key);
		const name = parts.pop();
		if (
			name === undefined ||
			!isSafeSegment(name) ||
			!parts.every(isSafeSegment)
		) {
			throw new TypeError(`Invalid bundle path: ${JSON.stringify(key)}`);
		}

		let current = this.#root;
		for (const part of parts) {
			if (current.files.has(part)) {
				throw new TypeError(`Bundle path ${key} passes through a file`);
			}
			let next = current.directories.get(part);
			if (!next) {
				next = createDirectory();
				current.directories.set(part, next);
			}
			current = next;
		}

		if (current.files.has(name) || current.directories.has(name)) {
			throw new TypeError(`Duplicate bundle path: ${key}`);
		}
		current.files.set(name, file);
	}

	#resolvePath(path: readonly string[]): MemoryFile | MemoryDirectory | null {
		if (!path.every(isSafeSegment)) {
			return null;
		}

		let current = this.#root;
		for (let i = 0; i < path.length; i++) {
			const part = path[i];
			if (i === path.length - 1) {
				const file = current.files.get(part);
				if (file) return file;
			}

			const next = current.directories.get(part);
			if (!next) return null;
			current = next;
		}

		return current;
	}
}
