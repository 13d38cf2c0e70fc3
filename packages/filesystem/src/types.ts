/**
 * Core resource namespace interface, errors and path validation
 */

// ============================================================================
// CORE TYPES
// ============================================================================

/**
 * Metadata for an entry in a resource namespace
 */
export interface ResourceStat {
	kind: "file" | "directory";
	/** Size in bytes (0 for directories) */
	size: number;
	/** Last modification time in epoch milliseconds, in whole seconds */
	lastModified: number;
}

export interface StatOptions {
	/**
	 * Leading segments of `path` that act as the boundary for this lookup:
	 * an entry that resolves outside of them (for example through a symlink)
	 * is reported as missing. Must be a prefix of `path`.
	 */
	within?: readonly string[];
}

/**
 * Read-only, path-addressed store of byte blobs.
 *
 * Paths are arrays of already-decoded segments relative to the namespace
 * root. Implementations never resolve a path outside their root: such
 * paths are reported as missing.
 */
export interface ResourceNamespace {
	/** Human readable name, included in debug logs */
	readonly name: string;

	/**
	 * Look up an entry
	 * @returns Entry metadata, or null if it does not exist, is not readable
	 * or lies outside of `options.within`
	 */
	stat(
		path: readonly string[],
		options?: StatOptions,
	): Promise<ResourceStat | null>;

	/**
	 * Stream a file's bytes in chunks.
	 * Nothing is opened until the first chunk is requested, and ending the
	 * iteration early releases the underlying handle.
	 * @throws ResourceReadError if the file cannot be read
	 */
	open(path: readonly string[]): AsyncIterable<Uint8Array>;
}

/**
 * Truncate epoch milliseconds to whole seconds, the resolution of HTTP
 * dates, so a Last-Modified value echoed back compares equal
 */
export function toWholeSeconds(time: number): number {
	return Math.floor(time / 1000) * 1000;
}

/** Size of the chunks yielded by `ResourceNamespace.open` */
export const CHUNK_SIZE = 64 * 1024;

// ============================================================================
// ERRORS
// ============================================================================

/**
 * A resource could not be read, typically because it changed or disappeared
 * after it was located
 */
export class ResourceReadError extends Error {
	readonly path: string;

	constructor(path: readonly string[], options?: {cause?: unknown}) {
		const joined = path.join("/");
		super(`Failed to read resource: ${joined}`, options);
		this.name = "ResourceReadError";
		this.path = joined;
	}
}

/**
 * Whether `path` starts with all of `prefix`
 */
export function hasPrefix(
	path: readonly string[],
	prefix: readonly string[],
): boolean {
	return (
		prefix.length <= path.length &&
		prefix.every((segment, i) => path[i] === segment)
	);
}

/** Type guard for Node.js errors with error codes */
export function isErrnoException(
	error: unknown,
): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}

// ============================================================================
// PATH VALIDATION
// ============================================================================

const DRIVE_LETTER = /^[a-zA-Z]:/;

/**
 * Whether a decoded path segment names a child of the current directory.
 * Rejects empty names, "." and "..", separators, NUL bytes and Windows
 * drive letters.
 */
export function isSafeSegment(segment: string): boolean {
	return (
		segment !== "" &&
		segment !== "." &&
		segment !== ".." &&
		!segment.includes("/") &&
		!segment.includes("\\") &&
		!segment.includes("\0") &&
		!DRIVE_LETTER.test(segment)
	);
}

/**
 * Split a slash-separated path into segments, ignoring empty ones
 */
export function splitPath(path: string): string[] {
	return path.split("/").filter(Boolean);
}
