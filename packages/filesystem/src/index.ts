/**
 * @larder/filesystem - Read-only resource namespaces
 *
 * A namespace is either a directory on disk (NodeResources) or an
 * in-memory bundle of bytes shipped with the program (MemoryResources).
 */

export {
	type ResourceStat,
	type ResourceNamespace,
	type StatOptions,
	CHUNK_SIZE,
	ResourceReadError,
	hasPrefix,
	isErrnoException,
	isSafeSegment,
	splitPath,
	toWholeSeconds,
} from "./types.js";
export {NodeResources} from "./node.js";
export {
	MemoryResources,
	PROCESS_START_TIME,
	type BundleContent,
	type BundleEntry,
	type MemoryResourcesOptions,
} from "./memory.js";
