/**
 * Resource location: request path + configured root -> file or nothing
 */

import {
	type ResourceNamespace,
	NodeResources,
	isSafeSegment,
	splitPath,
} from "@larder/filesystem";
import {getLogger} from "@logtape/logtape";

const logger = getLogger(["larder", "staticfiles"]);

/**
 * Where static content comes from: a namespace and a base prefix inside it.
 * Built once at setup with `resourceRoot` and never mutated.
 */
export interface ResourceRoot {
	readonly namespace: ResourceNamespace;
	readonly prefix: readonly string[];
}

/**
 * A located, existing, readable file strictly inside its root. For
 * directories that holds after symlinks are resolved: the prefix, not just
 * the namespace root, is the boundary.
 */
export interface ResolvedResource {
	readonly namespace: ResourceNamespace;
	/** Full path inside the namespace, prefix included */
	readonly path: readonly string[];
	/** Last path segment, used to guess the media type */
	readonly name: string;
	/** Size in bytes */
	readonly length: number;
	/** Modification time in epoch milliseconds */
	readonly lastModified: number;
}

/**
 * Create a resource root.
 *
 * @param source - A directory path, or a namespace such as a MemoryResources bundle
 * @param prefix - Base path inside the namespace, as segments or "a/b"
 *
 * @example
 * resourceRoot("./public");
 * resourceRoot(new MemoryResources(bundle), "static/content");
 */
export function resourceRoot(
	source: string | ResourceNamespace,
	prefix: string | readonly string[] = [],
): ResourceRoot {
	const segments = typeof prefix === "string" ? splitPath(prefix) : [...prefix];
	const invalid = segments.find((segment) => !isSafeSegment(segment));
	if (invalid !== undefined) {
		throw new TypeError(
			`Invalid resource prefix segment: ${JSON.stringify(invalid)}`,
		);
	}

	return Object.freeze({
		namespace:
			typeof source === "string" ? new NodeResources(source) : source,
		prefix: Object.freeze(segments),
	});
}

/**
 * Resolve request path segments against a root.
 *
 * Returns undefined when the path is missing, a directory, unreadable, or
 * would escape the root; callers cannot tell these cases apart.
 */
export async function locate(
	root: ResourceRoot,
	path: readonly string[],
): Promise<ResolvedResource | undefined> {
	const invalid = path.find((segment) => !isSafeSegment(segment));
	if (invalid !== undefined) {
		logger.debug("Rejected segment {segment} in path {path} of {namespace}", {
			segment: invalid,
			path: path.join("/"),
			namespace: root.namespace.name,
		});
		return undefined;
	} else if (path.length === 0) {
		return undefined;
	}

	const fullPath = [...root.prefix, ...path];
	const stat = await root.namespace.stat(fullPath, {within: root.prefix});
	if (!stat || stat.kind !== "file") {
		return undefined;
	}

	return {
		namespace: root.namespace,
		path: fullPath,
		name: path[path.length - 1],
		length: stat.size,
		lastModified: stat.lastModified,
	};
}
