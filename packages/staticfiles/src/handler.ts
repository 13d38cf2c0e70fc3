/**
 * Static content handler
 *
 * Locates a resource, derives its metadata, evaluates the request's
 * conditional headers and produces a 200, 304 or 404 response.
 */

import {getLogger} from "@logtape/logtape";
import {type ConditionalHeaders, isModified} from "./conditional.js";
import {formatETag, makeETag} from "./etag.js";
import {type ResolvedResource, type ResourceRoot, locate} from "./locator.js";
import {mediaTypeFor} from "./media-type.js";

const logger = getLogger(["larder", "staticfiles"]);

// ============================================================================
// TYPES
// ============================================================================

export interface StaticRequest extends ConditionalHeaders {
	/** Percent-decoded path segments relative to the mount point */
	readonly path: readonly string[];
}

export interface StaticHeaders {
	"Content-Type"?: string;
	"Content-Length"?: string;
	"Last-Modified"?: string;
	ETag?: string;
	"Cache-Control"?: string;
}

/** Full resource; the body is read lazily, chunk by chunk */
export interface ServeFull {
	readonly status: 200;
	readonly headers: StaticHeaders;
	readonly body: AsyncIterable<Uint8Array>;
}

export interface ServeNotModified {
	readonly status: 304;
	readonly headers: StaticHeaders;
}

export interface ServeNotFound {
	readonly status: 404;
	readonly headers: StaticHeaders;
}

export type StaticResponse = ServeFull | ServeNotModified | ServeNotFound;

export interface StaticContentOptions {
	/** Generate ETags and honor If-None-Match (default: true) */
	etag?: boolean;
	/** Cache-Control header for 200 and 304 responses (default: none) */
	cacheControl?: string;
}

export type StaticContentHandler = (
	request: StaticRequest,
) => Promise<StaticResponse>;

// ============================================================================
// HANDLER
// ============================================================================

/**
 * Create a handler serving the files below a resource root
 *
 * @example
 * ```typescript
 * const handle = createStaticContentHandler(resourceRoot("./public"));
 * const response = await handle({path: ["css", "site.css"]});
 * ```
 */
export function createStaticContentHandler(
	root: ResourceRoot,
	options: StaticContentOptions = {},
): StaticContentHandler {
	const {etag: useETags = true, cacheControl} = options;

	return async function handleStaticContent(
		request: StaticRequest,
	): Promise<StaticResponse> {
		const resource = await locate(root, request.path);
		if (!resource) {
			return {status: 404, headers: {}};
		}

		const etag = useETags
			? makeETag(resource.lastModified, resource.length)
			: undefined;
		const headers: StaticHeaders = {
			"Last-Modified": new Date(resource.lastModified).toUTCString(),
		};
		if (etag) {
			headers.ETag = formatETag(etag);
		}
		if (cacheControl) {
			headers["Cache-Control"] = cacheControl;
		}

		if (!isModified(request, etag, resource.lastModified)) {
			logger.debug("Not modified: {path}", {path: resource.path.join("/")});
			return {status: 304, headers};
		}

		return {
			status: 200,
			headers: {
				"Content-Type": mediaTypeFor(resource.name),
				"Content-Length": String(resource.length),
				...headers,
			},
			body: readResource(resource),
		};
	};
}

async function* readResource(
	resource: ResolvedResource,
): AsyncGenerator<Uint8Array, void> {
	yield* resource.namespace.open(resource.path);
}
