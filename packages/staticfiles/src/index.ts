/**
 * @larder/staticfiles - Static content serving with conditional requests
 *
 * The core handler works on plain StaticRequest/StaticResponse values; the
 * middleware adapts it to Web Request/Response.
 */

export {OCTET_STREAM, mediaTypeFor} from "./media-type.js";
export {
	type ETag,
	type IfNoneMatch,
	makeETag,
	formatETag,
	parseIfNoneMatch,
} from "./etag.js";
export {
	type ConditionalHeaders,
	isModified,
	isModifiedSince,
	parseHTTPDate,
} from "./conditional.js";
export {
	type ResourceRoot,
	type ResolvedResource,
	resourceRoot,
	locate,
} from "./locator.js";
export {
	type StaticRequest,
	type StaticHeaders,
	type StaticResponse,
	type ServeFull,
	type ServeNotModified,
	type ServeNotFound,
	type StaticContentOptions,
	type StaticContentHandler,
	createStaticContentHandler,
} from "./handler.js";
export {
	type StaticFilesConfig,
	type Middleware,
	staticFiles,
	toResponse,
	default,
} from "./middleware.js";
