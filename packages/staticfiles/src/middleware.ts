/**
 * Static files middleware for Web Request/Response servers
 *
 * Maps the URL path below a mount point onto a resource root and converts
 * the handler's StaticResponse into a Response with a streaming body.
 * Requests outside of the mount point pass through (undefined).
 */

import {type ResourceNamespace, splitPath} from "@larder/filesystem";
import {MethodNotAllowed} from "@larder/http-errors";
import {getLogger} from "@logtape/logtape";
import {parseHTTPDate} from "./conditional.js";
import {parseIfNoneMatch} from "./etag.js";
import {
	type StaticContentOptions,
	type StaticResponse,
	createStaticContentHandler,
} from "./handler.js";
import {resourceRoot} from "./locator.js";

const logger = getLogger(["larder", "staticfiles"]);

const ALLOWED_METHODS = "GET, HEAD";

export interface StaticFilesConfig extends StaticContentOptions {
	/** Directory path or resource namespace to serve from */
	root: string | ResourceNamespace;
	/** Base path inside the root (default: the root itself) */
	resourcePrefix?: string | readonly string[];
	/** URL path the files are served under (default: "/") */
	mount?: string | readonly string[];
}

export type Middleware = (request: Request) => Promise<Response | undefined>;

/**
 * Create static files middleware
 *
 * @example
 * ```typescript
 * const middleware = staticFiles({root: "./public", mount: "/static"});
 * const response = await middleware(request); // undefined if not under /static
 * ```
 */
export function staticFiles(config: StaticFilesConfig): Middleware {
	const {root, resourcePrefix, mount = [], ...options} = config;
	const handle = createStaticContentHandler(
		resourceRoot(root, resourcePrefix),
		options,
	);
	const mountPath = typeof mount === "string" ? splitPath(mount) : [...mount];

	return async function staticFilesMiddleware(
		request: Request,
	): Promise<Response | undefined> {
		const url = new URL(request.url);
		const segments = url.pathname.split("/").slice(1).map(decodeSegment);
		if (!mountPath.every((segment, i) => segments[i] === segment)) {
			return undefined;
		}

		if (request.method !== "GET" && request.method !== "HEAD") {
			return new MethodNotAllowed(undefined, {
				headers: {Allow: ALLOWED_METHODS},
			}).toResponse();
		}

		const path = segments.slice(mountPath.length);
		let result: StaticResponse;
		if (isDecoded(path)) {
			result = await handle({
				path,
				ifModifiedSince: parseHTTPDate(request.headers.get("If-Modified-Since")),
				ifNoneMatch: parseIfNoneMatch(request.headers.get("If-None-Match")),
			});
		} else {
			result = {status: 404, headers: {}};
		}

		logger.debug("{method} {pathname} {status}", {
			method: request.method,
			pathname: url.pathname,
			status: result.status,
		});
		return toResponse(result, {head: request.method === "HEAD"});
	};
}

/**
 * Convert a StaticResponse into a Response.
 * The body is pulled from the resource only as the consumer reads it, and
 * cancelling the stream stops the read.
 */
export function toResponse(
	response: StaticResponse,
	options: {head?: boolean} = {},
): Response {
	const headers = new Headers();
	for (const [name, value] of Object.entries(response.headers)) {
		if (value !== undefined) {
			headers.set(name, value);
		}
	}

	if (response.status !== 200 || options.head) {
		return new Response(null, {status: response.status, headers});
	}

	return new Response(toReadableStream(response.body), {
		status: response.status,
		headers,
	});
}

function toReadableStream(
	chunks: AsyncIterable<Uint8Array>,
): ReadableStream<Uint8Array> {
	const iterator = chunks[Symbol.asyncIterator]();
	return new ReadableStream<Uint8Array>({
		async pull(controller) {
			const {done, value} = await iterator.next();
			if (done) {
				controller.close();
			} else {
				controller.enqueue(value);
			}
		},
		async cancel() {
			await iterator.return?.();
		},
	});
}

/** Percent-decode a path segment; undefined when it is not valid UTF-8 */
function decodeSegment(segment: string): string | undefined {
	try {
		return decodeURIComponent(segment);
	} catch {
		return undefined;
	}
}

function isDecoded(path: Array<string | undefined>): path is string[] {
	return path.every((segment) => segment !== undefined);
}

export default staticFiles;
