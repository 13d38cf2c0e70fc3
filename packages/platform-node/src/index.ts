/**
 * @larder/platform-node - Node.js platform adapter
 *
 * Runs Web Request/Response handlers on a Node.js http server.
 */

import * as HTTP from "http";
import {type EventEmitter, once} from "events";
import {
	BadRequest,
	InternalServerError,
	NotFound,
	isHTTPError,
} from "@larder/http-errors";
import {getLogger} from "@logtape/logtape";

const logger = getLogger(["larder", "platform"]);

// ============================================================================
// TYPES
// ============================================================================

/**
 * Request handler. Returning undefined means "not handled" and produces a
 * 404.
 */
export type Handler = (
	request: Request,
) => Promise<Response | undefined> | Response | undefined;

export interface ServerOptions {
	/** Port to listen on (default: platform port) */
	port?: number;
	/** Host to bind to (default: platform host) */
	host?: string;
}

export interface NodePlatformOptions {
	/** Default port (default: 3000) */
	port?: number;
	/** Default host (default: localhost) */
	host?: string;
}

export interface Server {
	listen(): Promise<void>;
	close(): Promise<void>;
	address(): {port: number; host: string};
	readonly url: string;
	readonly ready: boolean;
}

/**
 * The parts of http.ServerResponse that responses are written through
 */
export interface NodeResponse extends EventEmitter {
	statusCode: number;
	statusMessage: string;
	readonly headersSent: boolean;
	readonly destroyed: boolean;
	readonly writableFinished: boolean;
	setHeader(name: string, value: string): unknown;
	getHeaderNames(): string[];
	removeHeader(name: string): void;
	write(chunk: Uint8Array): boolean;
	end(): unknown;
	destroy(): unknown;
}

// ============================================================================
// REQUEST HANDLING
// ============================================================================

/**
 * Run a handler and always produce a Response: 404 when nothing handled the
 * request, the error's own response for HTTP errors, 500 otherwise.
 */
export async function respond(
	handler: Handler,
	request: Request,
): Promise<Response> {
	try {
		const response = await handler(request);
		return response ?? new NotFound().toResponse();
	} catch (error) {
		if (isHTTPError(error)) {
			return error.toResponse();
		}

		logger.error("Request error: {error}", {error, url: request.url});
		return new InternalServerError(undefined, {cause: error}).toResponse();
	}
}

/**
 * Convert a Node.js request into a Web Request. Bodies are not forwarded:
 * the handlers served here only answer GET and HEAD.
 */
export function toWebRequest(req: HTTP.IncomingMessage): Request {
	const headers = new Headers();
	for (const [name, value] of Object.entries(req.headers)) {
		if (Array.isArray(value)) {
			for (const item of value) {
				headers.append(name, item);
			}
		} else if (value !== undefined) {
			headers.set(name, value);
		}
	}

	const host = req.headers.host ?? "localhost";
	return new Request(`http://${host}${req.url ?? "/"}`, {
		method: req.method,
		headers,
	});
}

/**
 * Write a Web Response to a Node.js response, streaming the body with
 * backpressure. Stops reading when the client goes away.
 */
export async function writeResponse(
	response: Response,
	res: NodeResponse,
): Promise<void> {
	res.statusCode = response.status;
	if (response.statusText) {
		res.statusMessage = response.statusText;
	}
	response.headers.forEach((value, key) => {
		res.setHeader(key, value);
	});

	if (!response.body) {
		res.end();
		return;
	}

	const reader = response.body.getReader();
	const onClose = () => {
		if (!res.writableFinished) {
			reader.cancel().catch((error: unknown) => {
				logger.debug("Cancelling response body failed: {error}", {error});
			});
		}
	};
	res.once("close", onClose);

	try {
		for (;;) {
			const {done, value} = await reader.read();
			if (done) {
				break;
			} else if (res.destroyed) {
				await reader.cancel();
				return;
			}

			if (!res.write(value)) {
				await Promise.race([once(res, "drain"), once(res, "close")]);
			}
		}
		res.end();
	} finally {
		res.off("close", onClose);
		reader.releaseLock();
	}
}

/**
 * Serve one Node.js request with a handler. Failures before the first body
 * chunk is sent become a 500; later ones destroy the connection.
 */
export async function handleNodeRequest(
	handler: Handler,
	req: HTTP.IncomingMessage,
	res: NodeResponse,
): Promise<void> {
	let request: Request;
	try {
		request = toWebRequest(req);
	} catch (error) {
		logger.debug("Malformed request {url}: {error}", {url: req.url, error});
		await writeResponse(new BadRequest().toResponse(), res);
		return;
	}

	const response = await respond(handler, request);
	try {
		await writeResponse(response, res);
	} catch (error) {
		logger.error("Response body failed: {error}", {error, url: request.url});
		if (res.headersSent) {
			res.destroy();
			return;
		}

		for (const name of res.getHeaderNames()) {
			res.removeHeader(name);
		}
		await writeResponse(
			new InternalServerError(undefined, {cause: error}).toResponse(),
			res,
		);
	}
}

// ============================================================================
// PLATFORM IMPLEMENTATION
// ============================================================================

/**
 * Node.js platform: serves handlers over node:http
 */
export class NodePlatform {
	readonly name: string;
	#options: {port: number; host: string};

	constructor(options: NodePlatformOptions = {}) {
		this.name = "node";
		this.#options = {
			port: options.port ?? 3000,
			host: options.host ?? "localhost",
		};
	}

	get options(): {port: number; host: string} {
		return {...this.#options};
	}

	createServer(handler: Handler, options: ServerOptions = {}): Server {
		const port = options.port ?? this.#options.port;
		const host = options.host ?? this.#options.host;

		const httpServer = HTTP.createServer((req, res) => {
			handleNodeRequest(handler, req, res).catch((error: unknown) => {
				logger.error("Response stream failed: {error}", {error, url: req.url});
				res.destroy();
			});
		});

		let listening = false;
		let boundPort = port;

		return {
			async listen() {
				httpServer.listen(port, host);
				await once(httpServer, "listening");
				const address = httpServer.address();
				if (address && typeof address === "object") {
					boundPort = address.port;
				}
				listening = true;
				logger.info("Server listening", {url: `http://${host}:${boundPort}`});
			},
			async close() {
				if (!listening) {
					return;
				}
				await new Promise<void>((resolve, reject) => {
					httpServer.close((error) => (error ? reject(error) : resolve()));
					httpServer.closeAllConnections();
				});
				listening = false;
				logger.info("Server closed", {});
			},
			address() {
				return {port: boundPort, host};
			},
			get url() {
				return `http://${host}:${boundPort}`;
			},
			get ready() {
				return listening;
			},
		};
	}
}

export default NodePlatform;
