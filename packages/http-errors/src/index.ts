/**
 * HTTP error classes with native cause support and Response serialization
 */

/** Reason phrases for the statuses this project produces */
const STATUS_TEXT: Record<number, string> = {
	400: "Bad Request",
	404: "Not Found",
	405: "Method Not Allowed",
	500: "Internal Server Error",
};

const HTTP_ERROR = Symbol.for("larder.http-error");

/** Options for creating HTTP errors */
export interface HTTPErrorOptions {
	/** Original error that caused this HTTP error */
	cause?: unknown;
	/** Headers to send with the error response */
	headers?: Record<string, string>;
	/** Whether the message may be shown to clients (defaults to status < 500) */
	expose?: boolean;
}

/** Base HTTP error class */
export class HTTPError extends Error {
	readonly [HTTP_ERROR] = true;
	readonly status: number;
	readonly expose: boolean;
	readonly headers: Record<string, string>;

	constructor(
		status: number,
		message?: string,
		options: HTTPErrorOptions = {},
	) {
		super(message || statusText(status), {cause: options.cause});

		this.name = new.target.name;
		this.status = status;
		this.expose = options.expose ?? status < 500;
		this.headers = {...options.headers};
	}

	/**
	 * Convert error to a plain object for structured logging
	 */
	toJSON() {
		return {
			name: this.name,
			message: this.message,
			status: this.status,
			expose: this.expose,
			headers: this.headers,
		};
	}

	/**
	 * Convert error to a plain-text HTTP Response.
	 * Unexposed errors only reveal the reason phrase.
	 */
	toResponse(): Response {
		const headers = new Headers(this.headers);
		headers.set("Content-Type", "text/plain; charset=utf-8");
		const body = this.expose ? this.message : statusText(this.status);
		return new Response(body, {
			status: this.status,
			statusText: statusText(this.status),
			headers,
		});
	}
}

/**
 * Reason phrase for a status code
 */
export function statusText(status: number): string {
	return STATUS_TEXT[status] ?? "Unknown Error";
}

/**
 * Check if a value is an HTTP error, including instances created by another
 * copy of this module
 */
export function isHTTPError(value: unknown): value is HTTPError {
	return typeof value === "object" && value !== null && HTTP_ERROR in value;
}

export class BadRequest extends HTTPError {
	constructor(message?: string, options?: HTTPErrorOptions) {
		super(400, message, options);
	}
}

export class NotFound extends HTTPError {
	constructor(message?: string, options?: HTTPErrorOptions) {
		super(404, message, options);
	}
}

export class MethodNotAllowed extends HTTPError {
	constructor(message?: string, options?: HTTPErrorOptions) {
		super(405, message, options);
	}
}

export class InternalServerError extends HTTPError {
	constructor(message?: string, options?: HTTPErrorOptions) {
		super(500, message, options);
	}
}
