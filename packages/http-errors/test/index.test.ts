import {test, expect, describe} from "vitest";
import {
	HTTPError,
	isHTTPError,
	statusText,
	BadRequest,
	NotFound,
	MethodNotAllowed,
	InternalServerError,
} from "../src/index.js";

describe("HTTPError", () => {
	test("should create basic error with status code", () => {
		const error = new HTTPError(404);

		expect(error.status).toBe(404);
		expect(error.message).toBe("Not Found");
		expect(error.name).toBe("HTTPError");
		expect(error.expose).toBe(true);
	});

	test("should create error with custom message", () => {
		const error = new HTTPError(404, "No such asset");

		expect(error.message).toBe("No such asset");
	});

	test("should keep cause", () => {
		const cause = new Error("disk unplugged");
		const error = new HTTPError(500, undefined, {cause});

		expect(error.cause).toBe(cause);
	});

	test("should default expose based on status code", () => {
		expect(new HTTPError(404).expose).toBe(true);
		expect(new HTTPError(500).expose).toBe(false);
		expect(new HTTPError(500, undefined, {expose: true}).expose).toBe(true);
	});

	test("should fall back to a generic reason phrase", () => {
		expect(new HTTPError(599).message).toBe("Unknown Error");
		expect(statusText(405)).toBe("Method Not Allowed");
	});

	test("toJSON should serialize correctly", () => {
		const error = new HTTPError(405, "Nope", {headers: {Allow: "GET"}});

		expect(error.toJSON()).toEqual({
			name: "HTTPError",
			message: "Nope",
			status: 405,
			expose: true,
			headers: {Allow: "GET"},
		});
	});
});

describe("toResponse", () => {
	test("should expose client error messages", async () => {
		const response = new NotFound("Missing asset").toResponse();

		expect(response.status).toBe(404);
		expect(response.statusText).toBe("Not Found");
		expect(response.headers.get("Content-Type")).toBe(
			"text/plain; charset=utf-8",
		);
		expect(await response.text()).toBe("Missing asset");
	});

	test("should hide server error messages", async () => {
		const response = new InternalServerError("secret path /srv").toResponse();

		expect(response.status).toBe(500);
		expect(await response.text()).toBe("Internal Server Error");
	});

	test("should include custom headers", () => {
		const response = new MethodNotAllowed(undefined, {
			headers: {Allow: "GET, HEAD"},
		}).toResponse();

		expect(response.status).toBe(405);
		expect(response.headers.get("Allow")).toBe("GET, HEAD");
	});
});

describe("subclasses", () => {
	test("should set status and name", () => {
		const cases: Array<[HTTPError, number, string]> = [
			[new BadRequest(), 400, "BadRequest"],
			[new NotFound(), 404, "NotFound"],
			[new MethodNotAllowed(), 405, "MethodNotAllowed"],
			[new InternalServerError(), 500, "InternalServerError"],
		];

		for (const [error, status, name] of cases) {
			expect(error.status).toBe(status);
			expect(error.name).toBe(name);
			expect(error).toBeInstanceOf(HTTPError);
			expect(error).toBeInstanceOf(Error);
		}
	});
});

describe("isHTTPError", () => {
	test("should identify HTTP errors", () => {
		expect(isHTTPError(new NotFound())).toBe(true);
		expect(isHTTPError(new Error("plain"))).toBe(false);
		expect(isHTTPError(null)).toBe(false);
		expect(isHTTPError("404")).toBe(false);
	});
});
