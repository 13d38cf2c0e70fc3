import {describe, it, expect, beforeEach, afterEach} from "vitest";
import {mkdtempSync, mkdirSync, rmSync, utimesSync, writeFileSync} from "fs";
import {join} from "path";
import {tmpdir} from "os";
import {cliOverrides, createServeHandler} from "../src/commands/serve.js";
import {loadConfig} from "../src/utils/config.js";

describe("cliOverrides", () => {
	it("leaves options that were not given undefined", () => {
		expect(cliOverrides(undefined, {etag: true})).toEqual({
			root: undefined,
			port: undefined,
			host: undefined,
			mount: undefined,
			prefix: undefined,
			cacheControl: undefined,
			etag: undefined,
			logLevel: undefined,
		});
	});

	it("maps --no-etag and --verbose", () => {
		const overrides = cliOverrides("public", {etag: false, verbose: true});

		expect(overrides.root).toBe("public");
		expect(overrides.etag).toBe(false);
		expect(overrides.logLevel).toBe("debug");
	});
});

describe("createServeHandler", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = mkdtempSync(join(tmpdir(), "larder-serve-test-"));
		mkdirSync(join(tempDir, "public", "css"), {recursive: true});
		writeFileSync(join(tempDir, "public", "css", "site.css"), "body{}");
		utimesSync(join(tempDir, "public", "css", "site.css"), 1700000000, 1700000000);
	});

	afterEach(() => {
		rmSync(tempDir, {recursive: true, force: true});
	});

	it("serves files below the configured root and mount", async () => {
		const config = loadConfig(
			tempDir,
			cliOverrides("public", {mount: "/static", cacheControl: "max-age=60"}),
			{},
		);
		const handler = createServeHandler(config, tempDir);

		const response = await handler(
			new Request("http://localhost/static/css/site.css"),
		);
		expect(response?.status).toBe(200);
		expect(response?.headers.get("Content-Type")).toBe("text/css");
		expect(response?.headers.get("Cache-Control")).toBe("max-age=60");
		expect(response?.headers.get("ETag")).toBe('"18bcfe56800-6"');
		expect(await response?.text()).toBe("body{}");
	});

	it("passes through requests outside of the mount", async () => {
		const config = loadConfig(tempDir, cliOverrides("public", {mount: "/static"}), {});
		const handler = createServeHandler(config, tempDir);

		expect(await handler(new Request("http://localhost/css/site.css"))).toBe(
			undefined,
		);
	});

	it("omits ETags when disabled", async () => {
		const config = loadConfig(
			tempDir,
			cliOverrides("public", {prefix: "css", etag: false}),
			{},
		);
		const handler = createServeHandler(config, tempDir);

		const response = await handler(new Request("http://localhost/site.css"));
		expect(response?.status).toBe(200);
		expect(response?.headers.get("ETag")).toBeNull();
		expect(response?.headers.get("Last-Modified")).toBe(
			"Tue, 14 Nov 2023 22:13:20 GMT",
		);
	});
});
