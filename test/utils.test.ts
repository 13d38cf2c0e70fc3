import {describe, it, expect, beforeEach, afterEach} from "vitest";
import {mkdirSync, mkdtempSync, rmSync, writeFileSync} from "fs";
import {join} from "path";
import {tmpdir} from "os";
import {getConfig, reset} from "@logtape/logtape";
import {configureLogging} from "../src/utils/logging.js";
import {findProjectRoot, readPackageVersion} from "../src/utils/project.js";

describe("configureLogging", () => {
	afterEach(async () => {
		await reset();
	});

	it("logs the larder category at the requested level", async () => {
		await configureLogging({level: "debug"});

		expect(getConfig()?.loggers).toEqual([
			{category: ["larder"], lowestLevel: "debug", sinks: ["console"]},
			{category: ["logtape", "meta"], lowestLevel: "warning", sinks: []},
		]);
	});
});

describe("project", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = mkdtempSync(join(tmpdir(), "larder-project-test-"));
		mkdirSync(join(tempDir, "a", "b"), {recursive: true});
		writeFileSync(
			join(tempDir, "package.json"),
			JSON.stringify({name: "site", version: "1.2.3"}),
		);
	});

	afterEach(() => {
		rmSync(tempDir, {recursive: true, force: true});
	});

	it("finds the nearest package.json", () => {
		expect(findProjectRoot(join(tempDir, "a", "b"))).toBe(tempDir);
	});

	it("reads the package version", () => {
		expect(readPackageVersion(join(tempDir, "a"))).toBe("1.2.3");
	});

	it("falls back when the version is missing", () => {
		writeFileSync(join(tempDir, "a", "package.json"), "{}");

		expect(readPackageVersion(join(tempDir, "a", "b"))).toBe("0.0.0");
	});
});
